import { Cron } from "croner";

export function parseHHMM(str: string): { h: number; m: number } {
  const [h, m] = str.split(":").map(Number);
  return { h, m };
}

/** Daily cron expression firing at the given "HH:mm". */
export function dailyCronExpr(time: string): string {
  const { h, m } = parseHHMM(time);
  return `${m} ${h} * * *`;
}

/**
 * Next occurrence of the wall-clock `time` strictly after `nowMs`:
 * later today if it has not passed yet, otherwise tomorrow.
 */
export function computeNextDailyRunAtMs(
  time: string,
  nowMs: number,
  timezone?: string
): number {
  const cron = new Cron(dailyCronExpr(time), { timezone });
  const next = cron.nextRun(new Date(nowMs));
  if (!next) {
    throw new Error(`no upcoming run for daily time ${time}`);
  }
  // Floor to second (no sub-second precision)
  return Math.floor(next.getTime() / 1000) * 1000;
}

/** Delay from `nowMs` until the first report. */
export function computeInitialReportDelayMs(
  time: string,
  nowMs: number,
  timezone?: string
): number {
  return Math.max(0, computeNextDailyRunAtMs(time, nowMs, timezone) - nowMs);
}

/**
 * Next slot of a fixed-rate series anchored at `anchorMs`, strictly after
 * `nowMs`. Slots missed while a run was still going are skipped.
 */
export function computeNextIntervalRunAtMs(
  anchorMs: number,
  everyMs: number,
  nowMs: number
): { nextRunAtMs: number; skipped: number } {
  if (nowMs < anchorMs) return { nextRunAtMs: anchorMs, skipped: 0 };
  const periods = Math.floor((nowMs - anchorMs) / everyMs) + 1;
  return { nextRunAtMs: anchorMs + periods * everyMs, skipped: periods - 1 };
}
