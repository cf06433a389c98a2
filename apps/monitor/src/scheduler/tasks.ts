import type { Logger } from "../logger.js";
import {
  computeInitialReportDelayMs,
  computeNextDailyRunAtMs,
  computeNextIntervalRunAtMs,
} from "./schedule.js";

const MAX_TIMER_DELAY_MS = 60_000;

export interface PeriodicTaskState {
  name: string;
  running: boolean;
  nextRunAtMs: number | null;
  lastRunAtMs: number | null;
  lastDurationMs: number | null;
  lastError: string | null;
  runs: number;
  skipped: number;
}

export interface PeriodicTask {
  start(): void;
  stop(): void;
  getState(): PeriodicTaskState;
}

interface TaskOptions {
  name: string;
  run: () => Promise<unknown>;
  log: Logger;
  /** Next due time after a run that was due at `dueAtMs` finished at `nowMs`. */
  next: (dueAtMs: number, nowMs: number) => { nextRunAtMs: number; skipped: number };
  first: (nowMs: number) => number;
}

/**
 * Timer loop shared by both tasks. Each run is awaited before the timer is
 * re-armed, so a task never overlaps itself; slots that come due while it is
 * still running are skipped, not queued, and a stop/start during a run does
 * not start a second one. Long delays are re-checked every
 * minute rather than armed as one timer.
 */
function createTask(opts: TaskOptions): PeriodicTask {
  const state: PeriodicTaskState = {
    name: opts.name,
    running: false,
    nextRunAtMs: null,
    lastRunAtMs: null,
    lastDurationMs: null,
    lastError: null,
    runs: 0,
    skipped: 0,
  };
  let timer: ReturnType<typeof setTimeout> | null = null;
  let active = false;

  function armTimer(): void {
    if (!active || state.nextRunAtMs === null) return;
    if (timer) clearTimeout(timer);

    const delay = Math.max(0, Math.min(state.nextRunAtMs - Date.now(), MAX_TIMER_DELAY_MS));
    timer = setTimeout(() => void onTimer(), delay);
  }

  async function onTimer(): Promise<void> {
    timer = null;
    if (!active || state.nextRunAtMs === null) return;
    const dueAtMs = state.nextRunAtMs;
    if (Date.now() < dueAtMs) {
      armTimer();
      return;
    }

    state.running = true;
    const startMs = Date.now();
    try {
      await opts.run();
      state.lastError = null;
    } catch (err) {
      state.lastError = err instanceof Error ? err.message : String(err);
      opts.log.error(`${opts.name} run failed`, err);
    } finally {
      state.running = false;
      state.runs += 1;
      state.lastRunAtMs = startMs;
      state.lastDurationMs = Date.now() - startMs;
    }

    // stopped while running: stay stopped
    if (!active) return;

    const { nextRunAtMs, skipped } = opts.next(dueAtMs, Date.now());
    if (skipped > 0) {
      state.skipped += skipped;
      opts.log.warn(`${opts.name} overran its schedule, skipped ${skipped} run(s)`);
    }
    state.nextRunAtMs = nextRunAtMs;
    armTimer();
  }

  return {
    start(): void {
      if (active) return;
      active = true;
      // restarted mid-run: the in-flight run re-arms the timer when it finishes
      if (state.running) return;
      state.nextRunAtMs = opts.first(Date.now());
      armTimer();
    },

    stop(): void {
      active = false;
      state.nextRunAtMs = null;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },

    getState(): PeriodicTaskState {
      return { ...state };
    },
  };
}

/** Fixed-rate task; the first run fires immediately on start. */
export function createIntervalTask(opts: {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
  log: Logger;
}): PeriodicTask {
  return createTask({
    name: opts.name,
    run: opts.run,
    log: opts.log,
    first: (nowMs) => nowMs,
    next: (dueAtMs, nowMs) => computeNextIntervalRunAtMs(dueAtMs, opts.intervalMs, nowMs),
  });
}

/** Fires once a day at the wall-clock "HH:mm" in `timezone` (local if unset). */
export function createDailyTask(opts: {
  name: string;
  time: string;
  timezone?: string;
  run: () => Promise<unknown>;
  log: Logger;
}): PeriodicTask {
  return createTask({
    name: opts.name,
    run: opts.run,
    log: opts.log,
    first: (nowMs) => nowMs + computeInitialReportDelayMs(opts.time, nowMs, opts.timezone),
    next: (dueAtMs, nowMs) => {
      const nextRunAtMs = computeNextDailyRunAtMs(opts.time, nowMs, opts.timezone);
      const skipped = Math.max(0, Math.round((nextRunAtMs - dueAtMs) / 86_400_000) - 1);
      return { nextRunAtMs, skipped };
    },
  });
}
