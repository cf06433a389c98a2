import type { HostState } from "../hosts/types.js";

export type AlertKind = "critical" | "recovery";

export interface Evaluation {
  next: HostState;
  alert: AlertKind | null;
  /** Failure count the alert should report (pre-reset count for recoveries). */
  failCount: number;
}

/** True when no CRITICAL alert was sent within the throttle window. */
export function isAlertDue(lastAlertAt: number | null, throttleMs: number, now: number): boolean {
  return lastAlertAt === null || now - lastAlertAt > throttleMs;
}

/**
 * Two-state (UP/DOWN) transition for a single probe outcome.
 *
 *   up,   unreachable → down, +1 fail, CRITICAL unless throttled
 *   down, reachable   → up, fails reset, RECOVERY (never throttled)
 *   down, unreachable → +1 fail, CRITICAL again once the window has elapsed
 *   up,   reachable   → unchanged
 */
export function evaluate(
  state: HostState,
  reachable: boolean,
  throttleMs: number,
  now: number
): Evaluation {
  if (!reachable) {
    const failCount = state.failCount + 1;
    const due = isAlertDue(state.lastAlertAt, throttleMs, now);
    return {
      next: {
        ...state,
        up: false,
        failCount,
        lastAlertAt: due ? now : state.lastAlertAt,
      },
      alert: due ? "critical" : null,
      failCount,
    };
  }

  if (!state.up) {
    return {
      next: { ...state, up: true, failCount: 0 },
      alert: "recovery",
      failCount: state.failCount,
    };
  }

  return { next: state, alert: null, failCount: state.failCount };
}
