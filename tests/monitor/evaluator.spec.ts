import { describe, expect, it } from "vitest";
import { evaluate, isAlertDue } from "../../apps/monitor/src/monitor/evaluator.js";
import type { HostState } from "../../apps/monitor/src/hosts/types.js";
import { MINUTE } from "./helpers.js";

const THROTTLE = 30 * MINUTE;
const T0 = 1_700_000_000_000;

function state(overrides: Partial<HostState> = {}): HostState {
  return { host: "a.test", up: true, failCount: 0, lastAlertAt: null, ...overrides };
}

describe("isAlertDue", () => {
  it("is due when nothing was ever sent", () => {
    expect(isAlertDue(null, THROTTLE, T0)).toBe(true);
  });

  it("requires strictly more than the window to have elapsed", () => {
    expect(isAlertDue(T0, THROTTLE, T0 + THROTTLE)).toBe(false);
    expect(isAlertDue(T0, THROTTLE, T0 + THROTTLE + 1)).toBe(true);
  });
});

describe("evaluate", () => {
  it("UP + unreachable goes down and raises a critical alert", () => {
    const e = evaluate(state(), false, THROTTLE, T0);
    expect(e.alert).toBe("critical");
    expect(e.failCount).toBe(1);
    expect(e.next).toEqual({ host: "a.test", up: false, failCount: 1, lastAlertAt: T0 });
  });

  it("UP + unreachable inside the throttle window goes down silently", () => {
    const e = evaluate(state({ lastAlertAt: T0 - 5 * MINUTE }), false, THROTTLE, T0);
    expect(e.alert).toBeNull();
    expect(e.next).toEqual({ host: "a.test", up: false, failCount: 1, lastAlertAt: T0 - 5 * MINUTE });
  });

  it("DOWN + reachable recovers, resets the count and reports the old one", () => {
    const e = evaluate(state({ up: false, failCount: 4, lastAlertAt: T0 - MINUTE }), true, THROTTLE, T0);
    expect(e.alert).toBe("recovery");
    expect(e.failCount).toBe(4);
    expect(e.next).toEqual({ host: "a.test", up: true, failCount: 0, lastAlertAt: T0 - MINUTE });
  });

  it("recovery is never throttled", () => {
    const e = evaluate(state({ up: false, failCount: 1, lastAlertAt: T0 }), true, THROTTLE, T0);
    expect(e.alert).toBe("recovery");
  });

  it("DOWN + unreachable increments without alerting inside the window", () => {
    const e = evaluate(state({ up: false, failCount: 2, lastAlertAt: T0 - 10 * MINUTE }), false, THROTTLE, T0);
    expect(e.alert).toBeNull();
    expect(e.next.failCount).toBe(3);
    expect(e.next.lastAlertAt).toBe(T0 - 10 * MINUTE);
  });

  it("DOWN + unreachable re-alerts once the window has elapsed", () => {
    const e = evaluate(state({ up: false, failCount: 3, lastAlertAt: T0 - 31 * MINUTE }), false, THROTTLE, T0);
    expect(e.alert).toBe("critical");
    expect(e.next).toEqual({ host: "a.test", up: false, failCount: 4, lastAlertAt: T0 });
  });

  it("UP + reachable changes nothing", () => {
    const s = state({ lastAlertAt: T0 - MINUTE });
    const e = evaluate(s, true, THROTTLE, T0);
    expect(e.alert).toBeNull();
    expect(e.next).toEqual(s);
  });
});
