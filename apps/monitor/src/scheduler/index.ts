import type { Logger } from "../logger.js";
import type { HostMonitor } from "../monitor/monitor.js";
import { createDailyTask, createIntervalTask, type PeriodicTaskState } from "./tasks.js";

export interface MonitorSchedulerOptions {
  checkIntervalMs: number;
  reportTime: string;
  reportTimezone?: string;
}

export interface MonitorScheduler {
  start(): void;
  stop(): void;
  getStatus(): { check: PeriodicTaskState; report: PeriodicTaskState };
}

/**
 * Drives the two periodic activities: the check cycle (immediately, then
 * every `checkIntervalMs`) and the daily report at `reportTime`. They run
 * independently and may overlap each other, never themselves.
 */
export function createMonitorScheduler(
  monitor: HostMonitor,
  opts: MonitorSchedulerOptions,
  log: Logger
): MonitorScheduler {
  const check = createIntervalTask({
    name: "check",
    intervalMs: opts.checkIntervalMs,
    run: () => monitor.checkHosts("schedule"),
    log,
  });

  const report = createDailyTask({
    name: "report",
    time: opts.reportTime,
    timezone: opts.reportTimezone,
    run: () => monitor.sendReport("schedule"),
    log,
  });

  return {
    start(): void {
      check.start();
      report.start();
      const intervalMin = opts.checkIntervalMs / 60_000;
      const nextReport = report.getState().nextRunAtMs;
      log.info(
        `started: checking every ${intervalMin} minute(s), reporting daily at ${opts.reportTime}` +
          (opts.reportTimezone ? ` ${opts.reportTimezone}` : "") +
          (nextReport !== null ? ` (next ${new Date(nextReport).toISOString()})` : "")
      );
    },

    stop(): void {
      check.stop();
      report.stop();
      log.info("stopped");
    },

    getStatus() {
      return { check: check.getState(), report: report.getState() };
    },
  };
}
