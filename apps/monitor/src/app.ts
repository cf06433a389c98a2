import type { Hono } from "hono";
import type { MonitorConfig } from "./config/types.js";
import { MonitorEventBus } from "./events/index.js";
import { HostRegistry } from "./hosts/registry.js";
import type { Logger } from "./logger.js";
import { HostMonitor } from "./monitor/monitor.js";
import { createNotifier } from "./notify/sendgrid.js";
import type { Notifier } from "./notify/types.js";
import { createTcpProber, type Prober } from "./probe/tcp.js";
import { createControlRoutes } from "./routes/index.js";
import { createMonitorScheduler, type MonitorScheduler } from "./scheduler/index.js";

export interface MonitorApp {
  registry: HostRegistry;
  events: MonitorEventBus;
  monitor: HostMonitor;
  scheduler: MonitorScheduler;
  routes: Hono;
}

export interface MonitorAppOverrides {
  probe?: Prober;
  notifier?: Notifier;
  now?: () => number;
}

/** Wires every component from a validated config. Nothing is started. */
export function createMonitorApp(
  config: MonitorConfig,
  log: Logger,
  overrides: MonitorAppOverrides = {}
): MonitorApp {
  const registry = new HostRegistry(config.hosts);
  const events = new MonitorEventBus();

  const monitor = new HostMonitor(
    {
      probe: config.probe,
      throttleMs: config.alert.throttleMs,
      recipients: config.email.to,
      notifyTimeoutMs: config.notify.timeoutMs,
      timeZone: config.report.timezone,
    },
    {
      registry,
      events,
      probe: overrides.probe ?? createTcpProber(log.child("probe")),
      notifier: overrides.notifier ?? createNotifier(config.email),
      log: log.child("monitor"),
      now: overrides.now,
    }
  );

  const scheduler = createMonitorScheduler(
    monitor,
    {
      checkIntervalMs: config.check.intervalMs,
      reportTime: config.report.time,
      reportTimezone: config.report.timezone,
    },
    log.child("scheduler")
  );

  const routes = createControlRoutes({
    monitor,
    registry,
    events,
    scheduler,
    token: config.http.token,
  });

  return { registry, events, monitor, scheduler, routes };
}
