import { Hono } from "hono";
import { bearerAuth } from "hono/bearer-auth";
import type { MonitorEventBus } from "../events/index.js";
import type { HostRegistry } from "../hosts/registry.js";
import type { HostMonitor } from "../monitor/monitor.js";
import type { MonitorScheduler } from "../scheduler/index.js";

export interface ControlRoutesDeps {
  monitor: HostMonitor;
  registry: HostRegistry;
  events: MonitorEventBus;
  scheduler?: MonitorScheduler;
  /** When set, the trigger routes require `Authorization: Bearer <token>`. */
  token?: string;
}

export function createControlRoutes(deps: ControlRoutesDeps): Hono {
  const { monitor, registry, events, scheduler, token } = deps;
  const routes = new Hono();

  // GET /health
  routes.get("/health", (c) => {
    const status = scheduler?.getStatus();
    return c.json({
      status: "ok",
      uptime: process.uptime(),
      hosts: registry.size,
      lastCheck: events.getLastEvent("check:finished") ?? null,
      nextCheckAtMs: status?.check.nextRunAtMs ?? null,
      nextReportAtMs: status?.report.nextRunAtMs ?? null,
    });
  });

  if (token) {
    routes.use("/check", bearerAuth({ token }));
    routes.use("/report", bearerAuth({ token }));
    routes.use("/hosts/*", bearerAuth({ token }));
  }

  // POST /check
  routes.post("/check", async (c) => {
    const summary = await monitor.checkHosts("manual");
    return c.json({
      durationMs: summary.durationMs,
      results: summary.results.map(({ host, reachable, alert }) => ({ host, reachable, alert })),
      errors: summary.errors,
    });
  });

  // POST /report
  routes.post("/report", async (c) => {
    return c.json(await monitor.sendReport("manual"));
  });

  // POST /hosts/:host/simulate-down
  routes.post("/hosts/:host/simulate-down", async (c) => {
    const host = c.req.param("host");
    const ok = await monitor.simulateDown(host);
    if (!ok) return c.json({ error: `host not found: ${host}` }, 404);
    return c.json({ host, status: "down" });
  });

  return routes;
}
