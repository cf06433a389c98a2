#!/usr/bin/env node
import { serve, type ServerType } from "@hono/node-server";
import { createMonitorApp, type MonitorApp } from "./app.js";
import { parseArgs, USAGE, type CliAction } from "./cli/args.js";
import { DEFAULT_CONFIG_FILE, isEmailConfigured, loadMonitorConfig } from "./config/index.js";
import type { MonitorConfig } from "./config/types.js";
import { ConfigurationError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

const cli = parseArgs(process.argv.slice(2));

if (cli.help) {
  console.log(USAGE);
  process.exit(0);
}

let app: MonitorApp | null = null;
let server: ServerType | null = null;
let log: Logger = createLogger("monitor");

function loadConfigOrExit(): MonitorConfig {
  const configPath = cli.configPath ?? process.env.MONITOR_CONFIG ?? DEFAULT_CONFIG_FILE;
  try {
    return loadMonitorConfig(configPath);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`[monitor] FATAL: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function runAction(target: MonitorApp, action: CliAction): Promise<void> {
  switch (action.kind) {
    case "check-now":
      log.info("manual trigger: checking hosts immediately");
      await target.monitor.checkHosts("manual");
      break;
    case "send-report":
      log.info("manual trigger: sending status report immediately");
      await target.monitor.sendReport("manual");
      break;
    case "simulate-down":
      log.info(`manual trigger: simulating host down for ${action.host}`);
      await target.monitor.simulateDown(action.host);
      break;
  }
}

async function bootstrap(): Promise<void> {
  const config = loadConfigOrExit();
  log = createLogger("monitor", config.log);

  for (const warning of cli.warnings) log.warn(warning);

  if (!isEmailConfigured(config.email)) {
    log.warn("email is not configured (sendgrid.api.key, email.from, email.to): alerts will not be delivered");
  }

  const current = createMonitorApp(config, log);
  app = current;
  log.info(`monitoring ${current.registry.size} host(s): ${current.registry.hosts().join(", ")}`);
  current.scheduler.start();

  const port = config.http.port;
  if (port !== undefined) {
    server = serve({ fetch: current.routes.fetch, port }, (info) => {
      log.info(`control server listening on http://localhost:${info.port}`);
    });
  }

  for (const action of cli.actions) {
    await runAction(current, action);
  }
}

bootstrap().catch((err) => {
  console.error("[monitor] FATAL: bootstrap failed", err);
  process.exit(1);
});

// --- Graceful shutdown ---

let shuttingDown = false;

async function onShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  log.info(`${signal} received, shutting down`);

  // Force exit if cleanup hangs
  const forceExit = setTimeout(() => {
    console.error("[monitor] shutdown timed out, forcing exit");
    process.exit(1);
  }, 5_000);
  forceExit.unref();

  try {
    app?.scheduler.stop();

    const current = server;
    if (current) {
      await new Promise<void>((resolve, reject) => {
        current.close((err) => (err ? reject(err) : resolve()));
      });
    }
  } catch (err) {
    log.error("error during shutdown", err);
  }

  process.exit(0);
}

process.on("SIGTERM", () => void onShutdown("SIGTERM"));
process.on("SIGINT", () => void onShutdown("SIGINT"));
