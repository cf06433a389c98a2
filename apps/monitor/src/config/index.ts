import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { EmailSettings, MonitorConfig } from "./types.js";

export type { MonitorConfig, ProbeSettings, EmailSettings } from "./types.js";

export const DEFAULT_CONFIG_FILE = "monitor.yaml";

const MINUTE_MS = 60_000;
const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

function commaList(value: string | string[]): string[] {
  const items = Array.isArray(value) ? value : value.split(",");
  return [...new Set(items.map((s) => s.trim()).filter((s) => s.length > 0))];
}

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const listField = z.union([z.string(), z.array(z.string())]).transform(commaList);
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((s) => (s ? s : undefined));

const schema = z.object({
  hosts: listField.refine((hosts) => hosts.length > 0, "at least one host is required"),
  "tcp.port": z.coerce.number().int().min(1).max(65535).default(80),
  "tcp.timeout.ms": z.coerce.number().int().positive().default(2000),
  "tcp.retries": z.coerce.number().int().min(1).default(3),
  "alert.throttle.minutes": z.coerce.number().min(0).default(30),
  "check.interval.minutes": z.coerce.number().positive().default(10),
  "report.time": z.string().regex(HHMM, "expected HH:mm").default("00:00"),
  "report.timezone": optionalText.refine(
    (tz) => tz === undefined || isTimeZone(tz),
    "unknown time zone"
  ),
  "email.to": listField.default(""),
  "email.from": optionalText,
  "email.from.name": z.string().default("Host Monitor"),
  "sendgrid.api.key": optionalText,
  "notify.timeout.ms": z.coerce.number().int().positive().default(10_000),
  "log.level": z.enum(["debug", "info", "warn", "error"]).default("info"),
  "log.file": optionalText,
  "http.port": z.coerce.number().int().min(1).max(65535).optional(),
  "http.token": optionalText,
});

/**
 * Validates a flat key/value map (as read from the YAML file) into a typed
 * MonitorConfig. `SENDGRID_API_KEY` in env takes precedence over the file.
 */
export function parseMonitorConfig(
  raw: unknown,
  env: Record<string, string | undefined> = {}
): MonitorConfig {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigurationError("configuration must be a key/value map");
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      "invalid configuration",
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }

  const c = result.data;

  return {
    hosts: c.hosts,
    probe: {
      port: c["tcp.port"],
      timeoutMs: c["tcp.timeout.ms"],
      retries: c["tcp.retries"],
    },
    alert: { throttleMs: c["alert.throttle.minutes"] * MINUTE_MS },
    check: { intervalMs: c["check.interval.minutes"] * MINUTE_MS },
    report: { time: c["report.time"], timezone: c["report.timezone"] },
    email: {
      apiKey: env.SENDGRID_API_KEY?.trim() || c["sendgrid.api.key"],
      from: c["email.from"],
      fromName: c["email.from.name"],
      to: c["email.to"],
    },
    notify: { timeoutMs: c["notify.timeout.ms"] },
    log: { level: c["log.level"], file: c["log.file"] },
    http: { port: c["http.port"], token: c["http.token"] },
  };
}

/**
 * Reads and validates the YAML configuration file.
 * Throws ConfigurationError when the file is missing or invalid.
 */
export function loadMonitorConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env
): MonitorConfig {
  const fullPath = resolve(filePath);
  if (!existsSync(fullPath)) {
    throw new ConfigurationError(`config file not found: ${fullPath}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `could not parse ${fullPath}`,
      [err instanceof Error ? err.message : String(err)]
    );
  }

  return parseMonitorConfig(parsed, env);
}

export function isEmailConfigured(email: EmailSettings): boolean {
  return Boolean(email.apiKey && email.from && email.to.length > 0);
}
