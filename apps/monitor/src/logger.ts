import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Lines are appended here in addition to the console. */
  file?: string;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Console logger that prefixes every line with `[scope]`.
 * Children share the parent's level and file sink.
 */
export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[opts.level ?? "info"];

  function write(level: LogLevel, msg: string): void {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `[${scope}] ${msg}`;

    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);

    if (opts.file) {
      try {
        appendFileSync(
          opts.file,
          `${new Date().toISOString()} ${level.toUpperCase()} ${line}\n`,
          "utf-8"
        );
      } catch (err) {
        console.error(`[logger] could not write to ${opts.file}: ${describe(err)}`);
      }
    }
  }

  return {
    debug: (msg) => write("debug", msg),
    info: (msg) => write("info", msg),
    warn: (msg) => write("warn", msg),
    error: (msg, err) => write("error", err === undefined ? msg : `${msg}: ${describe(err)}`),
    child: (sub) => createLogger(`${scope}:${sub}`, opts),
  };
}
