import type { LogLevel } from "../logger.js";

export interface ProbeSettings {
  port: number;
  timeoutMs: number;
  retries: number;
}

export interface EmailSettings {
  apiKey?: string;
  from?: string;
  fromName: string;
  to: string[];
}

export interface MonitorConfig {
  hosts: string[];
  probe: ProbeSettings;
  alert: {
    throttleMs: number;
  };
  check: {
    intervalMs: number;
  };
  report: {
    time: string; // "HH:mm"
    timezone?: string;
  };
  email: EmailSettings;
  notify: {
    timeoutMs: number;
  };
  log: {
    level: LogLevel;
    file?: string;
  };
  http: {
    port?: number;
    token?: string;
  };
}
