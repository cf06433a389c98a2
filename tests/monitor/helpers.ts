import { vi } from "vitest";
import { MonitorEventBus } from "../../apps/monitor/src/events/index.js";
import { HostRegistry } from "../../apps/monitor/src/hosts/registry.js";
import type { Logger } from "../../apps/monitor/src/logger.js";
import { HostMonitor } from "../../apps/monitor/src/monitor/monitor.js";
import type { Notifier, NotifyRequest, NotifyResult } from "../../apps/monitor/src/notify/types.js";
import type { Prober } from "../../apps/monitor/src/probe/tcp.js";

export const MINUTE = 60_000;

export function createTestLogger() {
  const logger = {
    debug: vi.fn<(msg: string) => void>(),
    info: vi.fn<(msg: string) => void>(),
    warn: vi.fn<(msg: string) => void>(),
    error: vi.fn<(msg: string, err?: unknown) => void>(),
    child: (): Logger => logger,
  };
  return logger;
}

export class RecordingNotifier implements Notifier {
  readonly name = "recording";
  sent: NotifyRequest[] = [];
  result: NotifyResult = { ok: true, status: 202 };

  async send(req: NotifyRequest): Promise<NotifyResult> {
    this.sent.push(req);
    return this.result;
  }

  subjects(): string[] {
    return this.sent.map((r) => r.subject);
  }
}

/** Prober whose answer per host is set by the test. Unlisted hosts are reachable. */
export function scriptedProber(reachable: Record<string, boolean>): Prober {
  return async (host) => reachable[host] ?? true;
}

export function createTestMonitor(opts: {
  hosts: string[];
  reachable: Record<string, boolean>;
  probe?: Prober;
  throttleMs?: number;
  clock?: { now: number };
}) {
  const registry = new HostRegistry(opts.hosts);
  const events = new MonitorEventBus();
  const notifier = new RecordingNotifier();
  const log = createTestLogger();
  const clock = opts.clock ?? { now: Date.UTC(2026, 0, 15, 12, 0, 0) };

  const monitor = new HostMonitor(
    {
      probe: { port: 80, timeoutMs: 100, retries: 1 },
      throttleMs: opts.throttleMs ?? 30 * MINUTE,
      recipients: ["ops@example.com"],
      notifyTimeoutMs: 1_000,
      timeZone: "UTC",
    },
    {
      registry,
      events,
      notifier,
      log,
      probe: opts.probe ?? scriptedProber(opts.reachable),
      now: () => clock.now,
    }
  );

  return { registry, events, notifier, log, clock, monitor };
}
