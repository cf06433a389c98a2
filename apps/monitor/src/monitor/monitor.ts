import type { ProbeSettings } from "../config/types.js";
import type { MonitorEventBus } from "../events/index.js";
import type { HostRegistry } from "../hosts/registry.js";
import { statusOf } from "../hosts/types.js";
import type { Logger } from "../logger.js";
import { dispatch } from "../notify/dispatch.js";
import {
  countStates,
  renderCriticalAlert,
  renderRecoveryAlert,
  renderSummary,
} from "../notify/render.js";
import type { Message, Notifier } from "../notify/types.js";
import type { Prober } from "../probe/tcp.js";
import { evaluate, type AlertKind, type Evaluation } from "./evaluator.js";

export type Trigger = "schedule" | "manual";

export interface HostMonitorSettings {
  probe: ProbeSettings;
  throttleMs: number;
  recipients: string[];
  notifyTimeoutMs: number;
  timeZone?: string;
}

export interface HostMonitorDeps {
  registry: HostRegistry;
  probe: Prober;
  notifier: Notifier;
  events: MonitorEventBus;
  log: Logger;
  now?: () => number;
}

export interface HostCheckOutcome {
  host: string;
  reachable: boolean;
  up: boolean;
  failCount: number;
  alert: AlertKind | null;
  delivered: boolean | null;
}

export interface CheckSummary {
  startedAt: number;
  durationMs: number;
  results: HostCheckOutcome[];
  errors: { host: string; error: string }[];
}

export interface ReportSummary {
  ts: number;
  total: number;
  up: number;
  down: number;
  delivered: boolean;
}

/**
 * Runs check cycles, report cycles and the simulate-down override against
 * an owned HostRegistry. Hosts are processed independently: a failure in one
 * never stops the others.
 */
export class HostMonitor {
  private registry: HostRegistry;
  private probe: Prober;
  private notifier: Notifier;
  private events: MonitorEventBus;
  private log: Logger;
  private now: () => number;

  constructor(
    private settings: HostMonitorSettings,
    deps: HostMonitorDeps
  ) {
    this.registry = deps.registry;
    this.probe = deps.probe;
    this.notifier = deps.notifier;
    this.events = deps.events;
    this.log = deps.log;
    this.now = deps.now ?? (() => Date.now());
  }

  async checkHosts(trigger: Trigger = "schedule"): Promise<CheckSummary> {
    const startedAt = this.now();
    const hosts = this.registry.hosts();
    this.log.info(`checking ${hosts.length} host(s) via TCP port ${this.settings.probe.port}`);

    const settled = await Promise.allSettled(hosts.map((h) => this.checkHost(h)));

    const results: HostCheckOutcome[] = [];
    const errors: CheckSummary["errors"] = [];

    settled.forEach((s, i) => {
      if (s.status === "fulfilled") {
        results.push(s.value);
      } else {
        const error = s.reason instanceof Error ? s.reason.message : String(s.reason);
        errors.push({ host: hosts[i], error });
        this.log.error(`check failed for ${hosts[i]}`, s.reason);
      }
    });

    const durationMs = this.now() - startedAt;
    const counts = countStates(this.registry.snapshot());

    this.events.emit("check:finished", {
      ts: this.now(),
      durationMs,
      ...counts,
      alerts: results.filter((r) => r.alert !== null).length,
      errors: errors.length,
      trigger,
    });
    this.log.info(`check finished in ${durationMs}ms: ${counts.up} up, ${counts.down} down`);

    return { startedAt, durationMs, results, errors };
  }

  async checkHost(host: string): Promise<HostCheckOutcome> {
    const reachable = await this.probe(host, this.settings.probe);
    const now = this.now();

    const { evaluation, wasUp } = this.registry.update(host, (current) => {
      const e = evaluate(current, reachable, this.settings.throttleMs, now);
      return { next: e.next, result: { evaluation: e, wasUp: current.up } };
    });

    this.logTransition(host, wasUp, evaluation);

    if (wasUp !== evaluation.next.up) {
      this.events.emit("host:transition", {
        ts: now,
        host,
        from: wasUp ? "up" : "down",
        to: statusOf(evaluation.next),
        failCount: evaluation.failCount,
        alert: evaluation.alert,
        trigger: "probe",
      });
    }

    let delivered: boolean | null = null;
    if (evaluation.alert) {
      const message =
        evaluation.alert === "critical"
          ? renderCriticalAlert(host, evaluation.failCount, now, this.settings.timeZone)
          : renderRecoveryAlert(host, evaluation.failCount, now, this.settings.timeZone);
      delivered = await this.send(message);
    }

    return {
      host,
      reachable,
      up: evaluation.next.up,
      failCount: evaluation.next.failCount,
      alert: evaluation.alert,
      delivered,
    };
  }

  /**
   * Dispatches the summary, then resets every host's failure count.
   * The reset happens whether or not delivery succeeded; `up` is untouched.
   */
  async sendReport(trigger: Trigger = "schedule"): Promise<ReportSummary> {
    this.log.info("generating status report");

    const ts = this.now();
    const states = this.registry.snapshot();
    const counts = countStates(states);
    const delivered = await this.send(renderSummary(states, ts, this.settings.timeZone));

    for (const host of this.registry.hosts()) {
      this.registry.resetFail(host);
    }

    this.events.emit("report:sent", { ts, ...counts, delivered, trigger });
    return { ts, ...counts, delivered };
  }

  /**
   * Forces a host to DOWN and always sends a CRITICAL alert, bypassing the
   * throttle. Returns false (and logs) when the host is not registered.
   */
  async simulateDown(host: string): Promise<boolean> {
    if (!this.registry.has(host)) {
      this.log.warn(`cannot simulate down status: host not found: ${host}`);
      return false;
    }

    const now = this.now();
    const previous = this.registry.update(host, (current) => ({
      next: { ...current, up: false, lastAlertAt: now },
      result: current,
    }));

    if (previous.up) {
      this.events.emit("host:transition", {
        ts: now,
        host,
        from: "up",
        to: "down",
        failCount: previous.failCount,
        alert: "critical",
        trigger: "simulate",
      });
    }

    this.log.info(`simulated down status for host: ${host}`);
    await this.send(renderCriticalAlert(host, previous.failCount, now, this.settings.timeZone));
    return true;
  }

  private send(message: Message): Promise<boolean> {
    return dispatch(this.notifier, message, {
      recipients: this.settings.recipients,
      timeoutMs: this.settings.notifyTimeoutMs,
      log: this.log,
    });
  }

  private logTransition(host: string, wasUp: boolean, e: Evaluation): void {
    if (wasUp && !e.next.up) {
      this.log.warn(`host ${host} is DOWN`);
      if (!e.alert) this.log.info(`alert for ${host} throttled`);
    } else if (!wasUp && e.next.up) {
      this.log.info(`host ${host} recovered after ${e.failCount} failure(s)`);
    } else if (!e.next.up) {
      this.log.warn(`host ${host} still DOWN, failure count: ${e.failCount}`);
    } else {
      this.log.debug(`host ${host} is up`);
    }
  }
}
