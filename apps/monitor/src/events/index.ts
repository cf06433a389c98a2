import { EventEmitter } from "node:events";
import type { AlertKind } from "../monitor/evaluator.js";

// --- Event Map ---

export interface HostTransitionEvent {
  ts: number;
  host: string;
  from: "up" | "down";
  to: "up" | "down";
  failCount: number;
  alert: AlertKind | null;
  trigger: "probe" | "simulate";
}

export interface CheckFinishedEvent {
  ts: number;
  durationMs: number;
  total: number;
  up: number;
  down: number;
  alerts: number;
  errors: number;
  trigger: "schedule" | "manual";
}

export interface ReportSentEvent {
  ts: number;
  total: number;
  up: number;
  down: number;
  delivered: boolean;
  trigger: "schedule" | "manual";
}

export interface MonitorEventMap {
  "host:transition": HostTransitionEvent;
  "check:finished": CheckFinishedEvent;
  "report:sent": ReportSentEvent;
}

// --- Typed Event Bus ---

export class MonitorEventBus {
  private emitter = new EventEmitter();
  private lastEvents = new Map<keyof MonitorEventMap, MonitorEventMap[keyof MonitorEventMap]>();

  emit<K extends keyof MonitorEventMap>(event: K, payload: MonitorEventMap[K]): void {
    this.lastEvents.set(event, payload);
    this.emitter.emit(event, payload);
  }

  on<K extends keyof MonitorEventMap>(
    event: K,
    listener: (payload: MonitorEventMap[K]) => void
  ): void {
    this.emitter.on(event, listener);
  }

  getLastEvent<K extends keyof MonitorEventMap>(event: K): MonitorEventMap[K] | undefined {
    return this.lastEvents.get(event) as MonitorEventMap[K] | undefined;
  }
}
