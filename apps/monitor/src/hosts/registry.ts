import { UnknownHostError } from "../errors.js";
import type { HostState } from "./types.js";

/**
 * Owns the mutable state of every monitored host.
 *
 * The host set is fixed at construction. Every mutation is a synchronous
 * read-modify-write on a single entry, so on the event loop it cannot
 * interleave with another mutation of the same host. Reads hand out copies.
 */
export class HostRegistry {
  private states = new Map<string, HostState>();

  constructor(hosts: Iterable<string>) {
    for (const raw of hosts) {
      const host = raw.trim();
      if (!host || this.states.has(host)) continue;
      this.states.set(host, { host, up: true, failCount: 0, lastAlertAt: null });
    }
  }

  get size(): number {
    return this.states.size;
  }

  has(host: string): boolean {
    return this.states.has(host);
  }

  hosts(): string[] {
    return [...this.states.keys()];
  }

  /** Returns a copy of the host's state, or undefined if not registered. */
  get(host: string): HostState | undefined {
    const s = this.states.get(host);
    return s ? { ...s } : undefined;
  }

  /** Per-host consistent copies of every entry, in registration order. */
  snapshot(): HostState[] {
    return [...this.states.values()].map((s) => ({ ...s }));
  }

  /** Marking a host up also clears its failure count. */
  setUp(host: string, up: boolean): void {
    const s = this.entry(host);
    s.up = up;
    if (up) s.failCount = 0;
  }

  incrementFail(host: string): number {
    const s = this.entry(host);
    s.failCount += 1;
    return s.failCount;
  }

  resetFail(host: string): void {
    this.entry(host).failCount = 0;
  }

  recordAlertTime(host: string, now: number): void {
    this.entry(host).lastAlertAt = now;
  }

  /**
   * Applies a compound transition atomically. `fn` receives a copy of the
   * current state and returns the next state plus any value to hand back.
   */
  update<T>(host: string, fn: (current: HostState) => { next: HostState; result: T }): T {
    const s = this.entry(host);
    const { next, result } = fn({ ...s });
    s.up = next.up;
    s.failCount = next.failCount;
    s.lastAlertAt = next.lastAlertAt;
    return result;
  }

  private entry(host: string): HostState {
    const s = this.states.get(host);
    if (!s) throw new UnknownHostError(host);
    return s;
  }
}
