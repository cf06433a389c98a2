import { Socket } from "node:net";
import type { Logger } from "../logger.js";

export interface ProbeOptions {
  port: number;
  timeoutMs: number;
  retries: number;
}

export type Prober = (host: string, opts: ProbeOptions) => Promise<boolean>;

interface AttemptResult {
  ok: boolean;
  error: string | null;
}

function connectOnce(host: string, port: number, timeoutMs: number): Promise<AttemptResult> {
  return new Promise((resolve) => {
    const socket = new Socket();
    let settled = false;

    const finish = (result: AttemptResult) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish({ ok: true, error: null }));
    socket.once("timeout", () => finish({ ok: false, error: "timeout" }));
    socket.once("error", (err) => finish({ ok: false, error: err.message }));

    socket.connect({ host, port });
  });
}

/**
 * TCP connect probe. Tries up to `retries` sequential connections, each with
 * its own timeout, and resolves true on the first that is established.
 * Never rejects: DNS errors, refusals and timeouts all resolve false.
 */
export function createTcpProber(log?: Logger): Prober {
  return async (host, { port, timeoutMs, retries }) => {
    const attempts = Math.max(1, retries);

    for (let i = 0; i < attempts; i++) {
      const { ok, error } = await connectOnce(host, port, timeoutMs);
      if (ok) return true;
      log?.debug(`attempt ${i + 1}/${attempts} failed for ${host}:${port}: ${error}`);
    }

    return false;
  };
}
