import { Socket, createServer, type Server } from "node:net";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createTcpProber } from "../../apps/monitor/src/probe/tcp.js";
import { createTestLogger } from "./helpers.js";

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") throw new Error("expected a TCP address");
      resolve(address.port);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe("createTcpProber", () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((s) => (s.listening ? close(s) : Promise.resolve())));
    vi.restoreAllMocks();
  });

  it("reports an accepting port as reachable on the first attempt", async () => {
    const server = createServer((socket) => socket.end());
    servers.push(server);
    const port = await listen(server);
    const log = createTestLogger();

    const reachable = await createTcpProber(log)("127.0.0.1", { port, timeoutMs: 1_000, retries: 3 });

    expect(reachable).toBe(true);
    expect(log.debug).not.toHaveBeenCalled();
  });

  it("tries every attempt and resolves false when the port is closed", async () => {
    const server = createServer();
    const port = await listen(server);
    await close(server);
    const log = createTestLogger();

    const reachable = await createTcpProber(log)("127.0.0.1", { port, timeoutMs: 1_000, retries: 3 });

    expect(reachable).toBe(false);
    expect(log.debug).toHaveBeenCalledTimes(3);
    expect(log.debug).toHaveBeenNthCalledWith(1, expect.stringMatching(`^attempt 1/3 failed for 127.0.0.1:${port}: `));
    expect(log.debug).toHaveBeenNthCalledWith(3, expect.stringMatching(`^attempt 3/3 failed for 127.0.0.1:${port}: `));
  });

  it("makes at least one attempt when retries is below one", async () => {
    const server = createServer();
    const port = await listen(server);
    await close(server);
    const log = createTestLogger();

    await expect(createTcpProber(log)("127.0.0.1", { port, timeoutMs: 1_000, retries: 0 })).resolves.toBe(false);
    expect(log.debug).toHaveBeenCalledTimes(1);
  });

  it("folds connect timeouts into false and destroys each socket", async () => {
    vi.spyOn(Socket.prototype, "connect").mockImplementation(function (this: Socket) {
      return this;
    });
    const destroy = vi.spyOn(Socket.prototype, "destroy");
    const log = createTestLogger();

    const reachable = await createTcpProber(log)("192.0.2.1", { port: 80, timeoutMs: 50, retries: 2 });

    expect(reachable).toBe(false);
    expect(destroy).toHaveBeenCalledTimes(2);
    expect(log.debug).toHaveBeenCalledTimes(2);
    expect(log.debug).toHaveBeenNthCalledWith(1, "attempt 1/2 failed for 192.0.2.1:80: timeout");
    expect(log.debug).toHaveBeenNthCalledWith(2, "attempt 2/2 failed for 192.0.2.1:80: timeout");
  });
});
