import net from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { PortUnavailableError } from "./errors.js";
import { createPortAllocator, isPortAvailable, isValidPort, probePort } from "./port-allocator.js";

function listen(port = 0): Promise<net.Server> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once("error", reject);
    server.listen({ host: "127.0.0.1", port }, () => resolve(server));
  });
}

function portOf(server: net.Server): number {
  const address = server.address();
  if (typeof address !== "object" || address === null) {
    throw new Error("server is not listening on a TCP port");
  }
  return address.port;
}

describe("port allocator", () => {
  const servers: net.Server[] = [];

  afterEach(async () => {
    await Promise.all(
      servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve()))),
    );
  });

  it("should hand out a free ephemeral port", async () => {
    const port = await createPortAllocator().allocate();

    expect(isValidPort(port)).toBe(true);
    expect(await isPortAvailable(port)).toBe(true);
  });

  it("should accept a free preferred port", async () => {
    const server = await listen();
    const port = portOf(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));

    expect(await createPortAllocator().allocate(port)).toBe(port);
  });

  it("should refuse a preferred port that is taken", async () => {
    const server = await listen();
    servers.push(server);
    const port = portOf(server);

    const error = await createPortAllocator()
      .allocate(port)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PortUnavailableError);
    expect(error instanceof PortUnavailableError && error.port).toBe(port);
  });

  it("should refuse a port outside the valid range", async () => {
    await expect(createPortAllocator().allocate(70000)).rejects.toThrow("Port 70000 is outside 1-65535");
  });

  it("should skip taken ports when scanning a range", async () => {
    const server = await listen();
    servers.push(server);
    const taken = portOf(server);
    const allocator = createPortAllocator({ range: { from: taken, to: taken } });

    await expect(allocator.allocate()).rejects.toThrow(
      `No available port found on 127.0.0.1 in range ${taken}-${taken}`,
    );
  });

  it("should return distinct ports that exclude the given ones", async () => {
    const allocator = createPortAllocator();
    const main = await allocator.allocate();

    const extra = await allocator.allocateMany(2, [main]);

    expect(extra).toHaveLength(2);
    expect(new Set([main, ...extra]).size).toBe(3);
  });

  it("should reject an inverted range", () => {
    expect(() => createPortAllocator({ range: { from: 9000, to: 8000 } })).toThrow(RangeError);
  });
});

describe("port probe", () => {
  it("should succeed against a listening port and fail once it is closed", async () => {
    const server = await listen();
    const port = portOf(server);

    expect(await probePort(port)).toBe(true);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    expect(await probePort(port)).toBe(false);
  });
});
