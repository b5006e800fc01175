/**
 * Port Allocator
 *
 * Verifies a fixed port or picks a free one before the serve phase. A picked
 * port is released again before the engine binds it, so another process can
 * take it in between; the supervisor retries the serve launch on a bind
 * failure for that reason.
 */

import net from "node:net";
import { PortUnavailableError } from "./errors.js";
import { DEFAULT_PORT_HOST, DEFAULT_PROBE_TIMEOUT_MS } from "./protocol.js";

export type PortRange = { from: number; to: number };

export interface PortAllocator {
  allocate(preferred?: number): Promise<number>;
  /** Distinct free ports, never including `exclude` */
  allocateMany(count: number, exclude?: readonly number[]): Promise<number[]>;
}

export type PortAllocatorConfig = {
  host?: string;
  /** Scan this range instead of asking the OS for an ephemeral port */
  range?: PortRange;
};

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function listenOnce(host: string, port: number): Promise<number | null> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.unref();
    server.once("error", () => resolve(null));
    server.listen({ host, port, exclusive: true }, () => {
      const address = server.address();
      const bound = typeof address === "object" && address !== null ? address.port : null;
      server.close(() => resolve(bound));
    });
  });
}

export async function isPortAvailable(
  port: number,
  host: string = DEFAULT_PORT_HOST,
): Promise<boolean> {
  return (await listenOnce(host, port)) !== null;
}

export async function ephemeralPort(host: string = DEFAULT_PORT_HOST): Promise<number> {
  const port = await listenOnce(host, 0);
  if (port === null) {
    throw new PortUnavailableError(null, `Could not obtain an ephemeral port on ${host}`);
  }
  return port;
}

export function createPortAllocator(config: PortAllocatorConfig = {}): PortAllocator {
  const host = config.host ?? DEFAULT_PORT_HOST;
  const range = config.range;

  if (range && (!isValidPort(range.from) || !isValidPort(range.to) || range.from > range.to)) {
    throw new RangeError(`Invalid port range ${range.from}-${range.to}`);
  }

  async function pickFree(exclude: ReadonlySet<number>): Promise<number> {
    if (!range) {
      for (let attempt = 0; attempt < 10; attempt++) {
        const port = await ephemeralPort(host);
        if (!exclude.has(port)) {
          return port;
        }
      }
      throw new PortUnavailableError(null, `Could not obtain a distinct ephemeral port on ${host}`);
    }

    for (let port = range.from; port <= range.to; port++) {
      if (exclude.has(port)) {
        continue;
      }
      if (await isPortAvailable(port, host)) {
        return port;
      }
    }
    throw new PortUnavailableError(
      null,
      `No available port found on ${host} in range ${range.from}-${range.to}`,
    );
  }

  return {
    async allocate(preferred?: number) {
      if (preferred === undefined) {
        return await pickFree(new Set());
      }
      if (!isValidPort(preferred)) {
        throw new PortUnavailableError(preferred, `Port ${preferred} is outside 1-65535`);
      }
      if (!(await isPortAvailable(preferred, host))) {
        throw new PortUnavailableError(preferred);
      }
      return preferred;
    },

    async allocateMany(count: number, exclude: readonly number[] = []) {
      const taken = new Set(exclude);
      const ports: number[] = [];
      for (let i = 0; i < count; i++) {
        const port = await pickFree(taken);
        taken.add(port);
        ports.push(port);
      }
      return ports;
    },
  };
}

/**
 * TCP connect check used as the serve-phase health signal.
 */
export function probePort(
  port: number,
  host: string = DEFAULT_PORT_HOST,
  timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS,
): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (ok: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}
