import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as zmq from "zeromq";
import { createSupervisorClient, type SupervisorClient } from "./client.js";
import { createTemplateProfile } from "./profiles.js";
import { startControlServer, type ControlServer } from "./server.js";
import { EngineSupervisor } from "./supervisor.js";
import type { SupervisorEvent } from "./types.js";
import { parseControlResponse } from "./wire-schema.js";

let addressCounter = 0;

describe("engine supervisor control plane", () => {
  let supervisor: EngineSupervisor;
  let server: ControlServer | null = null;
  let client: SupervisorClient | null = null;
  let controlAddress: string;
  let eventAddress: string;

  beforeEach(async () => {
    addressCounter++;
    controlAddress = `inproc://engine-control-${addressCounter}`;
    eventAddress = `inproc://engine-events-${addressCounter}`;

    supervisor = new EngineSupervisor({
      graphDirectory: "/tmp/engine-supervisor-control-test",
      graphName: "control-test",
      profile: createTemplateProfile({ buildArgs: [], serveArgs: [] }),
      launcher: {
        async launch() {
          throw new Error("launch is not expected in control plane tests");
        },
      },
    });
    server = await startControlServer(supervisor, {
      controlAddress,
      eventAddress,
      instance: "test",
    });

    client = createSupervisorClient({
      controlAddress,
      eventAddress,
      instance: "test",
      requestTimeoutMs: 2000,
    });
    await client.connect();
  });

  afterEach(async () => {
    if (client) {
      await client.disconnect();
      client = null;
    }
    if (server) {
      await server.stop();
      server = null;
    }
    await supervisor.stop();
  });

  it("should report health", async () => {
    const health = await client!.health();

    expect(health.success).toBe(true);
    expect(health.state).toBe("idle");
    expect(typeof health.uptime).toBe("number");
    expect(await client!.isHealthy()).toBe(true);
  });

  it("should report the supervisor status", async () => {
    const status = await client!.status();

    expect(status.state).toBe("idle");
    expect(status.port).toBeUndefined();
  });

  it("should return an empty tail before any engine ran", async () => {
    expect(await client!.tail(10)).toEqual([]);
  });

  it("should stop the supervisor and publish the state change", async () => {
    const events: SupervisorEvent[] = [];
    client!.subscribe((event) => events.push(event));
    // Let the subscription reach the publisher
    await new Promise((r) => setTimeout(r, 100));

    const status = await client!.stop();
    await new Promise((r) => setTimeout(r, 100));

    expect(status.state).toBe("stopped");
    expect(supervisor.currentState).toBe("stopped");
    expect(events).toEqual([
      expect.objectContaining({ kind: "supervisor.state", from: "idle", to: "stopped" }),
    ]);
  });

  it("should answer a malformed request with an error", async () => {
    const socket = new zmq.Request();
    socket.connect(controlAddress);
    try {
      await socket.send("not json");
      const [msg] = await socket.receive();
      const parsed = parseControlResponse(msg?.toString() ?? "");

      expect(parsed.ok).toBe(true);
      const res = parsed.ok ? parsed.value : null;
      expect(res?.type).toBe("status");
      expect(res?.success).toBe(false);
      expect(res?.error?.startsWith("Malformed request")).toBe(true);
    } finally {
      socket.close();
    }
  });

  it("should fail requests after disconnecting", async () => {
    await client!.disconnect();

    await expect(client!.status()).rejects.toThrow("Not connected to supervisor");
  });
});
