/**
 * ZMQ Engine Supervisor Control Server
 *
 * Exposes one EngineSupervisor to other processes:
 * - Control plane: REQ/REP for status/stop/tail/health
 * - Event plane: PUB/SUB for state changes, engine output and port mismatches
 */

import * as zmq from "zeromq";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import {
  DEFAULT_CONTROL_ADDRESS,
  DEFAULT_EVENT_ADDRESS,
  EVENT_TOPIC_PREFIX,
  PROTOCOL_VERSION,
} from "./protocol.js";
import type { EngineSupervisor } from "./supervisor.js";
import type {
  ControlRequest,
  ControlResponse,
  ControlServerConfig,
  HealthResponse,
  StatusResponse,
  StopResponse,
  SupervisorEvent,
  TailResponse,
} from "./types.js";
import { parseControlRequest } from "./wire-schema.js";

const log = createSubsystemLogger("engine-supervisor/server");

export type ControlServer = {
  readonly controlAddress: string;
  readonly eventAddress: string;
  stop: () => Promise<void>;
};

export async function startControlServer(
  supervisor: EngineSupervisor,
  userConfig?: ControlServerConfig,
): Promise<ControlServer> {
  const config: Required<ControlServerConfig> = {
    controlAddress: userConfig?.controlAddress ?? DEFAULT_CONTROL_ADDRESS,
    eventAddress: userConfig?.eventAddress ?? DEFAULT_EVENT_ADDRESS,
    instance: userConfig?.instance ?? "default",
  };
  const startedAtMs = Date.now();
  const topic = `${EVENT_TOPIC_PREFIX}${config.instance}`;

  // =============================================================================
  // Sockets
  // =============================================================================

  let controlSocket: zmq.Reply | null = new zmq.Reply();
  let eventSocket: zmq.Publisher | null = new zmq.Publisher();
  let eventPublishQueue: Promise<void> = Promise.resolve();

  try {
    await controlSocket.bind(config.controlAddress);
    await eventSocket.bind(config.eventAddress);
  } catch (err) {
    controlSocket.close();
    eventSocket.close();
    throw err;
  }

  // =============================================================================
  // Event Publishing
  // =============================================================================

  function publishEvent(event: SupervisorEvent): Promise<void> {
    // Serialize event publishing to avoid "Socket is busy writing" error
    eventPublishQueue = eventPublishQueue.then(async () => {
      if (!eventSocket) {
        return;
      }
      try {
        await eventSocket.send([topic, JSON.stringify(event)]);
      } catch (err) {
        log.error(`Failed to publish event: ${String(err)}`);
      }
    });
    return eventPublishQueue;
  }

  const unsubscribe = supervisor.onEvent((event) => {
    void publishEvent(event);
  });

  // =============================================================================
  // Request Handlers
  // =============================================================================

  function handleStatus(): StatusResponse {
    return { type: "status", success: true, status: supervisor.status() };
  }

  async function handleStop(): Promise<StopResponse> {
    try {
      const status = await supervisor.stop();
      return { type: "stop", success: true, status };
    } catch (err) {
      return { type: "stop", success: false, error: String(err) };
    }
  }

  function handleTail(req: ControlRequest & { type: "tail" }): TailResponse {
    return { type: "tail", success: true, lines: supervisor.recentOutput(req.lines) };
  }

  function handleHealth(): HealthResponse {
    const memUsage = process.memoryUsage();
    return {
      type: "health",
      success: true,
      uptime: Date.now() - startedAtMs,
      state: supervisor.currentState,
      memoryUsageMB: Math.round(memUsage.heapUsed / 1024 / 1024),
    };
  }

  async function handleRequest(req: ControlRequest): Promise<ControlResponse> {
    switch (req.type) {
      case "status":
        return handleStatus();
      case "stop":
        return await handleStop();
      case "tail":
        return handleTail(req);
      case "health":
        return handleHealth();
    }
  }

  // =============================================================================
  // Main Loop
  // =============================================================================

  async function runControlLoop(socket: zmq.Reply): Promise<void> {
    log.info(`Control plane listening on ${config.controlAddress}`);

    for await (const [msg] of socket) {
      let res: ControlResponse;
      const parsed = parseControlRequest(msg?.toString() ?? "");
      if (!parsed.ok) {
        log.warn(parsed.error);
        res = { type: "status", success: false, error: parsed.error };
      } else {
        try {
          res = await handleRequest(parsed.value);
        } catch (err) {
          log.error(`Error handling ${parsed.value.type} request: ${String(err)}`);
          res = { type: "status", success: false, error: String(err) };
        }
      }
      await socket.send(JSON.stringify(res));
    }
  }

  const controlLoop = runControlLoop(controlSocket).catch((err: unknown) => {
    if (controlSocket) {
      log.error(`Control loop failed: ${String(err)}`);
    } else {
      log.debug(`Control loop ended on close: ${String(err)}`);
    }
  });

  log.info(`Engine supervisor control server started (protocol v${PROTOCOL_VERSION})`);
  log.info(`Control: ${config.controlAddress}`);
  log.info(`Events: ${config.eventAddress} (topic ${topic})`);

  return {
    controlAddress: config.controlAddress,
    eventAddress: config.eventAddress,
    stop: async () => {
      unsubscribe();
      await eventPublishQueue;

      const control = controlSocket;
      const events = eventSocket;
      controlSocket = null;
      eventSocket = null;
      control?.close();
      events?.close();
      await controlLoop;

      log.info("Engine supervisor control server stopped");
    },
  };
}
