/**
 * ZMQ Engine Supervisor Client
 *
 * Talks to a running control server from another process:
 * - REQ/REP for status/stop/tail/health
 * - PUB/SUB for lifecycle events of one supervisor instance
 */

import * as zmq from "zeromq";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import {
  DEFAULT_CONTROL_ADDRESS,
  DEFAULT_EVENT_ADDRESS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  EVENT_TOPIC_PREFIX,
} from "./protocol.js";
import type {
  ControlClientConfig,
  ControlRequest,
  ControlResponse,
  HealthResponse,
  SupervisorEvent,
  SupervisorStatus,
} from "./types.js";
import { parseControlResponse, parseSupervisorEvent } from "./wire-schema.js";

const log = createSubsystemLogger("engine-supervisor/client");

// =============================================================================
// Types
// =============================================================================

export type EventHandler = (event: SupervisorEvent) => void;

export interface SupervisorClient {
  /** Connect to the control server */
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Check if connected and the server answers */
  isHealthy(): Promise<boolean>;
  status(): Promise<SupervisorStatus>;
  /** Stop the engine; waits for the supervisor to reach a resting state */
  stop(timeoutMs?: number): Promise<SupervisorStatus>;
  /** Most recent engine output lines */
  tail(lines?: number): Promise<string[]>;
  health(): Promise<HealthResponse>;
  /** Receive lifecycle events; returns the unsubscribe function */
  subscribe(handler: EventHandler): () => void;
}

export class ControlRequestError extends Error {
  constructor(
    message: string,
    readonly request: ControlRequest["type"],
  ) {
    super(message);
    this.name = "ControlRequestError";
  }
}

function failure(res: ControlResponse, expected: ControlRequest["type"]): ControlRequestError {
  return new ControlRequestError(
    res.success
      ? `Unexpected ${res.type} response to ${expected} request`
      : (res.error ?? `${expected} request failed`),
    expected,
  );
}

// =============================================================================
// Client Implementation
// =============================================================================

export function createSupervisorClient(userConfig?: ControlClientConfig): SupervisorClient {
  const config: Required<ControlClientConfig> = {
    controlAddress: userConfig?.controlAddress ?? DEFAULT_CONTROL_ADDRESS,
    eventAddress: userConfig?.eventAddress ?? DEFAULT_EVENT_ADDRESS,
    instance: userConfig?.instance ?? "default",
    requestTimeoutMs: userConfig?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
  };
  const topic = `${EVENT_TOPIC_PREFIX}${config.instance}`;

  let controlSocket: zmq.Request | null = null;
  let eventSocket: zmq.Subscriber | null = null;
  let eventLoop: Promise<void> | null = null;
  let connected = false;

  const eventHandlers = new Set<EventHandler>();

  // Request queue for serialization
  let requestLock: Promise<void> = Promise.resolve();

  // =============================================================================
  // Event Handling
  // =============================================================================

  async function runEventLoop(socket: zmq.Subscriber): Promise<void> {
    for await (const [topicFrame, msg] of socket) {
      if (topicFrame?.toString() !== topic) {
        continue;
      }
      const parsed = parseSupervisorEvent(msg?.toString() ?? "");
      if (!parsed.ok) {
        log.warn(`Failed to parse event: ${parsed.error}`);
        continue;
      }
      for (const handler of eventHandlers) {
        try {
          handler(parsed.value);
        } catch (err) {
          log.warn(`Event handler error: ${String(err)}`);
        }
      }
    }
  }

  // =============================================================================
  // Request/Response
  // =============================================================================

  function openControlSocket(): zmq.Request {
    const socket = new zmq.Request();
    socket.connect(config.controlAddress);
    return socket;
  }

  async function sendRequest(
    req: ControlRequest,
    timeoutMs: number = config.requestTimeoutMs,
  ): Promise<ControlResponse> {
    // Serialize requests
    const prevLock = requestLock;
    let releaseLock: () => void = () => {};
    requestLock = new Promise((resolve) => {
      releaseLock = resolve;
    });

    let timer: NodeJS.Timeout | undefined;
    try {
      await prevLock;

      const socket = controlSocket;
      if (!socket || !connected) {
        throw new ControlRequestError("Not connected to supervisor", req.type);
      }

      const exchange = (async () => {
        await socket.send(JSON.stringify(req));
        const [msg] = await socket.receive();
        return msg?.toString() ?? "";
      })();
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new ControlRequestError(`Request timeout after ${timeoutMs}ms`, req.type)),
          timeoutMs,
        );
      });

      let raw: string;
      try {
        raw = await Promise.race([exchange, timeout]);
      } catch (err) {
        // A REQ socket that missed its reply cannot send again
        if (controlSocket === socket) {
          socket.close();
          controlSocket = openControlSocket();
        }
        throw err;
      }

      const parsed = parseControlResponse(raw);
      if (!parsed.ok) {
        throw new ControlRequestError(parsed.error, req.type);
      }
      return parsed.value;
    } finally {
      clearTimeout(timer);
      releaseLock();
    }
  }

  async function health(): Promise<HealthResponse> {
    const res = await sendRequest({ type: "health" });
    if (res.type !== "health") {
      throw failure(res, "health");
    }
    return res;
  }

  // =============================================================================
  // Public API
  // =============================================================================

  return {
    async connect() {
      if (connected) {
        return;
      }
      controlSocket = openControlSocket();
      const subscriber = new zmq.Subscriber();
      subscriber.connect(config.eventAddress);
      subscriber.subscribe(topic);
      eventSocket = subscriber;
      connected = true;

      eventLoop = runEventLoop(subscriber).catch((err: unknown) => {
        if (connected) {
          log.warn(`Event loop error: ${String(err)}`);
        } else {
          log.debug(`Event loop ended on disconnect: ${String(err)}`);
        }
      });
      log.info(`Connected to engine supervisor at ${config.controlAddress}`);
    },

    async disconnect() {
      connected = false;
      controlSocket?.close();
      controlSocket = null;
      eventSocket?.close();
      eventSocket = null;
      if (eventLoop) {
        await eventLoop;
        eventLoop = null;
      }
      eventHandlers.clear();
    },

    async isHealthy() {
      try {
        const res = await health();
        return res.success;
      } catch {
        return false;
      }
    },

    async status() {
      const res = await sendRequest({ type: "status" });
      if (res.type !== "status" || !res.success || !res.status) {
        throw failure(res, "status");
      }
      return res.status;
    },

    async stop(timeoutMs?: number) {
      const res = await sendRequest({ type: "stop" }, timeoutMs);
      if (res.type !== "stop" || !res.success || !res.status) {
        throw failure(res, "stop");
      }
      return res.status;
    },

    async tail(lines?: number) {
      const res = await sendRequest({ type: "tail", lines });
      if (res.type !== "tail" || !res.success) {
        throw failure(res, "tail");
      }
      return res.lines;
    },

    health,

    subscribe(handler: EventHandler) {
      eventHandlers.add(handler);
      return () => {
        eventHandlers.delete(handler);
      };
    },
  };
}
