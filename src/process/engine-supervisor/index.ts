/**
 * Engine Supervisor Module
 *
 * Lifecycle supervision of an external journey-planning engine, plus the
 * ZeroMQ control plane that exposes a running supervisor to other processes.
 */

// Types
export type {
  ActivityState,
  BoundingBox,
  ControlClientConfig,
  ControlRequest,
  ControlResponse,
  ControlServerConfig,
  EngineErrorCategory,
  EngineExit,
  EngineLauncher,
  EngineProcess,
  FailureInfo,
  FailureReason,
  GraphInputs,
  HealthResponse,
  LaunchRequest,
  MonitorEvent,
  Phase,
  PortMismatch,
  ServeLivenessPolicy,
  StatusResponse,
  StopResponse,
  SupervisorEvent,
  SupervisorListener,
  SupervisorState,
  SupervisorStatus,
  SupervisorTimeouts,
  TailResponse,
} from "./types.js";

// Protocol constants
export {
  DEFAULT_BUILD_TIMEOUT_MS,
  DEFAULT_CHECK_INTERVAL_MS,
  DEFAULT_CONTROL_ADDRESS,
  DEFAULT_EVENT_ADDRESS,
  DEFAULT_FREEZE_TIMEOUT_MS,
  DEFAULT_IDLE_THRESHOLD_MS,
  DEFAULT_MAX_PORT_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_STARTUP_TIMEOUT_MS,
  DEFAULT_STOP_GRACE_PERIOD_MS,
  EVENT_TOPIC_PREFIX,
  PROTOCOL_VERSION,
} from "./protocol.js";

// Errors
export {
  EngineError,
  FetchError,
  FreezeTimeoutError,
  LaunchError,
  PhaseTimeoutError,
  PortUnavailableError,
  SupervisorError,
  SupervisorStateError,
  UnexpectedExitError,
  type LaunchErrorCode,
  type SupervisorErrorKind,
} from "./errors.js";

// Supervisor
export {
  EngineSupervisor,
  canTransition,
  resolveTimeouts,
  type EngineSupervisorOptions,
  type HealthProbe,
} from "./supervisor.js";
export { createEngineSupervisor, graphDirectoryFor } from "./factory.js";

// Collaborators
export {
  GENERIC_MARKERS,
  GRAPHHOPPER_PROFILE,
  OTP_PROFILE,
  classifyLine,
  createGraphHopperProfile,
  createTemplateProfile,
  resolveProfile,
  type EngineKind,
  type EngineProfile,
  type GraphHopperOptions,
  type MarkerRule,
} from "./profiles.js";
export { createProcessLauncher, type ProcessLauncherConfig } from "./launcher.js";
export { createPortAllocator, isPortAvailable, probePort, type PortAllocator } from "./port-allocator.js";
export { loadGraphManifest, sanitizeGraphName, type GraphManifest } from "./graph-manifest.js";
export { runCleanup } from "./cleanup.js";

// Client
export { ControlRequestError, createSupervisorClient, type EventHandler, type SupervisorClient } from "./client.js";

// Server
export { startControlServer, type ControlServer } from "./server.js";
