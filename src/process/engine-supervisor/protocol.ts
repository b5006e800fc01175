/**
 * Engine Supervisor Defaults and Protocol Constants
 */

/** Silence allowed during build/startup before the engine is killed (10 minutes) */
export const DEFAULT_FREEZE_TIMEOUT_MS = 10 * 60 * 1000;

/** Silence allowed while serving under the "output" policy (5 minutes) */
export const DEFAULT_IDLE_THRESHOLD_MS = 5 * 60 * 1000;

/** Overall build phase cap (4 hours) */
export const DEFAULT_BUILD_TIMEOUT_MS = 4 * 60 * 60 * 1000;

/** Overall startup phase cap (30 minutes) */
export const DEFAULT_STARTUP_TIMEOUT_MS = 30 * 60 * 1000;

/** Freeze check period */
export const DEFAULT_CHECK_INTERVAL_MS = 1000;

/** SIGTERM to SIGKILL escalation on stop */
export const DEFAULT_STOP_GRACE_PERIOD_MS = 10 * 1000;

/** Relaunch attempts after a serve-phase bind failure on a dynamic port */
export const DEFAULT_MAX_PORT_RETRIES = 3;

/** Recent output lines kept for diagnostics */
export const DEFAULT_TAIL_LINES = 50;

/** Recent output bytes kept for diagnostics */
export const DEFAULT_TAIL_MAX_BYTES = 64 * 1024;

/** Host the allocator and health probe bind/connect to */
export const DEFAULT_PORT_HOST = "127.0.0.1";

/** TCP connect timeout of the serve-phase health probe */
export const DEFAULT_PROBE_TIMEOUT_MS = 2000;

/** Per-graph preparation manifest */
export const MANIFEST_FILENAME = "engine-manifest.json";

export const MANIFEST_VERSION = 1;

/** Default control plane REP socket address */
export const DEFAULT_CONTROL_ADDRESS = "tcp://127.0.0.1:18890";

/** Default event plane PUB socket address */
export const DEFAULT_EVENT_ADDRESS = "tcp://127.0.0.1:18891";

/** Default control plane request timeout in ms */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10 * 1000;

/** Event topic prefix for PUB/SUB */
export const EVENT_TOPIC_PREFIX = "engine:";

/** Protocol version */
export const PROTOCOL_VERSION = 1;
