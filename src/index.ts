export * from "./process/engine-supervisor/index.js";
export { ConfigError, loadConfig, type LoadConfigOptions } from "./config/load.js";
export {
  supervisorConfigSchema,
  type SupervisorConfig,
  type SupervisorConfigInput,
} from "./config/schema.js";
export {
  createHttpDataFetcher,
  planDownloads,
  type DownloadPlan,
  type HttpDataFetcherOptions,
} from "./fetch/http-fetcher.js";
export type { DataFetcher } from "./fetch/types.js";
export { createSubsystemLogger, setLogFile, setLogLevel, type LogLevel } from "./logging/subsystem.js";
