/**
 * channel-scout
 *
 * Resolves a geography of regions, localities and categories into verified
 * regional channels:
 * - Runs research waves per (locality, category) slot
 * - Escalates the strategy after failed waves, up to a wave cap
 * - Paces every outbound call through one rate limiter
 * - Reports progress to observers and over WebSocket
 */

// CLI
export { runScoutCli, buildScoutProgram } from "./cli/main.js";
export { createEngine, type Engine } from "./cli/commands/run.js";

// Orchestrator
export * from "./orchestrator/index.js";

// Capabilities
export * from "./capabilities/index.js";

// Oracle
export { askOracle, createOracle, type Oracle, type OracleCall, type OracleKind } from "./oracle/oracle.js";

// Rate limiter
export {
  RateLimiter,
  RateLimiterClosedError,
  AcquireAbortedError,
  createRateLimiter,
  type Permit,
  type RateLimiterOptions,
} from "./limiter/rate-limiter.js";

// Progress
export {
  ProgressReporter,
  createLogObserver,
  type ProgressEvent,
  type ProgressEventType,
  type ProgressObserver,
} from "./progress/reporter.js";
export { ProgressServer, type ProgressServerOptions } from "./progress/server.js";

// Config
export { loadConfig, parseConfig, saveConfig, getConfigPath, getOutputDir } from "./config/loader.js";
export { buildGeography, loadGeography, orderRegions, type Geography } from "./config/geography.js";
export type { BudgetConfig, ExportConfig, ScoutConfig } from "./config/types.js";

// Errors
export { FatalRunError, ConfigError, GeographyError, isFatalRunError } from "./runtime/errors.js";

// Runtime types
export type { RunContext, RunId } from "./runtime/context.js";
export { createLogger, type ScoutLogger } from "./runtime/logger.js";
export { CsvExporter } from "./runtime/csv-export.js";
