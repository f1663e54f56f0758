/**
 * Centralized Logging
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport } from "@taskloop/shared/logging";
 *
 * initLogger({
 *   minLevel: "debug",
 *   component: "server",
 *   transports: [new ConsoleTransport({ colors: true })]
 * });
 *
 * log().info("Starting up", { port: 8000 });
 * log().error("Job failed", new Error("oops"), { job: "heartbeat" });
 *
 * const loopLog = log().child({ component: "server.taskloop" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogErrorDetail,
  type LogTransport,
  type LoggerConfig,
  type LoggerContext,
  type ILogger
} from "./types.js";

export {
  Logger,
  initLogger,
  getLogger,
  log
} from "./logger.js";

export {
  ConsoleTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type MemoryTransportOptions
} from "./transports/index.js";
