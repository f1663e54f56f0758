/**
 * Logging Setup for the Server
 *
 * Initializes the centralized logging system with console output and an
 * in-memory buffer served by the host's log route.
 */

import {
  initLogger,
  Logger,
  ConsoleTransport,
  MemoryTransport,
  type ILogger,
  type LogEntry,
  type LogLevel,
  type LogTransport
} from "@taskloop/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
  /** Entries kept for /api/logs (default: 2000) */
  bufferSize?: number;
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;
let recent: MemoryTransport | null = null;

/**
 * Initialize the logging system for the server.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel ?? (isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: isDev
    }));
  }

  recent = new MemoryTransport({ minLevel, capacity: options.bufferSize ?? 2000 });
  transports.push(recent);

  logger = initLogger({
    minLevel,
    component: "server",
    transports
  });

  return logger;
}

/**
 * Get the server logger instance. Auto-initializes if not already done.
 */
export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

/**
 * Recent entries from the in-memory buffer, oldest first.
 */
export function getRecentLogs(limit = 100): LogEntry[] {
  getServerLogger();
  return recent ? recent.getEntries(limit) : [];
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return getServerLogger().child({ component: `server.${component}` });
}
