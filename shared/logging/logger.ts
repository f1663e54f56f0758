/**
 * Core Logger Implementation
 *
 * Structured logging fanned out to pluggable transports.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogEntry,
  type LogErrorDetail,
  type LoggerConfig,
  type LoggerContext,
  type ILogger
} from "./types.js";

function describeError(error: unknown): LogErrorDetail {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return {
    name: "Unknown",
    message: String(error)
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    && !(value instanceof Error) && !(value instanceof Date);
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message
    };

    if (this.config.correlationId) {
      entry.correlationId = this.config.correlationId;
    }
    if (data) {
      entry.data = this.redact(data);
    }
    if (error !== undefined) {
      entry.error = describeError(error);
    }

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // Can't log through ourselves here
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (value instanceof Error) {
        result[key] = describeError(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context
  // ----------------------------------------

  child(context: LoggerContext): Logger {
    return new Logger({
      ...this.config,
      component: context.component ?? this.config.component,
      correlationId: context.correlationId ?? this.config.correlationId
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(
      this.config.transports.map(t => t.flush ? t.flush() : Promise.resolve())
    );
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(
      this.config.transports.map(t => t.close ? t.close() : Promise.resolve())
    );
  }
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function log(): Logger {
  return getLogger();
}
