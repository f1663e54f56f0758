/**
 * Logging Types
 *
 * Shared between the server and any embedding host.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogErrorDetail {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Dotted component path, e.g. "server.taskloop" */
  component: string;
  message: string;
  /** Structured payload, already redacted */
  data?: Record<string, unknown>;
  error?: LogErrorDetail;
  correlationId?: string;
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  /** Entries below this level are not handed to the transport */
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  /** Flush buffered output (graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  minLevel: LogLevel;
  component: string;
  transports: LogTransport[];
  /** Keys matching any of these are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
  correlationId?: string;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface LoggerContext {
  component?: string;
  correlationId?: string;
}

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a child logger sharing transports, with extra context */
  child(context: LoggerContext): ILogger;

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /credential/i,
];
