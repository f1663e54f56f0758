/**
 * Server Configuration
 *
 * Environment variables for the HTTP host, logging and the TaskLoop.
 * Importable by any module that needs config without pulling in the server.
 */

import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@taskloop/shared/logging";
import { DEFAULT_TASKLOOP_CONFIG, type TaskLoopConfig } from "./taskloop/types.js";
import { TaskLoopError } from "./taskloop/errors.js";

// Load .env from project root (ESM compatible)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, "../../.env") });

type Env = Record<string, string | undefined>;

// ============================================
// PARSING
// ============================================

function readNonNegativeInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new TaskLoopError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * TaskLoop settings from the environment, falling back to DEFAULT_TASKLOOP_CONFIG.
 */
export function loadTaskLoopConfig(env: Env = process.env): TaskLoopConfig {
  return {
    stopTimeoutMs: readNonNegativeInt(env, "TASKLOOP_STOP_TIMEOUT_MS", DEFAULT_TASKLOOP_CONFIG.stopTimeoutMs),
    drainTimeoutMs: readNonNegativeInt(env, "TASKLOOP_DRAIN_TIMEOUT_MS", DEFAULT_TASKLOOP_CONFIG.drainTimeoutMs),
  };
}

export function loadLogLevel(env: Env = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return env.NODE_ENV === "production" ? "info" : "debug";
  if (!isLogLevel(raw)) {
    throw new TaskLoopError(`LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, silent, got "${raw}"`);
  }
  return raw;
}

// ============================================
// NETWORK
// ============================================

export const PORT = readNonNegativeInt(process.env, "PORT", 8000);
export const HOST = process.env.HOST || "0.0.0.0";
