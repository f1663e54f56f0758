/**
 * Host: HTTP App & Lifecycle
 *
 * Builds the Hono app and ties the TaskLoop to the server's startup and
 * shutdown. The host only starts and stops the loop; request handlers reach
 * it through their own reference to the instance.
 */

import { Hono } from "hono";
import { createComponentLogger, getRecentLogs } from "#logging.js";
import type { TaskLoop } from "../taskloop/index.js";

export const SERVICE_NAME = "TaskLoop Server";
export const SERVICE_VERSION = "0.1.0";

export interface HostOptions {
  taskLoop?: TaskLoop;
  /** Called after the built-in routes are mounted */
  onSetup?: (app: Hono) => void;
}

export interface Host {
  app: Hono;
  /** Startup hook: starts the TaskLoop */
  startup(): void;
  /** Shutdown hook: stops the TaskLoop */
  shutdown(): Promise<void>;
}

function parseLimit(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : null;
}

export function createHost(options: HostOptions = {}): Host {
  const { taskLoop, onSetup } = options;
  const log = createComponentLogger("host");
  const app = new Hono();

  // Health check
  app.get("/", (c) => c.json({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: "running"
  }));

  app.get("/api/taskloop", (c) => {
    if (!taskLoop) {
      return c.json({ error: "No TaskLoop configured" }, 404);
    }
    return c.json(taskLoop.getStats());
  });

  app.get("/api/logs", (c) => {
    const limit = parseLimit(c.req.query("limit"), 100);
    if (limit === null) {
      return c.json({ error: "limit must be a positive integer" }, 400);
    }
    return c.json(getRecentLogs(limit));
  });

  onSetup?.(app);

  return {
    app,
    startup() {
      if (!taskLoop) return;
      log.info("Starting TaskLoop");
      taskLoop.start();
    },
    async shutdown() {
      if (!taskLoop) return;
      log.info("Stopping TaskLoop");
      await taskLoop.stop();
    },
  };
}
