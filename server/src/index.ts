/**
 * TaskLoop Server - Main Entry Point
 *
 * Starts the HTTP API with a TaskLoop running beside it.
 */

import { HOST, PORT, loadLogLevel, loadTaskLoopConfig } from "./config.js";
import { initServerLogging, createComponentLogger } from "#logging.js";
import { TaskLoop } from "./taskloop/index.js";
import { configureServer } from "./host/server.js";

initServerLogging({ minLevel: loadLogLevel() });

const log = createComponentLogger("main");

// ============================================
// TASK LOOP
// ============================================

export const loop = new TaskLoop({ config: loadTaskLoopConfig() });

loop.recurring(15 * 60_000)(async function heartbeat() {
  const stats = loop.getStats();
  log.info("Heartbeat", {
    queuedTasks: stats.queuedTasks,
    activeTasks: stats.activeTasks,
    failedTasks: stats.failedTasks,
  });
});

loop.onEvent((event) => {
  if (event.type === "task_failed" || event.type === "job_failed") {
    log.debug(`[TaskLoop] ${event.type}: ${event.name ?? event.id ?? "unknown"}`);
  }
});

// ============================================
// HTTP
// ============================================

configureServer({
  taskLoop: loop,
  port: PORT,
  hostname: HOST,
  onSetup: (app) => {
    // Fire and forget: respond first, do the work in the background
    app.post("/api/echo", async (c) => {
      const body = await c.req.text();
      loop.addTask(async () => {
        log.info("Echo task ran", { bytes: body.length, body });
      }, { name: "echo" });
      return c.json({ queued: true }, 202);
    });
  },
});
