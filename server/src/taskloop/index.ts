/**
 * TaskLoop Module
 *
 * In-process scheduler for fire-and-forget tasks and fixed-interval
 * recurring jobs, sharing the server's event loop.
 */

export * from "./types.js";
export * from "./errors.js";
export { TaskLoop, type TaskLoopOptions } from "./controller.js";
export { TaskQueue } from "./queue.js";
export { TaskConsumer, type TaskConsumerDeps } from "./consumer.js";
export { RecurringJobRegistry } from "./registry.js";
export { JobRunner, type JobRunnerDeps } from "./runner.js";
export { sleep, settlesWithin } from "./sleep.js";
