/**
 * TaskLoop: Controller
 *
 * Owns the task queue, the job registry and the control loops of the
 * current run. Everything runs on the host's event loop: start() spawns one
 * consumer and one runner per job, stop() aborts them at their next
 * suspension point. No work in flight is ever interrupted.
 *
 * ```typescript
 * const loop = new TaskLoop();
 *
 * loop.recurring(60_000)(async function checkReminders() {
 *   for (const reminder of await dueReminders()) {
 *     loop.addTask(() => sendReminder(reminder));
 *   }
 * });
 *
 * loop.start();        // host startup hook
 * await loop.stop();   // host shutdown hook
 * ```
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@taskloop/shared/logging";
import { createComponentLogger } from "#logging.js";
import { TaskConsumer } from "./consumer.js";
import { TaskLoopError, TaskLoopLifecycleError } from "./errors.js";
import { TaskQueue } from "./queue.js";
import { RecurringJobRegistry } from "./registry.js";
import { JobRunner } from "./runner.js";
import { settlesWithin, sleep } from "./sleep.js";
import {
  DEFAULT_TASKLOOP_CONFIG,
  type AddTaskOptions,
  type JobAction,
  type PendingTask,
  type RecurringJob,
  type RecurringJobDefinition,
  type RecurringOptions,
  type TaskCounters,
  type TaskLoopConfig,
  type TaskLoopEvent,
  type TaskLoopEventCallback,
  type TaskLoopState,
  type TaskLoopStats,
  type TaskWork,
} from "./types.js";

export interface TaskLoopOptions {
  config?: Partial<TaskLoopConfig>;
  logger?: ILogger;
}

export class TaskLoop {
  private readonly config: TaskLoopConfig;
  private readonly log: ILogger;

  private state: TaskLoopState = "stopped";
  private readonly queue = new TaskQueue<PendingTask>();
  private readonly registry = new RecurringJobRegistry();
  private readonly counters: TaskCounters = { launched: 0, completed: 0, failed: 0 };
  private readonly active = new Set<Promise<void>>();
  // Runner loops by job name until they exit, including ones a timed-out stop abandoned
  private readonly jobLoops = new Map<string, Promise<void>>();
  private readonly listeners = new Set<TaskLoopEventCallback>();

  // Current (or last) run
  private abort: AbortController | null = null;
  private runners: JobRunner[] = [];
  private loops: Promise<void>[] = [];
  private stopping: Promise<void> | null = null;

  constructor(options: TaskLoopOptions = {}) {
    this.config = { ...DEFAULT_TASKLOOP_CONFIG, ...options.config };
    this.log = options.logger ?? createComponentLogger("taskloop");
  }

  // ============================================
  // REGISTRATION
  // ============================================

  /**
   * Register `action` to run every `intervalMs`. Returns a function that takes
   * the action and hands it back unchanged, so it stays callable on its own.
   */
  recurring(
    intervalMs: number,
    nameOrOptions?: string | RecurringOptions
  ): <A extends JobAction>(action: A) => A {
    const options = typeof nameOrOptions === "string" ? { name: nameOrOptions } : nameOrOptions ?? {};

    return (action) => {
      this.register({ ...options, intervalMs, action });
      return action;
    };
  }

  /**
   * Register a recurring job. Only allowed while stopped; a job registered
   * after stop() runs from the next start().
   */
  register(definition: RecurringJobDefinition): RecurringJob {
    if (this.state !== "stopped") {
      throw new TaskLoopLifecycleError("register a recurring job", this.state);
    }

    const job = this.registry.register(definition);
    this.log.debug(`Registered recurring '${job.name}'`, {
      intervalMs: job.intervalMs,
      runImmediately: job.runImmediately,
    });
    return job;
  }

  hasJob(name: string): boolean {
    return this.registry.has(name);
  }

  // ============================================
  // FIRE AND FORGET
  // ============================================

  /**
   * Queue `work` for background execution and return immediately.
   * Work queued while stopped runs once the loop starts.
   */
  addTask(work: TaskWork, options: AddTaskOptions = {}): void {
    if (typeof work !== "function") {
      throw new TaskLoopError("addTask expects a function returning a promise");
    }

    const task: PendingTask = Object.freeze({
      id: `task_${nanoid(12)}`,
      name: options.name ?? (work.name || "anonymous"),
      work,
      enqueuedAt: new Date(),
    });

    this.queue.push(task);

    if (this.state !== "running") {
      this.log.debug("Task queued while TaskLoop is not running", { taskId: task.id, task: task.name, state: this.state });
    }
    this.emit({ type: "task_queued", id: task.id, name: task.name, timestamp: task.enqueuedAt });
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  start(): void {
    if (this.state !== "stopped") {
      this.log.warn("TaskLoop already running", { state: this.state });
      return;
    }

    this.state = "starting";
    const abort = new AbortController();
    this.abort = abort;

    const deps = { log: this.log, emit: (event: TaskLoopEvent) => this.emit(event) };

    this.runners = this.registry.list().map(job => new JobRunner(job, deps));
    const consumer = new TaskConsumer({ ...deps, queue: this.queue, counters: this.counters, active: this.active });

    this.loops = [
      ...this.runners.map(runner => this.spawnRunner(runner, abort.signal)),
      this.guard("task consumer", consumer.run(abort.signal)),
    ];

    this.state = "running";
    this.log.info(`TaskLoop started with ${this.runners.length} recurring job(s)`, {
      queuedTasks: this.queue.size,
    });
    this.emit({ type: "loop_started", timestamp: new Date(), details: { jobs: this.runners.length } });
  }

  /**
   * Run a job's loop. If an earlier loop for the same job is still inside an
   * invocation a timed-out stop abandoned, the new loop starts once it exits.
   */
  private spawnRunner(runner: JobRunner, signal: AbortSignal): Promise<void> {
    const { name, intervalMs } = runner.job;
    const label = `recurring '${name}'`;
    const previous = this.jobLoops.get(name);

    let loop: Promise<void>;
    if (previous) {
      this.log.warn(`Recurring '${name}' waits for its abandoned invocation to finish`, { job: name });
      loop = previous.then(() => this.guard(label, runner.run(signal)));
    } else {
      loop = this.guard(label, runner.run(signal));
    }

    this.jobLoops.set(name, loop);
    void loop.then(() => {
      if (this.jobLoops.get(name) === loop) this.jobLoops.delete(name);
    });

    this.log.info(`Started recurring '${name}'`, { intervalMs });
    return loop;
  }

  /**
   * Stop every control loop at its next suspension point. Resolves once they
   * have exited (or stopTimeoutMs passed); launched tasks keep running unless
   * drainTimeoutMs asks to wait for them.
   */
  stop(): Promise<void> {
    if (this.state === "stopping" && this.stopping) return this.stopping;
    if (this.state !== "running") return Promise.resolve();

    this.state = "stopping";
    this.stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.abort?.abort();

    const exited = await settlesWithin(Promise.all(this.loops), this.config.stopTimeoutMs);
    if (!exited) {
      this.log.warn("TaskLoop stop timed out, abandoning in-flight job invocations", {
        stopTimeoutMs: this.config.stopTimeoutMs,
        running: this.runners.filter(r => r.getSnapshot().running).map(r => r.job.name),
      });
    }

    let remaining = this.active.size;
    if (this.config.drainTimeoutMs > 0 && remaining > 0) {
      remaining = await this.drain(this.config.drainTimeoutMs);
    }

    this.loops = [];
    this.abort = null;
    this.state = "stopped";

    this.log.info("TaskLoop stopped", { queuedTasks: this.queue.size, activeTasks: remaining });
    this.emit({ type: "loop_stopped", timestamp: new Date(), details: { activeTasks: remaining } });
  }

  /**
   * Wait until no launched task is in flight and, while running, nothing is
   * left in the queue. Returns how many tasks were still in flight at timeout.
   */
  async drain(timeoutMs = 30_000): Promise<number> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const pending = [...this.active];
      const queued = this.state === "running" ? this.queue.size : 0;
      if (pending.length === 0 && queued === 0) return 0;

      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) break;

      if (pending.length === 0) {
        // Queued but not launched yet, let the consumer pick it up
        await sleep(0);
        continue;
      }
      if (!(await settlesWithin(Promise.all(pending), remainingMs))) break;
    }

    const stillActive = this.active.size;
    this.log.warn("Drain timed out", { activeTasks: stillActive, queuedTasks: this.queue.size });
    return stillActive;
  }

  private guard(label: string, loop: Promise<void>): Promise<void> {
    return loop.catch((error: unknown) => {
      this.log.fatal(`TaskLoop ${label} loop crashed`, error);
    });
  }

  // ============================================
  // EVENTS
  // ============================================

  /** Subscribe to task, job and lifecycle events. Returns an unsubscribe function. */
  onEvent(callback: TaskLoopEventCallback): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  private emit(event: TaskLoopEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error("Event listener error", error, { event: event.type });
      }
    }
  }

  // ============================================
  // STATE & STATS
  // ============================================

  getState(): TaskLoopState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  getStats(): TaskLoopStats {
    const snapshots = new Map(this.runners.map(r => [r.job.name, r.getSnapshot()]));

    return {
      state: this.state,
      queuedTasks: this.queue.size,
      activeTasks: this.active.size,
      launchedTasks: this.counters.launched,
      completedTasks: this.counters.completed,
      failedTasks: this.counters.failed,
      jobs: this.registry.list().map(job => snapshots.get(job.name) ?? {
        name: job.name,
        intervalMs: job.intervalMs,
        running: false,
        runCount: 0,
        successCount: 0,
        failureCount: 0,
        consecutiveFailures: 0,
        lastRunAt: null,
        nextRunAt: null,
        lastErrorMessage: null,
      }),
    };
  }
}
