/**
 * TaskLoop: Task Consumer
 *
 * Waits on the queue, takes every queued task and launches each one without
 * awaiting it. Launched work runs inside an isolating wrapper: a failure is
 * logged and counted, never rethrown.
 */

import type { ILogger } from "@taskloop/shared/logging";
import type { TaskQueue } from "./queue.js";
import type { PendingTask, TaskCounters, TaskLoopEvent } from "./types.js";

export interface TaskConsumerDeps {
  queue: TaskQueue<PendingTask>;
  counters: TaskCounters;
  /** Launched tasks that have not settled, shared across consumers. None of them reject. */
  active: Set<Promise<void>>;
  log: ILogger;
  emit: (event: TaskLoopEvent) => void;
}

export class TaskConsumer {
  private readonly deps: TaskConsumerDeps;

  constructor(deps: TaskConsumerDeps) {
    this.deps = deps;
  }

  /**
   * Consume until `signal` aborts. Anything still queued at that point stays
   * queued for the next consumer.
   */
  async run(signal: AbortSignal): Promise<void> {
    const { queue, active, log } = this.deps;
    log.debug("Task consumer started", { queued: queue.size });

    while (!signal.aborted) {
      const ready = await queue.waitForItems(signal);
      if (!ready || signal.aborted) break;

      const batch = queue.takeAll();
      log.trace(`Dequeued ${batch.length} task(s)`);
      for (const task of batch) {
        this.launch(task);
      }
    }

    log.debug("Task consumer exited", { queued: queue.size, active: active.size });
  }

  private launch(task: PendingTask): void {
    const { counters, active } = this.deps;
    counters.launched += 1;
    const execution = this.execute(task);
    active.add(execution);
    void execution.then(() => active.delete(execution));
  }

  private async execute(task: PendingTask): Promise<void> {
    const { counters, log, emit } = this.deps;
    const startedAt = Date.now();

    emit({ type: "task_started", id: task.id, name: task.name, timestamp: new Date() });

    try {
      await task.work();
      counters.completed += 1;
      emit({
        type: "task_completed",
        id: task.id,
        name: task.name,
        timestamp: new Date(),
        details: { durationMs: Date.now() - startedAt },
      });
    } catch (error) {
      counters.failed += 1;
      log.error(`Task '${task.name}' failed`, error, {
        taskId: task.id,
        task: task.name,
        enqueuedAt: task.enqueuedAt.toISOString(),
      });
      emit({
        type: "task_failed",
        id: task.id,
        name: task.name,
        timestamp: new Date(),
        details: { error: error instanceof Error ? error.message : String(error) },
      });
    }
  }
}
