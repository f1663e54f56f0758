/**
 * TaskLoop: Job Runner
 *
 * One loop per recurring job: invoke, then sleep for the interval.
 * The interval runs from the end of one invocation to the start of the next,
 * so execution time accumulates and a job never overlaps itself.
 */

import type { ILogger } from "@taskloop/shared/logging";
import { sleep } from "./sleep.js";
import type { JobMetrics, JobSnapshot, RecurringJob, TaskLoopEvent } from "./types.js";

export interface JobRunnerDeps {
  log: ILogger;
  emit: (event: TaskLoopEvent) => void;
}

export class JobRunner {
  readonly job: RecurringJob;
  private readonly deps: JobRunnerDeps;
  private invoking = false;

  private readonly metrics: JobMetrics = {
    runCount: 0,
    successCount: 0,
    failureCount: 0,
    consecutiveFailures: 0,
    lastRunAt: null,
    nextRunAt: null,
    lastErrorMessage: null,
  };

  constructor(job: RecurringJob, deps: JobRunnerDeps) {
    this.job = job;
    this.deps = deps;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { intervalMs, runImmediately } = this.job;

    let due = runImmediately || (await this.wait(intervalMs, signal));

    while (due && !signal.aborted) {
      await this.invoke();
      due = await this.wait(intervalMs, signal);
    }

    this.metrics.nextRunAt = null;
  }

  getSnapshot(): JobSnapshot {
    return {
      name: this.job.name,
      intervalMs: this.job.intervalMs,
      running: this.invoking,
      ...this.metrics,
    };
  }

  private wait(ms: number, signal: AbortSignal): Promise<boolean> {
    this.metrics.nextRunAt = new Date(Date.now() + ms).toISOString();
    return sleep(ms, signal);
  }

  private async invoke(): Promise<void> {
    const { log, emit } = this.deps;
    const { name } = this.job;
    const startedAt = Date.now();

    this.invoking = true;
    this.metrics.runCount += 1;
    this.metrics.lastRunAt = new Date(startedAt).toISOString();
    this.metrics.nextRunAt = null;

    emit({ type: "job_started", name, timestamp: new Date(), details: { runCount: this.metrics.runCount } });

    try {
      await this.job.action();
      this.metrics.successCount += 1;
      this.metrics.consecutiveFailures = 0;
      this.metrics.lastErrorMessage = null;
      emit({
        type: "job_completed",
        name,
        timestamp: new Date(),
        details: { durationMs: Date.now() - startedAt },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.metrics.failureCount += 1;
      this.metrics.consecutiveFailures += 1;
      this.metrics.lastErrorMessage = message;
      log.error(`Recurring job '${name}' failed`, error, {
        job: name,
        runCount: this.metrics.runCount,
        consecutiveFailures: this.metrics.consecutiveFailures,
      });
      emit({ type: "job_failed", name, timestamp: new Date(), details: { error: message } });
    } finally {
      this.invoking = false;
    }
  }
}
