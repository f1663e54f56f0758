/**
 * TaskLoop: Recurring Job Registry
 *
 * Name → job definition. Names are unique: a second registration under the
 * same name is rejected, never overwritten.
 */

import { DuplicateJobError, TaskLoopError } from "./errors.js";
import type { RecurringJob, RecurringJobDefinition } from "./types.js";

export class RecurringJobRegistry {
  private readonly jobs = new Map<string, RecurringJob>();

  get size(): number {
    return this.jobs.size;
  }

  register(definition: RecurringJobDefinition): RecurringJob {
    const { action, intervalMs } = definition;

    if (typeof action !== "function") {
      throw new TaskLoopError("Recurring job action must be a function");
    }

    const name = definition.name ?? action.name;
    if (!name) {
      throw new TaskLoopError("Recurring job needs a name (pass one, or use a named function)");
    }

    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new TaskLoopError(`Recurring job '${name}' interval must be a non-negative number, got ${intervalMs}`);
    }

    if (this.jobs.has(name)) {
      throw new DuplicateJobError(name);
    }

    const job: RecurringJob = Object.freeze({
      name,
      intervalMs,
      action,
      runImmediately: definition.runImmediately ?? true,
    });
    this.jobs.set(name, job);
    return job;
  }

  has(name: string): boolean {
    return this.jobs.has(name);
  }

  /** Registration order */
  list(): RecurringJob[] {
    return Array.from(this.jobs.values());
  }
}
