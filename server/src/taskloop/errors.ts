import type { TaskLoopState } from "./types.js";

export class TaskLoopError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskLoopError";
  }
}

export class DuplicateJobError extends TaskLoopError {
  public jobName: string;

  constructor(jobName: string) {
    super(`Recurring job already registered: ${jobName}`);
    this.name = "DuplicateJobError";
    this.jobName = jobName;
  }
}

export class TaskLoopLifecycleError extends TaskLoopError {
  public state: TaskLoopState;

  constructor(action: string, state: TaskLoopState) {
    super(`Cannot ${action} while TaskLoop is ${state}`);
    this.name = "TaskLoopLifecycleError";
    this.state = state;
  }
}
