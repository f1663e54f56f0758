/**
 * TaskLoop Types
 *
 * Fire-and-forget tasks, recurring jobs, lifecycle state and events.
 */

// ============================================
// UNITS OF WORK
// ============================================

/** Zero-argument async computation run once in the background. */
export type TaskWork = () => Promise<unknown>;

/** Zero-argument async computation run on a fixed interval. */
export type JobAction = () => Promise<unknown>;

export interface PendingTask {
  /** task_<nanoid>, assigned at enqueue time */
  readonly id: string;
  readonly name: string;
  readonly work: TaskWork;
  readonly enqueuedAt: Date;
}

export interface AddTaskOptions {
  /** Label used in logs and events. Defaults to the work function's name. */
  name?: string;
}

// ============================================
// RECURRING JOBS
// ============================================

export interface RecurringJob {
  /** Unique within a TaskLoop */
  readonly name: string;
  /** Pause between the end of one invocation and the start of the next */
  readonly intervalMs: number;
  readonly action: JobAction;
  /** Fire the first invocation as soon as the runner starts */
  readonly runImmediately: boolean;
}

export interface RecurringJobDefinition {
  name?: string;
  intervalMs: number;
  action: JobAction;
  runImmediately?: boolean;
}

export interface RecurringOptions {
  name?: string;
  runImmediately?: boolean;
}

// ============================================
// LIFECYCLE
// ============================================

export type TaskLoopState = "stopped" | "starting" | "running" | "stopping";

export interface TaskLoopConfig {
  /** Upper bound on waiting for control loops to exit in stop() (ms) */
  stopTimeoutMs: number;
  /** How long stop() waits for launched tasks to settle (ms, 0 = don't wait) */
  drainTimeoutMs: number;
}

export const DEFAULT_TASKLOOP_CONFIG: TaskLoopConfig = {
  stopTimeoutMs: 30_000,
  drainTimeoutMs: 0,
};

// ============================================
// EVENTS
// ============================================

export type TaskLoopEventType =
  | "task_queued"
  | "task_started"
  | "task_completed"
  | "task_failed"
  | "job_started"
  | "job_completed"
  | "job_failed"
  | "loop_started"
  | "loop_stopped";

export interface TaskLoopEvent {
  type: TaskLoopEventType;
  /** Task id, for task events */
  id?: string;
  /** Task or job name */
  name?: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export type TaskLoopEventCallback = (event: TaskLoopEvent) => void;

// ============================================
// STATS
// ============================================

export interface JobMetrics {
  runCount: number;
  successCount: number;
  failureCount: number;
  consecutiveFailures: number;
  lastRunAt: string | null;
  nextRunAt: string | null;
  lastErrorMessage: string | null;
}

export interface JobSnapshot extends JobMetrics {
  name: string;
  intervalMs: number;
  /** An invocation is in flight */
  running: boolean;
}

/** Counters shared by every consumer a TaskLoop starts. */
export interface TaskCounters {
  launched: number;
  completed: number;
  failed: number;
}

export interface TaskLoopStats {
  state: TaskLoopState;
  queuedTasks: number;
  activeTasks: number;
  launchedTasks: number;
  completedTasks: number;
  failedTasks: number;
  jobs: JobSnapshot[];
}
