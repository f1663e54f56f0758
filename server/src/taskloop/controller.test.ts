/**
 * TaskLoop Controller Tests
 *
 * Covers:
 * - tasks queued before start are all drained
 * - FIFO dequeue order with unordered completion
 * - failure isolation for tasks and jobs
 * - independent job schedules
 * - work enqueued from inside tasks and jobs
 * - lifecycle misuse, restart, stop timeout, drain
 * - restart after a timed-out stop never overlaps a job with itself
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Logger, MemoryTransport } from "@taskloop/shared/logging";
import { TaskLoop } from "./controller.js";
import { DuplicateJobError, TaskLoopLifecycleError } from "./errors.js";
import type { TaskLoopConfig, TaskLoopEvent } from "./types.js";

const flush = () => new Promise<void>(resolve => setTimeout(resolve, 0));

function gate() {
  let open: () => void = () => {};
  const promise = new Promise<void>(resolve => {
    open = resolve;
  });
  return { promise, open: () => open() };
}

function createLoop(config: Partial<TaskLoopConfig> = {}) {
  const memory = new MemoryTransport();
  const logger = new Logger({ minLevel: "trace", component: "test.taskloop", transports: [memory] });
  const loop = new TaskLoop({ config, logger });
  const events: TaskLoopEvent[] = [];
  loop.onEvent((event) => events.push(event));
  return { loop, memory, events };
}

// ============================================
// FIRE AND FORGET
// ============================================

describe("TaskLoop: tasks", () => {
  let loop: TaskLoop;

  afterEach(async () => {
    await loop.stop();
  });

  it("runs every task added before start", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const ran: string[] = [];

    for (const name of ["one", "two", "three"]) {
      loop.addTask(async () => {
        ran.push(name);
      }, { name });
    }

    await flush();
    expect(ran).toEqual([]);
    expect(loop.getStats().queuedTasks).toBe(3);

    loop.start();
    await expect(loop.drain(1000)).resolves.toBe(0);

    expect(ran.sort()).toEqual(["one", "three", "two"]);
    expect(loop.getStats()).toMatchObject({ queuedTasks: 0, launchedTasks: 3, completedTasks: 3, failedTasks: 0 });
  });

  it("dequeues in enqueue order while completion order is free", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const completed: string[] = [];
    const first = gate();
    const second = gate();

    loop.addTask(async () => {
      await first.promise;
      completed.push("first");
    }, { name: "first" });
    loop.addTask(async () => {
      await second.promise;
      completed.push("second");
    }, { name: "second" });
    loop.addTask(async () => {
      completed.push("third");
    }, { name: "third" });

    loop.start();
    await flush();
    second.open();
    await flush();
    first.open();
    await loop.drain(1000);

    const started = setup.events.filter(e => e.type === "task_started").map(e => e.name);
    expect(started).toEqual(["first", "second", "third"]);
    expect(completed).toEqual(["third", "second", "first"]);
  });

  it("keeps running later tasks after one fails", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const ran: string[] = [];

    loop.addTask(async function failing() {
      throw new Error("bad row");
    });
    loop.addTask(async () => {
      ran.push("after");
    });

    loop.start();
    await loop.drain(1000);

    expect(ran).toEqual(["after"]);
    expect(loop.getStats()).toMatchObject({ completedTasks: 1, failedTasks: 1 });

    const error = setup.memory.getEntries().find(e => e.level === "error");
    expect(error?.message).toBe("Task 'failing' failed");
    expect(error?.component).toBe("test.taskloop");
    expect(error?.error?.message).toBe("bad row");
  });

  it("names anonymous work 'anonymous' and gives each task an id", () => {
    const setup = createLoop();
    loop = setup.loop;

    loop.addTask(async () => {});

    const queued = setup.events.find(e => e.type === "task_queued");
    expect(queued?.name).toBe("anonymous");
    expect(queued?.id).toMatch(/^task_[A-Za-z0-9_-]{12}$/);
  });

  it("drains work enqueued from inside a running task", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const ran: string[] = [];

    loop.addTask(async function parent() {
      ran.push("parent");
      loop.addTask(async function child() {
        ran.push("child");
      });
    });

    loop.start();
    await loop.drain(1000);

    expect(ran).toEqual(["parent", "child"]);
    expect(setup.events.filter(e => e.type === "task_started").map(e => e.name)).toEqual(["parent", "child"]);
  });

  it("drains work enqueued from inside a recurring job", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const ran: string[] = [];

    loop.recurring(60_000)(async function enqueueFollowUp() {
      loop.addTask(async function followUp() {
        ran.push("followUp");
      });
    });

    loop.start();
    await flush();
    await loop.drain(1000);

    expect(ran).toEqual(["followUp"]);
  });

  it("keeps tasks added after stop for the next start", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const ran: string[] = [];

    loop.start();
    await loop.stop();

    loop.addTask(async () => {
      ran.push("later");
    });
    await flush();
    expect(ran).toEqual([]);
    expect(loop.getStats().queuedTasks).toBe(1);

    loop.start();
    await loop.drain(1000);
    expect(ran).toEqual(["later"]);
  });

  it("waits for launched tasks on stop when drainTimeoutMs is set", async () => {
    const setup = createLoop({ drainTimeoutMs: 1000 });
    loop = setup.loop;
    const slow = gate();

    loop.addTask(async () => {
      await slow.promise;
    });
    loop.start();
    await flush();

    const stopping = loop.stop();
    expect(loop.getState()).toBe("stopping");

    slow.open();
    await stopping;

    expect(loop.getState()).toBe("stopped");
    expect(loop.getStats()).toMatchObject({ activeTasks: 0, completedTasks: 1 });
  });

  it("does not wait for launched tasks on stop by default", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const slow = gate();

    loop.addTask(async () => {
      await slow.promise;
    });
    loop.start();
    await flush();
    await loop.stop();

    expect(loop.getStats()).toMatchObject({ state: "stopped", activeTasks: 1, completedTasks: 0 });

    slow.open();
    await expect(loop.drain(1000)).resolves.toBe(0);
    expect(loop.getStats().completedTasks).toBe(1);
  });

  it("keeps tracking tasks launched before a restart", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const slow = gate();

    loop.addTask(() => slow.promise, { name: "slow" });
    loop.start();
    await flush();
    await loop.stop();
    loop.start();

    expect(loop.getStats().activeTasks).toBe(1);
    await expect(loop.drain(20)).resolves.toBe(1);

    slow.open();
    await expect(loop.drain(1000)).resolves.toBe(0);
    expect(loop.getStats().activeTasks).toBe(0);
  });

  it("logs listener errors without breaking dispatch", async () => {
    const setup = createLoop();
    loop = setup.loop;
    const ran: string[] = [];

    const unsubscribe = loop.onEvent(() => {
      throw new Error("listener bug");
    });
    loop.addTask(async () => {
      ran.push("task");
    });
    unsubscribe();

    loop.start();
    await loop.drain(1000);

    expect(ran).toEqual(["task"]);
    const listenerErrors = setup.memory.getEntries().filter(e => e.message === "Event listener error");
    expect(listenerErrors).toHaveLength(1);
    expect(listenerErrors[0].data).toEqual({ event: "task_queued" });
  });
});

// ============================================
// RECURRING JOBS & LIFECYCLE
// ============================================

describe("TaskLoop: recurring jobs", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the action unchanged and registers it under its name", () => {
    const { loop } = createLoop();
    const heartbeat = async function heartbeat() {};

    expect(loop.recurring(1000)(heartbeat)).toBe(heartbeat);
    expect(loop.hasJob("heartbeat")).toBe(true);
    expect(loop.recurring(1000, "beat")(heartbeat)).toBe(heartbeat);
    expect(loop.hasJob("beat")).toBe(true);
  });

  it("rejects duplicate job names", () => {
    const { loop } = createLoop();
    loop.recurring(1000, "sync")(async () => {});

    expect(() => loop.recurring(5000, "sync")(async () => {})).toThrow(DuplicateJobError);
    expect(loop.getStats().jobs).toHaveLength(1);
  });

  it("runs jobs with different intervals independently", async () => {
    const { loop } = createLoop();
    const fast = vi.fn(async () => {
      throw new Error("fast fails");
    });
    const slow = vi.fn(async () => {});
    loop.recurring(1000, "fast")(fast);
    loop.recurring(3000, "slow")(slow);

    loop.start();
    await vi.advanceTimersByTimeAsync(3500);

    expect(fast).toHaveBeenCalledTimes(4);
    expect(slow).toHaveBeenCalledTimes(2);

    const jobs = loop.getStats().jobs;
    expect(jobs.map(j => [j.name, j.runCount, j.failureCount])).toEqual([
      ["fast", 4, 4],
      ["slow", 2, 0],
    ]);

    await loop.stop();
  });

  it("keeps invoking a job that always fails", async () => {
    const { loop, memory } = createLoop();
    const flaky = vi.fn(async () => {
      throw new Error("always");
    });
    loop.recurring(500, "flaky")(flaky);

    loop.start();
    await vi.advanceTimersByTimeAsync(10_000);

    expect(flaky).toHaveBeenCalledTimes(21);
    expect(loop.isRunning()).toBe(true);
    expect(memory.getEntries().filter(e => e.message === "Recurring job 'flaky' failed")).toHaveLength(21);

    await loop.stop();
  });

  it("honours runImmediately: false", async () => {
    const { loop } = createLoop();
    const report = vi.fn(async () => {});
    loop.recurring(2000, { name: "report", runImmediately: false })(report);

    loop.start();
    await vi.advanceTimersByTimeAsync(1999);
    expect(report).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(report).toHaveBeenCalledTimes(1);

    await loop.stop();
  });

  it("treats a second start as a no-op", async () => {
    const { loop, memory } = createLoop();
    const tick = vi.fn(async () => {});
    loop.recurring(1000, "tick")(tick);

    loop.start();
    loop.start();
    expect(tick).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(tick).toHaveBeenCalledTimes(2);

    const warning = memory.getEntries().find(e => e.level === "warn");
    expect(warning?.message).toBe("TaskLoop already running");
    expect(warning?.data).toEqual({ state: "running" });

    await loop.stop();
  });

  it("rejects registration while running and accepts it after stop", async () => {
    const { loop } = createLoop();
    loop.start();

    expect(() => loop.recurring(1000, "late")(async () => {})).toThrow(TaskLoopLifecycleError);
    expect(() => loop.recurring(1000, "late")(async () => {})).toThrow("Cannot register a recurring job while TaskLoop is running");
    expect(loop.hasJob("late")).toBe(false);

    await loop.stop();

    const late = vi.fn(async () => {});
    loop.recurring(1000, "late")(late);
    loop.start();
    expect(late).toHaveBeenCalledTimes(1);

    await loop.stop();
  });

  it("restarts cleanly with a fresh runner set", async () => {
    const { loop, events } = createLoop();
    const tick = vi.fn(async () => {});
    loop.recurring(1000, "tick")(tick);

    loop.start();
    await vi.advanceTimersByTimeAsync(1500);
    expect(tick).toHaveBeenCalledTimes(2);

    await loop.stop();
    expect(loop.getState()).toBe("stopped");
    await vi.advanceTimersByTimeAsync(5000);
    expect(tick).toHaveBeenCalledTimes(2);

    loop.start();
    expect(tick).toHaveBeenCalledTimes(3);
    await vi.advanceTimersByTimeAsync(1000);
    expect(tick).toHaveBeenCalledTimes(4);
    expect(loop.getStats().jobs[0].runCount).toBe(2);

    await loop.stop();
    expect(events.filter(e => e.type === "loop_started")).toHaveLength(2);
    expect(events.filter(e => e.type === "loop_stopped")).toHaveLength(2);
  });

  it("shares one stop between concurrent callers", async () => {
    const { loop } = createLoop();
    loop.start();

    const first = loop.stop();
    const second = loop.stop();
    expect(second).toBe(first);

    await first;
    expect(loop.getState()).toBe("stopped");
    await expect(loop.stop()).resolves.toBeUndefined();
  });

  it("abandons a hung invocation after stopTimeoutMs", async () => {
    const { loop, memory } = createLoop({ stopTimeoutMs: 1000 });
    const hang = gate();
    const hung = vi.fn(() => hang.promise);
    loop.recurring(100, "hung")(hung);

    loop.start();
    const stopping = loop.stop();
    await vi.advanceTimersByTimeAsync(1000);
    await stopping;

    expect(loop.getState()).toBe("stopped");
    const warning = memory.getEntries().find(e => e.level === "warn");
    expect(warning?.message).toBe("TaskLoop stop timed out, abandoning in-flight job invocations");
    expect(warning?.data).toEqual({ stopTimeoutMs: 1000, running: ["hung"] });

    // The abandoned runner exits instead of invoking again
    hang.open();
    await vi.advanceTimersByTimeAsync(1000);
    expect(hung).toHaveBeenCalledTimes(1);
  });

  it("reports registered jobs before the first start", () => {
    const { loop } = createLoop();
    loop.recurring(250, "poll")(async () => {});

    expect(loop.getStats()).toEqual({
      state: "stopped",
      queuedTasks: 0,
      activeTasks: 0,
      launchedTasks: 0,
      completedTasks: 0,
      failedTasks: 0,
      jobs: [{
        name: "poll",
        intervalMs: 250,
        running: false,
        runCount: 0,
        successCount: 0,
        failureCount: 0,
        consecutiveFailures: 0,
        lastRunAt: null,
        nextRunAt: null,
        lastErrorMessage: null,
      }],
    });
  });
});

// ============================================
// RESTART AFTER A TIMED-OUT STOP
// ============================================

describe("TaskLoop: restart after a timed-out stop", () => {
  it("holds a job's new runner until its abandoned invocation finishes", async () => {
    const { loop, memory } = createLoop({ stopTimeoutMs: 20 });
    const hang = gate();
    let inFlight = 0;
    let maxInFlight = 0;
    const slow = vi.fn(async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await hang.promise;
      inFlight -= 1;
    });
    loop.recurring(60_000, "slow")(slow);

    loop.start();
    await loop.stop();
    expect(loop.getState()).toBe("stopped");

    loop.start();
    await new Promise<void>(resolve => setTimeout(resolve, 30));
    expect(slow).toHaveBeenCalledTimes(1);
    expect(memory.getEntries().map(e => e.message)).toContain(
      "Recurring 'slow' waits for its abandoned invocation to finish"
    );

    hang.open();
    await flush();
    expect(slow).toHaveBeenCalledTimes(2);
    expect(maxInFlight).toBe(1);

    await loop.stop();
    expect(loop.getState()).toBe("stopped");
  });
});
