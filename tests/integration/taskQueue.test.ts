import { setTimeout as sleep } from "node:timers/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TaskQueue } from "../../src/application/taskQueue";
import type { NewTask } from "../../src/domain/types";
import { openDatabase } from "../../src/infrastructure/repo/database";
import type { DatabaseHandle } from "../../src/infrastructure/repo/database";
import { SqliteTaskRepository } from "../../src/infrastructure/repo/taskRepository";
import { MemoryLogger, RecordingEvents } from "../helpers/fakes";

const newTask = (name: string): NewTask => ({
  filePath: `/media/${name}`,
  fileName: name,
  sourceLanguage: null,
  targetLanguage: "Chinese",
  provider: "openai",
  subtitleTrack: null,
  forceOverride: false
});

function createGate() {
  let release: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { opened, release };
}

describe("TaskQueue", () => {
  let database: DatabaseHandle;
  let tasks: SqliteTaskRepository;
  let events: RecordingEvents;
  let logger: MemoryLogger;
  let queue: TaskQueue;

  const createTask = async (name: string) => {
    const task = await tasks.createTask(newTask(name));
    if (!task) {
      throw new Error("task was not created");
    }
    return task.id;
  };

  beforeEach(() => {
    database = openDatabase(":memory:");
    tasks = new SqliteTaskRepository(database.db);
    events = new RecordingEvents();
    logger = new MemoryLogger();
    queue = new TaskQueue({ tasks, events, logger }, { workerCount: 2, pollIntervalMs: 10 });
  });

  afterEach(async () => {
    await queue.stop();
    database.close();
  });

  it("refuses to start without a handler", () => {
    expect(() => queue.start()).toThrow("Task handler must be set before starting the queue");
  });

  it("runs a task to completion and broadcasts progress", async () => {
    const id = await createTask("a.srt");
    queue.setTaskHandler(async (_taskId, context) => {
      await context.reportProgress(49.6);
    });
    queue.start();

    await vi.waitFor(async () => expect((await tasks.getTask(id))?.status).toBe("completed"));
    expect(events.progress).toEqual([[id, 50]]);
    expect(events.statuses).toEqual([
      [id, "processing"],
      [id, "completed"]
    ]);
  });

  it("records the handler error on failure", async () => {
    const id = await createTask("a.srt");
    queue.setTaskHandler(async () => {
      throw new Error("provider unreachable");
    });
    queue.start();

    await vi.waitFor(async () => expect((await tasks.getTask(id))?.status).toBe("failed"));
    expect((await tasks.getTask(id))?.errorMessage).toBe("provider unreachable");
    expect(logger.messages("error")).toContain(`Task ${id} failed: provider unreachable`);
  });

  it("leaves a task cancelled while it ran as cancelled", async () => {
    const id = await createTask("a.srt");
    const gate = createGate();
    const started: number[] = [];
    queue.setTaskHandler(async (taskId) => {
      started.push(taskId);
      await gate.opened;
    });
    queue.start();

    await vi.waitFor(() => expect(started).toEqual([id]));
    expect(await tasks.cancelTask(id)).toBe(true);
    gate.release();

    await vi.waitFor(() => expect(logger.messages("info")).toContain(`Task ${id} was cancelled while processing.`));
    expect((await tasks.getTask(id))?.status).toBe("cancelled");
    expect(events.statuses).toEqual([[id, "processing"]]);
  });

  it("bounds concurrency and grows the pool on resize", async () => {
    for (const name of ["a.srt", "b.srt", "c.srt", "d.srt"]) {
      await createTask(name);
    }
    const gate = createGate();
    let running = 0;
    let peak = 0;
    queue.setTaskHandler(async () => {
      running += 1;
      peak = Math.max(peak, running);
      await gate.opened;
      running -= 1;
    });
    queue.start();

    await vi.waitFor(() => expect(running).toBe(2));
    await sleep(50);
    expect(peak).toBe(2);

    queue.setWorkerCount(3);
    await vi.waitFor(() => expect(running).toBe(3));
    expect(queue.workerCount).toBe(3);

    gate.release();
    await vi.waitFor(async () => expect((await tasks.countByStatus()).completed).toBe(4));
  });

  it("shrinks the pool after running tasks finish without losing or repeating work", async () => {
    const ids: number[] = [];
    for (const name of ["a.srt", "b.srt", "c.srt", "d.srt", "e.srt", "f.srt"]) {
      ids.push(await createTask(name));
    }
    const gate = createGate();
    const handled: number[] = [];
    let shrunk = false;
    let running = 0;
    let laterRunning = 0;
    let laterPeak = 0;
    queue.setTaskHandler(async (taskId) => {
      handled.push(taskId);
      if (!shrunk) {
        running += 1;
        await gate.opened;
        running -= 1;
        return;
      }
      laterRunning += 1;
      laterPeak = Math.max(laterPeak, laterRunning);
      await sleep(5);
      laterRunning -= 1;
    });
    queue.setWorkerCount(3);
    queue.start();
    await vi.waitFor(() => expect(running).toBe(3));

    queue.setWorkerCount(1);
    shrunk = true;
    gate.release();

    await vi.waitFor(async () => expect((await tasks.countByStatus()).completed).toBe(6));
    expect([...handled].sort((a, b) => a - b)).toEqual(ids);
    expect(laterPeak).toBe(1);
    await vi.waitFor(() => expect(queue.activeWorkers).toBe(1));
    expect(events.statuses.filter(([, status]) => status === "processing")).toHaveLength(6);
  });

  it("aborts running handlers on stop without settling their tasks", async () => {
    const id = await createTask("a.srt");
    const started: number[] = [];
    queue.setTaskHandler(async (taskId, context) => {
      started.push(taskId);
      await sleep(10_000, undefined, { signal: context.signal });
    });
    queue.start();

    await vi.waitFor(() => expect(started).toEqual([id]));
    await queue.stop();
    expect(queue.isRunning).toBe(false);
    expect((await tasks.getTask(id))?.status).toBe("processing");
  });
});
