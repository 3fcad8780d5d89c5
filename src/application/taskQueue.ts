import { setTimeout as sleep } from "node:timers/promises";
import { errorMessage } from "../domain/errors";
import type { LoggerPort, TaskEventSink, TaskRepositoryPort } from "../interfaces/ports";
import { QUEUE_SCOPE } from "./logScopes";

export type TaskRunContext = {
  signal: AbortSignal;
  reportProgress(progress: number): Promise<void>;
};

export type TaskHandler = (taskId: number, context: TaskRunContext) => Promise<void>;

type WorkerSlot = {
  id: number;
  done: boolean;
  loop: Promise<void>;
};

/**
 * Bounded pool of worker loops over the tasks table. Each loop claims the oldest
 * pending task, runs the handler and records the outcome; a task cancelled while
 * it ran is left as cancelled.
 */
export class TaskQueue {
  private handler: TaskHandler | null = null;
  private workers: WorkerSlot[] = [];
  private maxConcurrent: number;
  private running = false;
  private controller = new AbortController();

  constructor(
    private readonly deps: { tasks: TaskRepositoryPort; events: TaskEventSink; logger: LoggerPort },
    private readonly options: { workerCount: number; pollIntervalMs: number }
  ) {
    this.maxConcurrent = Math.max(1, options.workerCount);
  }

  get isRunning() {
    return this.running;
  }

  get workerCount() {
    return this.maxConcurrent;
  }

  get activeWorkers() {
    return this.workers.filter((worker) => !worker.done).length;
  }

  setTaskHandler(handler: TaskHandler) {
    this.handler = handler;
  }

  /** Grows the pool immediately; surplus loops exit after their current task. */
  setWorkerCount(count: number) {
    this.maxConcurrent = Math.max(1, Math.floor(count));
    if (this.running) {
      this.spawnWorkers();
    }
  }

  start() {
    if (this.running) {
      return;
    }
    if (!this.handler) {
      throw new Error("Task handler must be set before starting the queue");
    }
    this.running = true;
    this.controller = new AbortController();
    this.spawnWorkers();
  }

  /** Aborts every loop. Tasks that were mid-flight stay in processing. */
  async stop() {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.controller.abort();
    await Promise.allSettled(this.workers.map((worker) => worker.loop));
    this.workers = [];
  }

  async updateProgress(taskId: number, progress: number) {
    const value = Math.max(0, Math.min(100, Math.round(progress)));
    if (await this.deps.tasks.updateProgress(taskId, value)) {
      this.deps.events.onProgress(taskId, value);
    }
  }

  private spawnWorkers() {
    this.workers = this.workers.filter((worker) => !worker.done);
    const taken = new Set(this.workers.map((worker) => worker.id));
    for (let id = 0; id < this.maxConcurrent; id += 1) {
      if (taken.has(id)) {
        continue;
      }
      const slot: WorkerSlot = { id, done: false, loop: Promise.resolve() };
      slot.loop = this.workerLoop(id, this.controller.signal).finally(() => {
        slot.done = true;
      });
      this.workers.push(slot);
    }
  }

  private async workerLoop(workerId: number, signal: AbortSignal) {
    while (this.running && !signal.aborted && workerId < this.maxConcurrent) {
      try {
        const taskId = await this.deps.tasks.claimNextPending();
        if (taskId === null) {
          await sleep(this.options.pollIntervalMs, undefined, { signal });
          continue;
        }
        await this.runTask(taskId, signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        await this.deps.logger.error(QUEUE_SCOPE, `Worker ${workerId} error: ${errorMessage(error)}`);
        await sleep(this.options.pollIntervalMs, undefined, { signal }).catch(() => undefined);
      }
    }
  }

  private async runTask(taskId: number, signal: AbortSignal) {
    const handler = this.handler;
    if (!handler) {
      throw new Error("Task handler is not set");
    }
    this.deps.events.onStatusChange(taskId, "processing");
    try {
      await handler(taskId, { signal, reportProgress: (progress) => this.updateProgress(taskId, progress) });
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      const message = errorMessage(error);
      if (await this.deps.tasks.failTask(taskId, message)) {
        await this.deps.logger.error(QUEUE_SCOPE, `Task ${taskId} failed: ${message}`);
        this.deps.events.onStatusChange(taskId, "failed");
      } else {
        await this.deps.logger.info(QUEUE_SCOPE, `Task ${taskId} was cancelled while processing.`);
      }
      return;
    }
    if (signal.aborted) {
      return;
    }
    if (await this.deps.tasks.completeTask(taskId)) {
      this.deps.events.onStatusChange(taskId, "completed");
    } else {
      await this.deps.logger.info(QUEUE_SCOPE, `Task ${taskId} was cancelled while processing.`);
    }
  }
}
