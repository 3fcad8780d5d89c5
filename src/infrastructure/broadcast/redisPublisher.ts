import IORedis from "ioredis";
import type { TaskEventObserver } from "../../application/eventBroadcaster";
import { BROADCAST_SCOPE } from "../../application/logScopes";
import type { TaskStatus } from "../../domain/types";
import type { LoggerPort } from "../../interfaces/ports";

export type TaskEventMessage =
  | { type: "progress"; task_id: number; progress: number }
  | { type: "status"; task_id: number; status: TaskStatus }
  | { type: "new_task"; task_id: number };

export type Publisher = {
  publish(channel: string, message: string): Promise<number>;
  quit(): Promise<unknown>;
  on(event: "error", listener: (error: Error) => void): unknown;
};

/**
 * Publishes task events as JSON messages on one Redis channel. Connection errors are
 * logged once per outage; the next successful publish re-arms the warning.
 */
export class RedisTaskEventPublisher implements TaskEventObserver {
  private readonly client: Publisher;
  private warnedFailure = false;

  constructor(
    redisUrlOrClient: string | Publisher,
    private readonly channel: string,
    private readonly logger: LoggerPort
  ) {
    this.client =
      typeof redisUrlOrClient === "string"
        ? new IORedis(redisUrlOrClient, { maxRetriesPerRequest: 1, lazyConnect: true })
        : redisUrlOrClient;
    this.client.on("error", (error) => {
      if (this.warnedFailure) {
        return;
      }
      this.warnedFailure = true;
      void this.logger.warn(BROADCAST_SCOPE, `Redis connection error: ${error.message}`);
    });
  }

  async onProgress(taskId: number, progress: number) {
    await this.send({ type: "progress", task_id: taskId, progress });
  }

  async onStatusChange(taskId: number, status: TaskStatus) {
    await this.send({ type: "status", task_id: taskId, status });
  }

  async onTaskCreated(taskId: number) {
    await this.send({ type: "new_task", task_id: taskId });
  }

  async close() {
    await this.client.quit();
  }

  private async send(message: TaskEventMessage) {
    await this.client.publish(this.channel, JSON.stringify(message));
    this.warnedFailure = false;
  }
}
