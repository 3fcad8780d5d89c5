import { errorMessage } from "../domain/errors";
import type { TaskStatus } from "../domain/types";
import type { TaskEventSink } from "../interfaces/ports";

export interface TaskEventObserver {
  onProgress?(taskId: number, progress: number): void | Promise<void>;
  onStatusChange?(taskId: number, status: TaskStatus): void | Promise<void>;
  onTaskCreated?(taskId: number): void | Promise<void>;
}

type Delivery = (observer: TaskEventObserver) => void | Promise<void>;

/** Fans task events out to observers. Delivery is fire-and-forget and isolated per observer. */
export class TaskEventBroadcaster implements TaskEventSink {
  private observers = new Set<TaskEventObserver>();

  constructor(private readonly onObserverError: (message: string) => void = (message) => console.error(message)) {}

  subscribe(observer: TaskEventObserver) {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  onProgress(taskId: number, progress: number) {
    this.publish("progress", (observer) => observer.onProgress?.(taskId, progress));
  }

  onStatusChange(taskId: number, status: TaskStatus) {
    this.publish("status", (observer) => observer.onStatusChange?.(taskId, status));
  }

  onTaskCreated(taskId: number) {
    this.publish("new_task", (observer) => observer.onTaskCreated?.(taskId));
  }

  private publish(event: string, deliver: Delivery) {
    for (const observer of this.observers) {
      void Promise.resolve()
        .then(() => deliver(observer))
        .catch((error: unknown) => {
          this.onObserverError(`Task event observer failed (${event}): ${errorMessage(error)}`);
        });
    }
  }
}
