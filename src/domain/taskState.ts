import type { TaskStatus } from "./types";

export const ACTIVE_STATUSES = ["pending", "processing"] as const satisfies readonly TaskStatus[];
export const RETRYABLE_STATUSES = ["failed", "cancelled", "paused"] as const satisfies readonly TaskStatus[];

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["processing", "cancelled", "paused"],
  processing: ["completed", "failed", "cancelled"],
  completed: [],
  failed: ["pending"],
  cancelled: ["pending"],
  paused: ["pending"]
};

export function canTransition(from: TaskStatus, to: TaskStatus) {
  return TRANSITIONS[from].includes(to);
}

export function isActiveStatus(status: TaskStatus) {
  return status === "pending" || status === "processing";
}

export function isRetryableStatus(status: TaskStatus) {
  return canTransition(status, "pending");
}
