export const QUEUE_SCOPE = "queue";
export const WATCHER_SCOPE = "watcher";
export const ORCHESTRATOR_SCOPE = "orchestrator";
export const GUARD_SCOPE = "guard";
export const BROADCAST_SCOPE = "broadcast";

export function taskScope(taskId: number) {
  return `task-${taskId}`;
}
