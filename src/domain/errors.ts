export class StructuralInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructuralInputError";
  }
}

export class ExternalToolError extends Error {
  constructor(
    readonly tool: string,
    readonly exitCode: number | null,
    message: string,
    readonly detail = ""
  ) {
    super(detail ? `${message}\n${detail}` : message);
    this.name = "ExternalToolError";
  }
}

export class ProviderError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly status: number | null = null
  ) {
    super(`${provider}: ${message}`);
    this.name = "ProviderError";
  }
}

export class TaskInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskInputError";
  }
}

export class TaskSkippedError extends Error {
  constructor(readonly reason: string) {
    super(`Skipped: ${reason}`);
    this.name = "TaskSkippedError";
  }
}

export class TaskNotFoundError extends Error {
  constructor(readonly taskId: number) {
    super(`Task ${taskId} not found`);
    this.name = "TaskNotFoundError";
  }
}

export class InvalidTaskTransitionError extends Error {
  constructor(taskId: number, from: string, to: string) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTaskTransitionError";
  }
}

export class WatcherConflictError extends Error {
  constructor(readonly path: string) {
    super(`Directory is already being watched: ${path}`);
    this.name = "WatcherConflictError";
  }
}

export class WatcherNotFoundError extends Error {
  constructor(readonly watcherId: number) {
    super(`Watcher ${watcherId} not found`);
    this.name = "WatcherNotFoundError";
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : "Unknown error";
}
