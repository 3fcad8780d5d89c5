import path from "node:path";
import { z } from "zod";
import {
  InvalidTaskTransitionError,
  TaskInputError,
  TaskNotFoundError,
  TaskSkippedError,
  errorMessage
} from "../domain/errors";
import { isRetryableStatus } from "../domain/taskState";
import { TASK_STATUSES } from "../domain/types";
import type { TaskRecord, TaskStats } from "../domain/types";
import type { TaskDependencies } from "./dependencies";
import { isGeneratedOutput } from "./fileFilters";
import { QUEUE_SCOPE, taskScope } from "./logScopes";
import { isContainerFile, isSubtitleFile, isSupportedFile, sidecarPath } from "./outputPaths";
import { resolveSettings } from "./settingsService";
import { outputAlreadyPresent, shouldSkip } from "./skipDetection";
import type { TaskRunContext } from "./taskQueue";
import { resolveSubtitleFormat, translateContainer, translateSubtitleFile } from "./translationPipeline";
import { parseInput, providerSchema } from "./validation";

export const createTaskSchema = z.object({
  filePath: z.string().trim().min(1),
  sourceLanguage: z.string().trim().min(1).nullish(),
  targetLanguage: z.string().trim().min(1).default("Chinese"),
  provider: providerSchema.default("openai"),
  subtitleTrack: z.number().int().nonnegative().nullish(),
  forceOverride: z.boolean().default(false)
});

export type CreateTaskInput = z.input<typeof createTaskSchema>;

export const createDirectoryTasksSchema = createTaskSchema.omit({ filePath: true, subtitleTrack: true }).extend({
  directoryPath: z.string().trim().min(1),
  recursive: z.boolean().default(true)
});

export type CreateDirectoryTasksInput = z.input<typeof createDirectoryTasksSchema>;

export const listTasksSchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  limit: z.number().int().min(1).max(500).default(100),
  offset: z.number().int().min(0).default(0)
});

const ORPHANED_MESSAGE = "Interrupted before completion; retry to run it again";

export async function createTask(input: CreateTaskInput, deps: TaskDependencies) {
  const data = parseInput(createTaskSchema, input);
  const filePath = path.resolve(data.filePath);
  if (!(await deps.storage.exists(filePath))) {
    throw new TaskInputError(`File not found: ${filePath}`);
  }
  if (!isSupportedFile(filePath)) {
    throw new TaskInputError("File must be an MKV, SRT, or ASS file");
  }

  const decision = await shouldSkip(filePath, data.targetLanguage, data.forceOverride, deps);
  if (decision.skip) {
    throw new TaskSkippedError(decision.reason);
  }

  const task = await deps.tasks.createTask({
    filePath,
    fileName: path.basename(filePath),
    sourceLanguage: data.sourceLanguage ?? null,
    targetLanguage: data.targetLanguage,
    provider: data.provider,
    subtitleTrack: isContainerFile(filePath) ? data.subtitleTrack ?? null : null,
    forceOverride: data.forceOverride
  });
  if (!task) {
    throw new TaskSkippedError("Task already exists for this file and language");
  }
  await deps.logger.info(taskScope(task.id), `Task queued for ${filePath} -> ${task.targetLanguage}.`);
  deps.events.onTaskCreated(task.id);
  return task;
}

export async function createDirectoryTasks(input: CreateDirectoryTasksInput, deps: TaskDependencies) {
  const data = parseInput(createDirectoryTasksSchema, input);
  const directoryPath = path.resolve(data.directoryPath);
  if (!(await deps.storage.isDirectory(directoryPath))) {
    throw new TaskInputError(`Directory not found: ${directoryPath}`);
  }

  const files = (await deps.storage.walkFiles(directoryPath, data.recursive)).filter(
    (filePath) => isSupportedFile(filePath) && !isGeneratedOutput(filePath, data.targetLanguage)
  );
  if (!files.length) {
    throw new TaskInputError("No MKV, SRT, or ASS files found in directory");
  }

  const created: TaskRecord[] = [];
  const skipped: Array<{ filePath: string; reason: string }> = [];
  for (const filePath of files) {
    try {
      created.push(
        await createTask(
          {
            filePath,
            sourceLanguage: data.sourceLanguage,
            targetLanguage: data.targetLanguage,
            provider: data.provider,
            forceOverride: data.forceOverride
          },
          deps
        )
      );
    } catch (error) {
      if (error instanceof TaskSkippedError) {
        skipped.push({ filePath, reason: error.reason });
      } else if (error instanceof TaskInputError) {
        await deps.logger.warn(QUEUE_SCOPE, `Not queued ${filePath}: ${error.message}`);
        skipped.push({ filePath, reason: error.message });
      } else {
        throw error;
      }
    }
  }
  return { created, skipped };
}

export async function getTask(taskId: number, deps: TaskDependencies) {
  const task = await deps.tasks.getTask(taskId);
  if (!task) {
    throw new TaskNotFoundError(taskId);
  }
  return task;
}

export async function listTasks(input: z.input<typeof listTasksSchema>, deps: TaskDependencies) {
  return deps.tasks.listTasks(parseInput(listTasksSchema, input));
}

export async function getTaskStats(deps: TaskDependencies): Promise<TaskStats> {
  const counts = await deps.tasks.countByStatus();
  const total = Object.values(counts).reduce((sum, value) => sum + value, 0);
  return { ...counts, total };
}

export async function cancelTask(taskId: number, deps: TaskDependencies) {
  const task = await getTask(taskId, deps);
  if (!(await deps.tasks.cancelTask(taskId))) {
    throw new InvalidTaskTransitionError(taskId, task.status, "cancelled");
  }
  await deps.logger.info(taskScope(taskId), "Task cancelled.");
  deps.events.onStatusChange(taskId, "cancelled");
}

/** A processing task is cancelled in place; any other task is removed. */
export async function deleteTask(taskId: number, deps: TaskDependencies) {
  const task = await getTask(taskId, deps);
  const result = await deps.tasks.deleteTasks([taskId]);
  if (result.cancelled) {
    await deps.logger.info(taskScope(taskId), "Task cancelled by delete request.");
    deps.events.onStatusChange(taskId, "cancelled");
    return { taskId, action: "cancelled" as const };
  }
  if (!result.deleted) {
    throw new TaskNotFoundError(task.id);
  }
  return { taskId, action: "deleted" as const };
}

export async function deleteTasks(taskIds: number[], deps: TaskDependencies) {
  return deps.tasks.deleteTasks(taskIds);
}

export async function deleteAllTasks(deps: TaskDependencies) {
  return deps.tasks.deleteTasks(null);
}

export async function pauseTasks(taskIds: number[], deps: TaskDependencies) {
  return { paused: await deps.tasks.pauseTasks(taskIds) };
}

export async function pauseAllTasks(deps: TaskDependencies) {
  return { paused: await deps.tasks.pauseTasks(null) };
}

export async function retryTask(taskId: number, deps: TaskDependencies) {
  const task = await getTask(taskId, deps);
  if (!isRetryableStatus(task.status) || !(await deps.tasks.retryTask(taskId))) {
    throw new InvalidTaskTransitionError(taskId, task.status, "pending");
  }
  await deps.logger.info(taskScope(taskId), `Task re-queued from ${task.status}.`);
  deps.events.onStatusChange(taskId, "pending");
  return getTask(taskId, deps);
}

export async function listTaskLogs(taskId: number, deps: TaskDependencies, limit = 200) {
  await getTask(taskId, deps);
  return deps.logs.list(taskScope(taskId), limit);
}

/** Moves tasks a previous process left in processing to failed, so they can be retried. */
export async function failOrphanedTasks(deps: TaskDependencies) {
  const orphaned = await deps.tasks.failOrphanedTasks(ORPHANED_MESSAGE);
  for (const taskId of orphaned) {
    await deps.logger.warn(taskScope(taskId), ORPHANED_MESSAGE);
    deps.events.onStatusChange(taskId, "failed");
  }
  return orphaned;
}

/** Queue handler: translates one claimed task and records the output. */
export async function processTask(taskId: number, context: TaskRunContext, deps: TaskDependencies) {
  const task = await deps.tasks.getTask(taskId);
  if (!task) {
    await deps.logger.warn(QUEUE_SCOPE, `Task ${taskId} disappeared before processing.`);
    return;
  }
  const scope = taskScope(taskId);
  const settings = await resolveSettings(deps);
  const { signal } = context;
  await deps.logger.info(scope, `Processing ${task.filePath} -> ${task.targetLanguage} with ${task.provider}.`);

  try {
    const decision = await outputAlreadyPresent(task, settings, deps, signal);
    if (decision.skip) {
      await deps.logger.info(scope, `Skipped: ${decision.reason}`);
      await context.reportProgress(100);
      return;
    }

    const provider = deps.providers.create(task.provider, settings);
    const sourceLanguage = task.sourceLanguage ?? settings.sourceLanguage;
    let outputPath: string;

    if (isSubtitleFile(task.filePath)) {
      const format = resolveSubtitleFormat(settings.subtitleOutputFormat, task.filePath);
      outputPath = await translateSubtitleFile(
        {
          sourcePath: task.filePath,
          outputPath: sidecarPath(task.filePath, task.targetLanguage, format),
          provider,
          sourceLanguage,
          targetLanguage: task.targetLanguage,
          bilingual: settings.bilingualOutput,
          outputFormat: format,
          onProgress: context.reportProgress,
          signal,
          logScope: scope
        },
        { ...deps, tempDir: settings.tempDir }
      );
    } else {
      outputPath = await translateContainer(
        {
          containerPath: task.filePath,
          targetLanguage: task.targetLanguage,
          provider,
          trackIndex: task.subtitleTrack,
          sourceLanguage,
          bilingual: settings.bilingualOutput,
          outputFormat: settings.subtitleOutputFormat,
          overwrite: settings.overwriteMkv,
          onProgress: context.reportProgress,
          signal,
          logScope: scope
        },
        { ...deps, tempDir: settings.tempDir }
      );
    }

    const current = await deps.tasks.getTask(taskId);
    if (current?.status === "cancelled") {
      await deps.logger.info(scope, "Task was cancelled; output not recorded.");
      return;
    }
    await deps.translatedFiles.upsert({ filePath: task.filePath, targetLanguage: task.targetLanguage, outputPath });
    await deps.logger.info(scope, `Translation written to ${outputPath}.`);
  } catch (error) {
    if (!signal.aborted) {
      await deps.logger.error(scope, errorMessage(error));
    }
    throw error;
  }
}
