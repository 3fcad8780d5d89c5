import { errorMessage } from "../domain/errors";
import { getLanguageCode } from "../domain/languages";
import { hasLanguageTrack } from "../domain/tracks";
import type { OutputSettings, SkipDecision, TaskRecord } from "../domain/types";
import type { TaskDependencies } from "./dependencies";
import { GUARD_SCOPE } from "./logScopes";
import { isContainerFile, isSidecarFormat, sidecarPath, translatedContainerPath } from "./outputPaths";

type GuardDependencies = Pick<TaskDependencies, "tasks" | "translatedFiles" | "container" | "storage" | "logger">;

const PROCEED: SkipDecision = { skip: false, reason: null };

function skip(reason: string): SkipDecision {
  return { skip: true, reason };
}

/**
 * Decides whether translating `sourcePath` into `targetLanguage` would duplicate
 * work. An active task always blocks; force-override bypasses every other check.
 */
export async function shouldSkip(
  sourcePath: string,
  targetLanguage: string,
  forceOverride: boolean,
  deps: GuardDependencies
): Promise<SkipDecision> {
  const active = await deps.tasks.findActiveTask(sourcePath, targetLanguage);
  if (active) {
    return skip(`Task already exists (id=${active.id}, status=${active.status})`);
  }
  if (forceOverride) {
    return PROCEED;
  }

  if (await deps.translatedFiles.find(sourcePath, targetLanguage)) {
    return skip("Already translated (recorded in database)");
  }

  if (isContainerFile(sourcePath)) {
    const languageCode = getLanguageCode(targetLanguage);
    try {
      const tracks = await deps.container.listSubtitleTracks(sourcePath);
      if (hasLanguageTrack(tracks, languageCode)) {
        return skip(`File already has ${targetLanguage} subtitle track`);
      }
    } catch (error) {
      await deps.logger.warn(GUARD_SCOPE, `Could not inspect ${sourcePath}: ${errorMessage(error)}`);
    }
  }

  for (const format of ["srt", "ass"] as const) {
    const candidate = sidecarPath(sourcePath, targetLanguage, format);
    if (await deps.storage.exists(candidate)) {
      return skip(`Output file already exists: ${candidate}`);
    }
  }
  const translated = translatedContainerPath(sourcePath);
  if (await deps.storage.exists(translated)) {
    return skip(`Translated file already exists: ${translated}`);
  }
  return PROCEED;
}

/** Re-check after a claim, against the output this task would actually write. */
export async function outputAlreadyPresent(
  task: TaskRecord,
  output: OutputSettings,
  deps: GuardDependencies,
  signal?: AbortSignal
): Promise<SkipDecision> {
  if (task.forceOverride) {
    return PROCEED;
  }
  const format = output.subtitleOutputFormat;

  if (!isContainerFile(task.filePath)) {
    if (isSidecarFormat(format)) {
      const candidate = sidecarPath(task.filePath, task.targetLanguage, format);
      if (await deps.storage.exists(candidate)) {
        return skip(`Output file already exists: ${candidate}`);
      }
    }
    return PROCEED;
  }

  if (isSidecarFormat(format)) {
    const candidate = sidecarPath(task.filePath, task.targetLanguage, format);
    if (await deps.storage.exists(candidate)) {
      return skip(`Output file already exists: ${candidate}`);
    }
  }
  const tracks = await deps.container.listSubtitleTracks(task.filePath, signal);
  if (hasLanguageTrack(tracks, getLanguageCode(task.targetLanguage))) {
    return skip(`File already has ${task.targetLanguage} subtitle track`);
  }
  if (!output.overwriteMkv) {
    const translated = translatedContainerPath(task.filePath);
    if (await deps.storage.exists(translated)) {
      return skip(`Translated file already exists: ${translated}`);
    }
  }
  return PROCEED;
}
