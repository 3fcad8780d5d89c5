import path from "node:path";
import { z } from "zod";
import { TaskInputError, TaskSkippedError, WatcherConflictError, WatcherNotFoundError, errorMessage } from "../domain/errors";
import type { WatcherRecord } from "../domain/types";
import type { TaskDependencies } from "./dependencies";
import type { DirectoryWatcher } from "./directoryWatcher";
import { WATCHER_SCOPE } from "./logScopes";
import { createTask } from "./taskService";
import { parseInput, providerSchema } from "./validation";

export type WatcherDependencies = TaskDependencies & { directoryWatcher: DirectoryWatcher };

export const addWatcherSchema = z.object({
  path: z.string().trim().min(1),
  targetLanguage: z.string().trim().min(1).default("Chinese"),
  provider: providerSchema.default("openai")
});

export type AddWatcherInput = z.input<typeof addWatcherSchema>;

function scheduleScan(watcher: WatcherRecord, deps: WatcherDependencies) {
  void deps.directoryWatcher.scan(watcher.path, watcher.targetLanguage, watcher.provider).catch((error: unknown) =>
    deps.logger.error(WATCHER_SCOPE, `Initial scan of ${watcher.path} failed: ${errorMessage(error)}`)
  );
}

async function requireWatcher(watcherId: number, deps: WatcherDependencies) {
  const watcher = await deps.watchers.getWatcher(watcherId);
  if (!watcher) {
    throw new WatcherNotFoundError(watcherId);
  }
  return watcher;
}

export async function addWatcher(input: AddWatcherInput, deps: WatcherDependencies) {
  const data = parseInput(addWatcherSchema, input);
  const dirPath = path.resolve(data.path);
  if (!(await deps.storage.isDirectory(dirPath))) {
    throw new TaskInputError(`Directory not found: ${dirPath}`);
  }
  if (await deps.watchers.findByPath(dirPath)) {
    throw new WatcherConflictError(dirPath);
  }

  const watcher = await deps.watchers.createWatcher({
    path: dirPath,
    targetLanguage: data.targetLanguage,
    provider: data.provider
  });
  try {
    await deps.directoryWatcher.watch(watcher.id, watcher.path, watcher.targetLanguage, watcher.provider);
  } catch (error) {
    await deps.watchers.deleteWatcher(watcher.id);
    throw error;
  }
  scheduleScan(watcher, deps);
  return watcher;
}

export async function removeWatcher(watcherId: number, deps: WatcherDependencies) {
  await requireWatcher(watcherId, deps);
  await deps.directoryWatcher.unwatch(watcherId);
  await deps.watchers.deleteWatcher(watcherId);
}

export async function toggleWatcher(watcherId: number, deps: WatcherDependencies) {
  const existing = await requireWatcher(watcherId, deps);
  const enabled = !existing.enabled;
  const watcher = await deps.watchers.setEnabled(watcherId, enabled);
  if (!watcher) {
    throw new WatcherNotFoundError(watcherId);
  }
  if (!enabled) {
    await deps.directoryWatcher.unwatch(watcherId);
    return watcher;
  }
  try {
    await deps.directoryWatcher.watch(watcher.id, watcher.path, watcher.targetLanguage, watcher.provider);
  } catch (error) {
    await deps.watchers.setEnabled(watcherId, false);
    throw error;
  }
  scheduleScan(watcher, deps);
  return watcher;
}

export async function listWatchers(deps: WatcherDependencies) {
  return deps.watchers.listWatchers();
}

/** Subscribes every enabled watcher. A directory that has gone away is logged and left enabled. */
export async function initWatchers(scanExisting: boolean, deps: WatcherDependencies) {
  const watchers = await deps.watchers.listWatchers({ enabledOnly: true });
  let started = 0;
  for (const watcher of watchers) {
    try {
      await deps.directoryWatcher.watch(watcher.id, watcher.path, watcher.targetLanguage, watcher.provider);
      started += 1;
    } catch (error) {
      await deps.logger.error(WATCHER_SCOPE, `Could not watch ${watcher.path}: ${errorMessage(error)}`);
      continue;
    }
    if (scanExisting) {
      scheduleScan(watcher, deps);
    }
  }
  return started;
}

/** New-file callback for the DirectoryWatcher. Resolves true when a task was queued. */
export async function onNewFileDetected(
  filePath: string,
  targetLanguage: string,
  provider: string,
  deps: WatcherDependencies
) {
  try {
    await createTask({ filePath, targetLanguage, provider }, deps);
    return true;
  } catch (error) {
    if (error instanceof TaskSkippedError || error instanceof TaskInputError) {
      await deps.logger.info(WATCHER_SCOPE, `Not queued ${filePath}: ${error.message}`);
      return false;
    }
    throw error;
  }
}
