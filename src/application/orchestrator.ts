import type { Settings } from "../config/settings";
import type { TaskDependencies } from "./dependencies";
import { DirectoryWatcher, chokidarSubscriber } from "./directoryWatcher";
import type { WatchSubscriber } from "./directoryWatcher";
import { ORCHESTRATOR_SCOPE } from "./logScopes";
import { normalizeStoredOutputSettings, resolveSettings, updateSettings } from "./settingsService";
import { TaskQueue } from "./taskQueue";
import { failOrphanedTasks, processTask } from "./taskService";
import { initWatchers, onNewFileDetected } from "./watcherService";
import type { WatcherDependencies } from "./watcherService";

/**
 * Owns the worker pool and the directory watcher for one process. Services that need
 * the watcher take `orchestrator.dependencies`.
 */
export class Orchestrator {
  readonly queue: TaskQueue;
  readonly directoryWatcher: DirectoryWatcher;
  readonly dependencies: WatcherDependencies;
  private settings: Settings;

  constructor(deps: TaskDependencies, subscribe: WatchSubscriber = chokidarSubscriber) {
    this.settings = deps.config;
    this.queue = new TaskQueue(deps, {
      workerCount: deps.config.maxConcurrentTasks,
      pollIntervalMs: deps.config.pollIntervalMs
    });
    this.directoryWatcher = new DirectoryWatcher(deps, subscribe);
    this.dependencies = { ...deps, directoryWatcher: this.directoryWatcher };
  }

  get currentSettings() {
    return this.settings;
  }

  async start() {
    const deps = this.dependencies;
    await normalizeStoredOutputSettings(deps);
    this.settings = await resolveSettings(deps);

    const orphaned = await failOrphanedTasks(deps);
    if (orphaned.length) {
      await deps.logger.warn(ORCHESTRATOR_SCOPE, `Marked ${orphaned.length} interrupted tasks as failed.`);
    }

    this.queue.setTaskHandler((taskId, context) => processTask(taskId, context, deps));
    this.queue.setWorkerCount(this.settings.maxConcurrentTasks);
    this.queue.start();

    this.directoryWatcher.setNewFileCallback((filePath, targetLanguage, provider) =>
      onNewFileDetected(filePath, targetLanguage, provider, deps)
    );
    const watching = await initWatchers(deps.config.scanOnStartup, deps);
    await deps.logger.info(
      ORCHESTRATOR_SCOPE,
      `Started with ${this.queue.workerCount} workers and ${watching} directory watchers.`
    );
  }

  async stop() {
    await this.directoryWatcher.stopAll();
    await this.queue.stop();
    await this.dependencies.logger.info(ORCHESTRATOR_SCOPE, "Stopped.");
  }

  async updateSettings(patch: unknown) {
    this.settings = await updateSettings(patch, this.dependencies);
    this.applyWorkerCount();
    return this.settings;
  }

  async reloadSettings() {
    this.settings = await resolveSettings(this.dependencies);
    this.applyWorkerCount();
    return this.settings;
  }

  private applyWorkerCount() {
    if (this.queue.workerCount !== this.settings.maxConcurrentTasks) {
      this.queue.setWorkerCount(this.settings.maxConcurrentTasks);
    }
  }
}
