import path from "node:path";
import chokidar from "chokidar";
import { errorMessage } from "../domain/errors";
import type { LoggerPort, StoragePort } from "../interfaces/ports";
import { EventChannel } from "./eventChannel";
import { shouldSkipFile } from "./fileFilters";
import { WATCHER_SCOPE } from "./logScopes";

export type NewFileCallback = (filePath: string, targetLanguage: string, provider: string) => Promise<boolean>;

export type WatchSubscription = {
  close(): Promise<void>;
};

export type WatchSubscriber = (
  root: string,
  onAdd: (filePath: string) => void,
  onError: (error: Error) => void
) => WatchSubscription;

export type ScanResult = {
  scanned: number;
  triggered: number;
};

type WatchHandle = {
  id: number;
  root: string;
  targetLanguage: string;
  provider: string;
  subscription: WatchSubscription;
  seen: Set<string>;
};

type FileEvent = {
  watcherId: number;
  filePath: string;
};

export const chokidarSubscriber: WatchSubscriber = (root, onAdd, onError) => {
  const watcher = chokidar.watch(root, {
    ignoreInitial: true,
    awaitWriteFinish: { stabilityThreshold: 2000, pollInterval: 250 }
  });
  watcher.on("add", onAdd);
  watcher.on("error", onError);
  return { close: () => watcher.close() };
};

/**
 * Keeps one filesystem subscription per watched root. Notifications are queued on an
 * EventChannel and handled one at a time by a single consumer loop.
 */
export class DirectoryWatcher {
  private handles = new Map<number, WatchHandle>();
  private channel = new EventChannel<FileEvent>();
  private consumer: Promise<void> | null = null;
  private onNewFile: NewFileCallback | null = null;

  constructor(
    private readonly deps: { storage: StoragePort; logger: LoggerPort },
    private readonly subscribe: WatchSubscriber = chokidarSubscriber
  ) {}

  setNewFileCallback(callback: NewFileCallback) {
    this.onNewFile = callback;
  }

  watchedIds() {
    return Array.from(this.handles.keys());
  }

  isWatching(watcherId: number) {
    return this.handles.has(watcherId);
  }

  async watch(watcherId: number, root: string, targetLanguage: string, provider: string) {
    if (this.handles.has(watcherId)) {
      await this.unwatch(watcherId);
    }
    const resolvedRoot = path.resolve(root);
    if (!(await this.deps.storage.isDirectory(resolvedRoot))) {
      throw new Error(`Directory does not exist: ${resolvedRoot}`);
    }
    this.ensureConsumer();

    const subscription = this.subscribe(
      resolvedRoot,
      (filePath) => {
        this.channel.push({ watcherId, filePath });
      },
      (error) => {
        void this.deps.logger.error(WATCHER_SCOPE, `Watcher ${watcherId} error: ${error.message}`);
      }
    );
    this.handles.set(watcherId, {
      id: watcherId,
      root: resolvedRoot,
      targetLanguage,
      provider,
      subscription,
      seen: new Set()
    });
    await this.deps.logger.info(WATCHER_SCOPE, `Started watching ${resolvedRoot} (watcher ${watcherId}).`);
  }

  async unwatch(watcherId: number) {
    const handle = this.handles.get(watcherId);
    if (!handle) {
      return;
    }
    this.handles.delete(watcherId);
    await handle.subscription.close();
    await this.deps.logger.info(WATCHER_SCOPE, `Stopped watching ${handle.root} (watcher ${watcherId}).`);
  }

  async stopAll() {
    await Promise.allSettled(this.watchedIds().map((watcherId) => this.unwatch(watcherId)));
    this.channel.close();
    await this.consumer;
    this.consumer = null;
    this.channel = new EventChannel<FileEvent>();
  }

  /** Walks `root` recursively and feeds every candidate file to the new-file callback. */
  async scan(root: string, targetLanguage: string, provider: string): Promise<ScanResult> {
    const result: ScanResult = { scanned: 0, triggered: 0 };
    const callback = this.onNewFile;
    if (!callback) {
      return result;
    }
    const files = await this.deps.storage.walkFiles(root, true);
    for (const filePath of files) {
      if (await shouldSkipFile(filePath, targetLanguage, this.deps.storage)) {
        continue;
      }
      result.scanned += 1;
      try {
        if (await callback(filePath, targetLanguage, provider)) {
          result.triggered += 1;
        }
      } catch (error) {
        await this.deps.logger.error(WATCHER_SCOPE, `Error handling ${filePath}: ${errorMessage(error)}`);
      }
    }
    await this.deps.logger.info(
      WATCHER_SCOPE,
      `Scan of ${root}: ${result.scanned} candidate files, ${result.triggered} tasks created.`
    );
    return result;
  }

  private ensureConsumer() {
    if (!this.consumer) {
      this.consumer = this.consume();
    }
  }

  private async consume() {
    for await (const event of this.channel) {
      try {
        await this.handleEvent(event);
      } catch (error) {
        await this.deps.logger.error(WATCHER_SCOPE, `Error handling ${event.filePath}: ${errorMessage(error)}`);
      }
    }
  }

  private async handleEvent(event: FileEvent) {
    const handle = this.handles.get(event.watcherId);
    const callback = this.onNewFile;
    if (!handle || !callback) {
      return;
    }
    const filePath = path.resolve(event.filePath);
    if (handle.seen.has(filePath)) {
      return;
    }
    if (await shouldSkipFile(filePath, handle.targetLanguage, this.deps.storage)) {
      return;
    }
    handle.seen.add(filePath);
    await this.deps.logger.info(WATCHER_SCOPE, `New file detected: ${filePath}`);
    await callback(filePath, handle.targetLanguage, handle.provider);
  }
}
