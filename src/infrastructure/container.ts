import path from "node:path";
import type { Settings } from "../config/settings";
import type { TaskDependencies } from "../application/dependencies";
import { TaskEventBroadcaster } from "../application/eventBroadcaster";
import { BROADCAST_SCOPE } from "../application/logScopes";
import { RedisTaskEventPublisher } from "./broadcast/redisPublisher";
import { LocalLogger } from "./logger/localLogger";
import { MkvContainer } from "./media/mkvContainer";
import { ProviderFactory } from "./providers/providerFactory";
import { openDatabase } from "./repo/database";
import { SqliteLogStore } from "./repo/logRepository";
import { SqliteSettingsStore } from "./repo/settingsRepository";
import { SqliteTaskRepository } from "./repo/taskRepository";
import { SqliteTranslatedFileRepository } from "./repo/translatedFileRepository";
import { SqliteWatcherRepository } from "./repo/watcherRepository";
import { LocalStorage } from "./storage/localStorage";
import { SubtitleService } from "./subtitles/subtitles";

export type Runtime = {
  deps: TaskDependencies;
  broadcaster: TaskEventBroadcaster;
  close(): Promise<void>;
};

export function createDependencies(settings: Settings): Runtime {
  const database = openDatabase(settings.databasePath);
  const logStore = new SqliteLogStore(database.db);
  const logger = new LocalLogger(path.resolve(settings.logsDir), settings.logToDb ? logStore : null);
  const broadcaster = new TaskEventBroadcaster((message) => {
    void logger.warn(BROADCAST_SCOPE, message);
  });

  const publisher = settings.redisUrl ? new RedisTaskEventPublisher(settings.redisUrl, settings.redisChannel, logger) : null;
  if (publisher) {
    broadcaster.subscribe(publisher);
  }

  const deps: TaskDependencies = {
    tasks: new SqliteTaskRepository(database.db),
    watchers: new SqliteWatcherRepository(database.db),
    translatedFiles: new SqliteTranslatedFileRepository(database.db),
    settingsStore: new SqliteSettingsStore(database.db),
    container: new MkvContainer(),
    subtitles: new SubtitleService(),
    storage: new LocalStorage(),
    providers: new ProviderFactory(),
    events: broadcaster,
    logs: logStore,
    logger,
    config: { ...settings, tempDir: path.resolve(settings.tempDir) }
  };

  return {
    deps,
    broadcaster,
    async close() {
      await publisher?.close();
      database.close();
    }
  };
}
