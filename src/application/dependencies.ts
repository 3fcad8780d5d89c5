import type { Settings } from "../config/settings";
import type {
  ContainerPort,
  LogStorePort,
  LoggerPort,
  ProviderFactoryPort,
  SettingsStorePort,
  StoragePort,
  SubtitlePort,
  TaskEventSink,
  TaskRepositoryPort,
  TranslatedFileRepositoryPort,
  WatcherRepositoryPort
} from "../interfaces/ports";

export interface TaskDependencies {
  tasks: TaskRepositoryPort;
  watchers: WatcherRepositoryPort;
  translatedFiles: TranslatedFileRepositoryPort;
  settingsStore: SettingsStorePort;
  container: ContainerPort;
  subtitles: SubtitlePort;
  storage: StoragePort;
  providers: ProviderFactoryPort;
  events: TaskEventSink;
  logs: LogStorePort;
  logger: LoggerPort;
  // Environment-derived settings; stored overrides are layered on top per task.
  config: Settings;
}
