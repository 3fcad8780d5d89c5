import type {
  NewTask,
  ProviderId,
  SubtitleDocument,
  SubtitleFormat,
  SubtitleTrack,
  TaskLogEntry,
  TaskRecord,
  TaskStatus,
  TranslatedFileRecord,
  WatcherRecord
} from "../domain/types";
import type { Settings } from "../config/settings";

export interface ContainerPort {
  listSubtitleTracks(filePath: string, signal?: AbortSignal): Promise<SubtitleTrack[]>;
  extractSubtitle(options: {
    filePath: string;
    trackIndex: number;
    outputPath: string;
    signal?: AbortSignal;
  }): Promise<string>;
  muxSubtitle(options: {
    containerPath: string;
    subtitlePath: string;
    outputPath: string;
    languageCode: string;
    trackName: string;
    signal?: AbortSignal;
  }): Promise<string>;
}

export interface SubtitlePort {
  load(filePath: string): Promise<SubtitleDocument>;
  save(document: SubtitleDocument, filePath: string, format?: SubtitleFormat): Promise<void>;
  composeBilingual(original: SubtitleDocument, translated: SubtitleDocument, format: SubtitleFormat): SubtitleDocument;
}

export interface TranslationProvider {
  readonly id: ProviderId;
  translate(text: string, sourceLanguage: string, targetLanguage: string, signal?: AbortSignal): Promise<string>;
  translateBatch(
    texts: string[],
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<string[]>;
}

export interface ProviderFactoryPort {
  create(providerId: string, settings: Settings): TranslationProvider;
}

export interface StoragePort {
  exists(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
  listDirectory(path: string): Promise<string[]>;
  walkFiles(root: string, recursive: boolean): Promise<string[]>;
  ensureDir(path: string): Promise<string>;
  move(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export interface TaskRepositoryPort {
  createTask(input: NewTask): Promise<TaskRecord | null>;
  getTask(taskId: number): Promise<TaskRecord | null>;
  findActiveTask(filePath: string, targetLanguage: string): Promise<TaskRecord | null>;
  listTasks(options: { status?: TaskStatus; limit: number; offset: number }): Promise<{ tasks: TaskRecord[]; total: number }>;
  countByStatus(): Promise<Record<TaskStatus, number>>;
  claimNextPending(): Promise<number | null>;
  updateProgress(taskId: number, progress: number): Promise<boolean>;
  completeTask(taskId: number): Promise<boolean>;
  failTask(taskId: number, message: string): Promise<boolean>;
  cancelTask(taskId: number): Promise<boolean>;
  deleteTasks(taskIds: number[] | null): Promise<{ cancelled: number; deleted: number }>;
  pauseTasks(taskIds: number[] | null): Promise<number>;
  retryTask(taskId: number): Promise<boolean>;
  failOrphanedTasks(message: string): Promise<number[]>;
}

export interface WatcherRepositoryPort {
  createWatcher(input: { path: string; targetLanguage: string; provider: string }): Promise<WatcherRecord>;
  getWatcher(watcherId: number): Promise<WatcherRecord | null>;
  findByPath(path: string): Promise<WatcherRecord | null>;
  listWatchers(options?: { enabledOnly?: boolean }): Promise<WatcherRecord[]>;
  setEnabled(watcherId: number, enabled: boolean): Promise<WatcherRecord | null>;
  deleteWatcher(watcherId: number): Promise<boolean>;
}

export interface TranslatedFileRepositoryPort {
  find(filePath: string, targetLanguage: string): Promise<TranslatedFileRecord | null>;
  upsert(record: { filePath: string; targetLanguage: string; outputPath: string }): Promise<void>;
}

export interface SettingsStorePort {
  getAll(): Promise<Record<string, string>>;
  setMany(entries: Record<string, string>): Promise<void>;
}

export interface LogStorePort {
  append(entry: TaskLogEntry): Promise<void>;
  list(scope: string, limit: number): Promise<TaskLogEntry[]>;
}

export interface LoggerPort {
  info(scope: string, message: string): Promise<void>;
  warn(scope: string, message: string): Promise<void>;
  error(scope: string, message: string): Promise<void>;
}

export interface TaskEventSink {
  onProgress(taskId: number, progress: number): void;
  onStatusChange(taskId: number, status: TaskStatus): void;
  onTaskCreated(taskId: number): void;
}
