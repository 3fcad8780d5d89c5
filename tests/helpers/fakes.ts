import { promises as fs } from "node:fs";
import { loadSettings } from "../../src/config/settings";
import type { Settings } from "../../src/config/settings";
import type { TaskDependencies } from "../../src/application/dependencies";
import type { WatchSubscriber } from "../../src/application/directoryWatcher";
import type { ProviderId, SubtitleTrack, TaskStatus } from "../../src/domain/types";
import type {
  ContainerPort,
  LoggerPort,
  ProviderFactoryPort,
  TaskEventSink,
  TranslationProvider
} from "../../src/interfaces/ports";
import { openDatabase } from "../../src/infrastructure/repo/database";
import type { DatabaseHandle } from "../../src/infrastructure/repo/database";
import { SqliteLogStore } from "../../src/infrastructure/repo/logRepository";
import { SqliteSettingsStore } from "../../src/infrastructure/repo/settingsRepository";
import { SqliteTaskRepository } from "../../src/infrastructure/repo/taskRepository";
import { SqliteTranslatedFileRepository } from "../../src/infrastructure/repo/translatedFileRepository";
import { SqliteWatcherRepository } from "../../src/infrastructure/repo/watcherRepository";
import { LocalStorage } from "../../src/infrastructure/storage/localStorage";
import { SubtitleService } from "../../src/infrastructure/subtitles/subtitles";

export class MemoryLogger implements LoggerPort {
  entries: Array<{ level: "info" | "warn" | "error"; scope: string; message: string }> = [];

  async info(scope: string, message: string) {
    this.entries.push({ level: "info", scope, message });
  }

  async warn(scope: string, message: string) {
    this.entries.push({ level: "warn", scope, message });
  }

  async error(scope: string, message: string) {
    this.entries.push({ level: "error", scope, message });
  }

  messages(level: "info" | "warn" | "error") {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export class RecordingEvents implements TaskEventSink {
  progress: Array<[number, number]> = [];
  statuses: Array<[number, TaskStatus]> = [];
  created: number[] = [];

  onProgress(taskId: number, progress: number) {
    this.progress.push([taskId, progress]);
  }

  onStatusChange(taskId: number, status: TaskStatus) {
    this.statuses.push([taskId, status]);
  }

  onTaskCreated(taskId: number) {
    this.created.push(taskId);
  }
}

/** Prefixes each line with the target language. Batches or single lines can be made to fail. */
export class PrefixProvider implements TranslationProvider {
  readonly id: ProviderId = "openai";
  batchCalls = 0;
  lineCalls = 0;
  failBatches = false;
  failingLines = new Set<string>();

  async translate(text: string, _sourceLanguage: string, targetLanguage: string) {
    this.lineCalls += 1;
    if (this.failingLines.has(text)) {
      throw new Error(`cannot translate ${text}`);
    }
    return `[${targetLanguage}] ${text}`;
  }

  async translateBatch(texts: string[], _sourceLanguage: string, targetLanguage: string) {
    this.batchCalls += 1;
    if (this.failBatches) {
      throw new Error("batch rejected");
    }
    return texts.map((text) => `[${targetLanguage}] ${text}`);
  }
}

export class StaticProviderFactory implements ProviderFactoryPort {
  requested: string[] = [];

  constructor(private readonly provider: TranslationProvider) {}

  create(providerId: string, _settings: Settings) {
    this.requested.push(providerId);
    return this.provider;
  }
}

/** Container stand-in: "extracts" a fixed SRT and "muxes" by writing a marker file. */
export class FakeContainer implements ContainerPort {
  extracted: Array<{ filePath: string; trackIndex: number }> = [];
  muxed: Array<{ containerPath: string; languageCode: string; trackName: string; subtitle: string }> = [];
  inspections = 0;

  constructor(
    public tracks: SubtitleTrack[],
    private readonly subtitle: string
  ) {}

  async listSubtitleTracks(_filePath: string) {
    this.inspections += 1;
    return this.tracks;
  }

  async extractSubtitle(options: { filePath: string; trackIndex: number; outputPath: string }) {
    this.extracted.push({ filePath: options.filePath, trackIndex: options.trackIndex });
    await fs.writeFile(options.outputPath, this.subtitle, "utf-8");
    return options.outputPath;
  }

  async muxSubtitle(options: {
    containerPath: string;
    subtitlePath: string;
    outputPath: string;
    languageCode: string;
    trackName: string;
  }) {
    const subtitle = await fs.readFile(options.subtitlePath, "utf-8");
    this.muxed.push({
      containerPath: options.containerPath,
      languageCode: options.languageCode,
      trackName: options.trackName,
      subtitle
    });
    await fs.writeFile(options.outputPath, `muxed:${options.trackName}`, "utf-8");
    return options.outputPath;
  }
}

function srtTime(seconds: number) {
  const minutes = Math.floor(seconds / 60);
  return `00:${String(minutes).padStart(2, "0")}:${String(seconds % 60).padStart(2, "0")},000`;
}

/** One cue per line, each a second long, two seconds apart. */
export function srtOf(lines: string[]) {
  return lines
    .map((line, index) => `${index + 1}\n${srtTime(index * 2)} --> ${srtTime(index * 2 + 1)}\n${line}\n`)
    .join("\n");
}

export type TestContext = {
  deps: TaskDependencies;
  database: DatabaseHandle;
  logger: MemoryLogger;
  events: RecordingEvents;
  provider: PrefixProvider;
  providers: StaticProviderFactory;
  container: FakeContainer;
};

export function createTestContext(env: Record<string, string>, container = new FakeContainer([], "")): TestContext {
  const database = openDatabase(":memory:");
  const logger = new MemoryLogger();
  const events = new RecordingEvents();
  const provider = new PrefixProvider();
  const providers = new StaticProviderFactory(provider);
  const deps: TaskDependencies = {
    tasks: new SqliteTaskRepository(database.db),
    watchers: new SqliteWatcherRepository(database.db),
    translatedFiles: new SqliteTranslatedFileRepository(database.db),
    settingsStore: new SqliteSettingsStore(database.db),
    container,
    subtitles: new SubtitleService(),
    storage: new LocalStorage(),
    providers,
    events,
    logs: new SqliteLogStore(database.db),
    logger,
    config: loadSettings(env)
  };
  return { deps, database, logger, events, provider, providers, container };
}

/** In-process stand-in for the filesystem subscription used by DirectoryWatcher. */
export class FakeSubscriptions {
  private listeners = new Map<string, (filePath: string) => void>();
  closed: string[] = [];

  subscribe: WatchSubscriber = (root, onAdd) => {
    this.listeners.set(root, onAdd);
    return {
      close: async () => {
        this.listeners.delete(root);
        this.closed.push(root);
      }
    };
  };

  get roots() {
    return Array.from(this.listeners.keys());
  }

  emit(root: string, filePath: string) {
    const listener = this.listeners.get(root);
    if (!listener) {
      throw new Error(`No subscription for ${root}`);
    }
    listener(filePath);
  }
}
