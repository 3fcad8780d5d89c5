export const TASK_STATUSES = ["pending", "processing", "completed", "failed", "cancelled", "paused"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const PROVIDER_IDS = ["openai", "claude", "deepseek", "glm"] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export const OUTPUT_FORMATS = ["mkv", "srt", "ass"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type SidecarFormat = Exclude<OutputFormat, "mkv">;

export type SubtitleFormat = "srt" | "ass";

export type TaskRecord = {
  id: number;
  filePath: string;
  fileName: string;
  status: TaskStatus;
  progress: number;
  sourceLanguage: string | null;
  targetLanguage: string;
  provider: string;
  subtitleTrack: number | null;
  forceOverride: boolean;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
};

export type NewTask = {
  filePath: string;
  fileName: string;
  sourceLanguage: string | null;
  targetLanguage: string;
  provider: string;
  subtitleTrack: number | null;
  forceOverride: boolean;
};

export type WatcherRecord = {
  id: number;
  path: string;
  enabled: boolean;
  targetLanguage: string;
  provider: string;
  createdAt: Date;
};

export type TranslatedFileRecord = {
  filePath: string;
  targetLanguage: string;
  outputPath: string;
  translatedAt: Date;
};

export type TaskLogEntry = {
  scope: string;
  level: "info" | "warn" | "error";
  message: string;
  createdAt: Date;
};

export type SubtitleTrack = {
  index: number;
  codec: string;
  language: string | null;
  title: string | null;
};

export type SubtitleEvent = {
  start: number;
  end: number;
  text: string;
  style: string;
  kind: "Dialogue" | "Comment";
  fields: Record<string, string>;
};

export type SubtitleStyle = {
  name: string;
  fontSize: number;
  values: Record<string, string>;
};

export type SubtitleSection = {
  header: string;
  lines: string[];
};

export type SubtitleDocument = {
  format: SubtitleFormat;
  scriptInfo: string[];
  styleFormat: string[];
  styles: SubtitleStyle[];
  eventFormat: string[];
  events: SubtitleEvent[];
  extraSections: SubtitleSection[];
};

export type SkipDecision = { skip: false; reason: null } | { skip: true; reason: string };

export type OutputSettings = {
  subtitleOutputFormat: OutputFormat;
  overwriteMkv: boolean;
};

export type TaskStats = Record<TaskStatus, number> & { total: number };
