import { z } from "zod";
import { OUTPUT_FORMATS, PROVIDER_IDS } from "../domain/types";
import type { OutputSettings } from "../domain/types";

const booleanish = z.preprocess(
  (value) => (typeof value === "string" ? ["true", "1", "yes", "on"].includes(value.trim().toLowerCase()) : value),
  z.boolean()
);

const optionalUrl = z.preprocess((value) => (value === "" ? undefined : value), z.string().url().optional());

export const settingsSchema = z.object({
  openaiApiKey: z.string().default(""),
  openaiModel: z.string().min(1).default("gpt-4"),
  openaiBaseUrl: optionalUrl,
  claudeApiKey: z.string().default(""),
  claudeModel: z.string().min(1).default("claude-3-sonnet-20240229"),
  claudeBaseUrl: z.string().url().default("https://api.anthropic.com"),
  deepseekApiKey: z.string().default(""),
  deepseekModel: z.string().min(1).default("deepseek-chat"),
  deepseekBaseUrl: z.string().url().default("https://api.deepseek.com"),
  glmApiKey: z.string().default(""),
  glmModel: z.string().min(1).default("glm-4.6"),
  glmBaseUrl: z.string().url().default("https://open.bigmodel.cn/api/paas/v4"),
  defaultProvider: z.enum(PROVIDER_IDS).default("openai"),
  targetLanguage: z.string().trim().min(1).default("Chinese"),
  sourceLanguage: z.string().trim().min(1).default("auto"),
  bilingualOutput: booleanish.default(false),
  subtitleOutputFormat: z.enum(OUTPUT_FORMATS).catch("mkv"),
  overwriteMkv: booleanish.default(false),
  maxConcurrentTasks: z.coerce.number().int().min(1).max(16).default(2),
  pollIntervalMs: z.coerce.number().int().positive().default(1000),
  tempDir: z.string().min(1).default("./data/temp"),
  databasePath: z.string().min(1).default("./data/tasks.db"),
  logsDir: z.string().min(1).default("./logs"),
  logToDb: booleanish.default(true),
  redisUrl: optionalUrl,
  redisChannel: z.string().min(1).default("subtitle-tasks"),
  scanOnStartup: booleanish.default(true)
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsField = keyof Settings;

export const ENV_SETTING_KEYS = {
  OPENAI_API_KEY: "openaiApiKey",
  OPENAI_MODEL: "openaiModel",
  OPENAI_BASE_URL: "openaiBaseUrl",
  CLAUDE_API_KEY: "claudeApiKey",
  CLAUDE_MODEL: "claudeModel",
  CLAUDE_BASE_URL: "claudeBaseUrl",
  DEEPSEEK_API_KEY: "deepseekApiKey",
  DEEPSEEK_MODEL: "deepseekModel",
  DEEPSEEK_BASE_URL: "deepseekBaseUrl",
  GLM_API_KEY: "glmApiKey",
  GLM_MODEL: "glmModel",
  GLM_BASE_URL: "glmBaseUrl",
  DEFAULT_LLM: "defaultProvider",
  TARGET_LANGUAGE: "targetLanguage",
  SOURCE_LANGUAGE: "sourceLanguage",
  BILINGUAL_OUTPUT: "bilingualOutput",
  SUBTITLE_OUTPUT_FORMAT: "subtitleOutputFormat",
  OVERWRITE_MKV: "overwriteMkv",
  MAX_CONCURRENT_TASKS: "maxConcurrentTasks",
  QUEUE_POLL_INTERVAL_MS: "pollIntervalMs",
  TEMP_DIR: "tempDir",
  DATABASE_PATH: "databasePath",
  LOGS_PATH: "logsDir",
  LOG_TO_DB: "logToDb",
  REDIS_URL: "redisUrl",
  REDIS_CHANNEL: "redisChannel",
  SCAN_ON_STARTUP: "scanOnStartup"
} as const satisfies Record<string, SettingsField>;

// Keys of the app_settings table. Only these are editable at runtime.
export const STORED_SETTING_KEYS = {
  openai_api_key: "openaiApiKey",
  openai_model: "openaiModel",
  openai_base_url: "openaiBaseUrl",
  claude_api_key: "claudeApiKey",
  claude_model: "claudeModel",
  claude_base_url: "claudeBaseUrl",
  deepseek_api_key: "deepseekApiKey",
  deepseek_model: "deepseekModel",
  deepseek_base_url: "deepseekBaseUrl",
  glm_api_key: "glmApiKey",
  glm_model: "glmModel",
  glm_base_url: "glmBaseUrl",
  default_llm: "defaultProvider",
  target_language: "targetLanguage",
  source_language: "sourceLanguage",
  bilingual_output: "bilingualOutput",
  subtitle_output_format: "subtitleOutputFormat",
  overwrite_mkv: "overwriteMkv",
  max_concurrent_tasks: "maxConcurrentTasks"
} as const satisfies Record<string, SettingsField>;

export type StoredSettingKey = keyof typeof STORED_SETTING_KEYS;

function isStoredSettingKey(key: string): key is StoredSettingKey {
  return Object.prototype.hasOwnProperty.call(STORED_SETTING_KEYS, key);
}

export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const raw: Record<string, string> = {};
  for (const [envKey, field] of Object.entries(ENV_SETTING_KEYS)) {
    const value = env[envKey];
    if (value !== undefined) {
      raw[field] = value;
    }
  }
  return normalizeSettings(settingsSchema.parse(raw));
}

/**
 * Layers stored key/value rows over `base`. Each row is validated on its own so a
 * bad value only loses that field; `onInvalid` receives the rejected keys.
 */
export function applyStoredSettings(
  base: Settings,
  stored: Record<string, string>,
  onInvalid?: (key: string, value: string) => void
): Settings {
  let current = base;
  for (const [key, value] of Object.entries(stored)) {
    if (!isStoredSettingKey(key)) {
      continue;
    }
    const candidate = settingsSchema.safeParse({ ...current, [STORED_SETTING_KEYS[key]]: value });
    if (candidate.success) {
      current = candidate.data;
    } else {
      onInvalid?.(key, value);
    }
  }
  return normalizeSettings(current);
}

export function toStoredEntries(patch: Partial<Settings>) {
  const entries: Record<string, string> = {};
  for (const [key, field] of Object.entries(STORED_SETTING_KEYS)) {
    const value = patch[field];
    if (value !== undefined) {
      entries[key] = String(value);
    }
  }
  return entries;
}

export function normalizeOutputSettings(format: string, overwrite: boolean): OutputSettings {
  const parsed = z.enum(OUTPUT_FORMATS).safeParse(format);
  const subtitleOutputFormat = parsed.success ? parsed.data : "mkv";
  if (overwrite) {
    return { subtitleOutputFormat: "mkv", overwriteMkv: true };
  }
  return { subtitleOutputFormat, overwriteMkv: false };
}

export function normalizeSettings(settings: Settings): Settings {
  return { ...settings, ...normalizeOutputSettings(settings.subtitleOutputFormat, settings.overwriteMkv) };
}
