import { applyStoredSettings, normalizeOutputSettings, settingsSchema, toStoredEntries } from "../config/settings";
import type { Settings } from "../config/settings";
import type { LoggerPort, SettingsStorePort } from "../interfaces/ports";

const SETTINGS_SCOPE = "settings";

type SettingsDependencies = {
  config: Settings;
  settingsStore: SettingsStorePort;
  logger: LoggerPort;
};

export const settingsPatchSchema = settingsSchema
  .pick({
    openaiApiKey: true,
    openaiModel: true,
    openaiBaseUrl: true,
    claudeApiKey: true,
    claudeModel: true,
    claudeBaseUrl: true,
    deepseekApiKey: true,
    deepseekModel: true,
    deepseekBaseUrl: true,
    glmApiKey: true,
    glmModel: true,
    glmBaseUrl: true,
    defaultProvider: true,
    targetLanguage: true,
    sourceLanguage: true,
    bilingualOutput: true,
    overwriteMkv: true,
    maxConcurrentTasks: true
  })
  .extend({ subtitleOutputFormat: settingsSchema.shape.subtitleOutputFormat.removeCatch() })
  .partial()
  .strict();

export type SettingsPatch = Partial<Settings>;

/** Environment settings with the stored rows layered on top. Invalid rows are logged and ignored. */
export async function resolveSettings(deps: SettingsDependencies) {
  const stored = await deps.settingsStore.getAll();
  const invalid: string[] = [];
  const settings = applyStoredSettings(deps.config, stored, (key) => invalid.push(key));
  for (const key of invalid) {
    await deps.logger.warn(SETTINGS_SCOPE, `Ignoring invalid stored value for ${key}.`);
  }
  return settings;
}

/**
 * Validates and persists a partial update. The output format and overwrite flag are
 * normalized together against the current values before anything is written.
 */
export async function updateSettings(input: unknown, deps: SettingsDependencies) {
  const patch: SettingsPatch = settingsPatchSchema.parse(input);
  const current = await resolveSettings(deps);
  if (patch.subtitleOutputFormat !== undefined || patch.overwriteMkv !== undefined) {
    Object.assign(
      patch,
      normalizeOutputSettings(
        patch.subtitleOutputFormat ?? current.subtitleOutputFormat,
        patch.overwriteMkv ?? current.overwriteMkv
      )
    );
  }
  await deps.settingsStore.setMany(toStoredEntries(patch));
  await deps.logger.info(SETTINGS_SCOPE, `Updated settings: ${Object.keys(patch).sort().join(", ")}.`);
  return resolveSettings(deps);
}

/** Rewrites stored output settings that violate the overwrite rule; returns true when it changed anything. */
export async function normalizeStoredOutputSettings(deps: SettingsDependencies) {
  const stored = await deps.settingsStore.getAll();
  const current = await resolveSettings(deps);
  const entries = toStoredEntries({
    subtitleOutputFormat: current.subtitleOutputFormat,
    overwriteMkv: current.overwriteMkv
  });
  const changed = Object.entries(entries).filter(([key, value]) => key in stored && stored[key] !== value);
  if (!changed.length) {
    return false;
  }
  await deps.settingsStore.setMany(Object.fromEntries(changed));
  await deps.logger.info(SETTINGS_SCOPE, "Normalized stored output settings.");
  return true;
}
