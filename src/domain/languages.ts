import languageTable from "./languages.json";

export type LanguageInfo = {
  name: string;
  code: string;
  tag: string;
  aliases: string[];
};

export const UNDETERMINED = "und";

const LANGUAGES = new Map<string, LanguageInfo>(
  Object.entries(languageTable).map(([name, entry]) => [name, { name, ...entry }])
);

export function findLanguage(name: string): LanguageInfo | null {
  return LANGUAGES.get(name.trim().toLowerCase()) ?? null;
}

/** Three-letter code written into container track metadata. */
export function getLanguageCode(name: string) {
  return findLanguage(name)?.code ?? UNDETERMINED;
}

/** Tag used in sidecar filenames, e.g. `movie.zh-Hans.srt`. */
export function getLanguageTag(name: string) {
  return findLanguage(name)?.tag ?? UNDETERMINED;
}

export function getKnownLanguageTags() {
  return [...Array.from(LANGUAGES.values(), (language) => language.tag), UNDETERMINED];
}

/**
 * Lowercased tokens that identify a language inside a filename: the name itself,
 * its filename tag and the common aliases.
 */
export function getLanguageTokens(name: string) {
  const normalized = name.trim().toLowerCase();
  const language = LANGUAGES.get(normalized);
  if (!language) {
    return [normalized];
  }
  const tokens = new Set([normalized, language.tag.toLowerCase(), ...language.aliases]);
  return Array.from(tokens);
}
