import path from "node:path";
import { getKnownLanguageTags, getLanguageTokens } from "../domain/languages";
import type { StoragePort } from "../interfaces/ports";
import { isContainerFile, isSubtitleFile, isSupportedFile } from "./outputPaths";

const TRANSLATED_MARKER = ".translated.";

// Short tokens ("zh", "eng", "简") only count when bracketed, longer ones anywhere in the name.
function shortTokenPatterns(token: string) {
  return [`.${token}.`, `_${token}.`, `-${token}.`, `(${token})`, `[${token}]`, ` ${token}.`, `.${token}-`, `.${token}_`];
}

export function hasLanguageMarker(fileName: string, tokens: string[]) {
  const name = fileName.toLowerCase();
  return tokens.some((token) =>
    token.length <= 3 ? shortTokenPatterns(token).some((pattern) => name.includes(pattern)) : name.includes(token)
  );
}

export function hasTargetLanguageMarker(fileName: string, targetLanguage: string) {
  return hasLanguageMarker(fileName, getLanguageTokens(targetLanguage));
}

/**
 * True for files this system may have written: anything carrying the
 * `.translated.` marker, and subtitle files tagged with a known language or
 * with the target language.
 */
export function isGeneratedOutput(filePath: string, targetLanguage: string) {
  const name = path.basename(filePath).toLowerCase();
  if (name.includes(TRANSLATED_MARKER)) {
    return true;
  }
  if (!isSubtitleFile(name)) {
    return false;
  }
  if (getKnownLanguageTags().some((tag) => name.includes(`.${tag.toLowerCase()}.`))) {
    return true;
  }
  return hasTargetLanguageMarker(name, targetLanguage);
}

/** A sibling subtitle named `<base>.*` that already carries the target language. */
export async function hasTranslatedSibling(containerPath: string, targetLanguage: string, storage: StoragePort) {
  const dir = path.dirname(containerPath);
  const base = path.basename(containerPath, path.extname(containerPath)).toLowerCase();
  let entries: string[];
  try {
    entries = await storage.listDirectory(dir);
  } catch {
    return false;
  }
  return entries.some((entry) => {
    const name = entry.toLowerCase();
    return isSubtitleFile(name) && name.startsWith(`${base}.`) && hasTargetLanguageMarker(name, targetLanguage);
  });
}

export async function shouldSkipFile(filePath: string, targetLanguage: string, storage: StoragePort) {
  if (!isSupportedFile(filePath)) {
    return true;
  }
  if (isGeneratedOutput(filePath, targetLanguage)) {
    return true;
  }
  if (isContainerFile(filePath)) {
    return hasTranslatedSibling(filePath, targetLanguage, storage);
  }
  return false;
}
