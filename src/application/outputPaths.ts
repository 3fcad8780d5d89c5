import path from "node:path";
import { getLanguageTag } from "../domain/languages";
import type { SidecarFormat } from "../domain/types";

export const CONTAINER_EXTENSIONS = [".mkv"];
export const SUBTITLE_EXTENSIONS = [".srt", ".ass"];

export function extensionOf(filePath: string) {
  return path.extname(filePath).toLowerCase();
}

export function isContainerFile(filePath: string) {
  return CONTAINER_EXTENSIONS.includes(extensionOf(filePath));
}

export function isSubtitleFile(filePath: string) {
  return SUBTITLE_EXTENSIONS.includes(extensionOf(filePath));
}

export function isSupportedFile(filePath: string) {
  return isContainerFile(filePath) || isSubtitleFile(filePath);
}

function stripExtension(filePath: string) {
  return filePath.slice(0, filePath.length - path.extname(filePath).length);
}

/** `<dir>/<base>.<tag>.<format>`, e.g. `movie.zh-Hans.srt`. */
export function sidecarPath(sourcePath: string, targetLanguage: string, format: SidecarFormat) {
  return `${stripExtension(sourcePath)}.${getLanguageTag(targetLanguage)}.${format}`;
}

/** `<dir>/<base>.translated<ext>`: the container written beside the source. */
export function translatedContainerPath(containerPath: string) {
  return `${stripExtension(containerPath)}.translated${path.extname(containerPath)}`;
}

export function isSidecarFormat(format: string): format is SidecarFormat {
  return format === "srt" || format === "ass";
}
