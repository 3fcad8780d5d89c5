import { randomUUID } from "node:crypto";
import path from "node:path";
import { StructuralInputError, errorMessage } from "../domain/errors";
import { getLanguageCode } from "../domain/languages";
import { selectSubtitleTrack } from "../domain/tracks";
import type { OutputFormat, SubtitleDocument, SubtitleFormat } from "../domain/types";
import type { ContainerPort, LoggerPort, StoragePort, SubtitlePort, TranslationProvider } from "../interfaces/ports";
import { extensionOf, isSidecarFormat, sidecarPath, translatedContainerPath } from "./outputPaths";

export const BATCH_SIZE = 20;

export type ProgressCallback = (progress: number) => void | Promise<void>;

export type PipelineDependencies = {
  container: ContainerPort;
  subtitles: SubtitlePort;
  storage: StoragePort;
  logger: LoggerPort;
  tempDir: string;
};

type SubtitleTranslationOptions = {
  sourcePath: string;
  outputPath: string;
  provider: TranslationProvider;
  sourceLanguage: string;
  targetLanguage: string;
  bilingual: boolean;
  outputFormat: SubtitleFormat;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
  logScope?: string;
};

export type TranslateSubtitleFileOptions = Omit<SubtitleTranslationOptions, "outputFormat"> & {
  outputFormat?: OutputFormat;
};

export type TranslateContainerOptions = {
  containerPath: string;
  targetLanguage: string;
  provider: TranslationProvider;
  trackIndex: number | null;
  sourceLanguage: string;
  bilingual: boolean;
  outputFormat: OutputFormat;
  overwrite: boolean;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
  logScope?: string;
};

export function batchProgress(done: number, total: number) {
  return Math.min(90, Math.floor((done / total) * 80) + 10);
}

function fitToLength(translations: string[], expected: number) {
  const fitted = translations.slice(0, expected);
  while (fitted.length < expected) {
    fitted.push("");
  }
  return fitted;
}

/**
 * Translates texts in batches of BATCH_SIZE. A failed batch is retried line by line;
 * a failed line keeps its original text.
 */
export async function translateTexts(
  texts: string[],
  options: Pick<SubtitleTranslationOptions, "provider" | "sourceLanguage" | "targetLanguage" | "onProgress" | "signal" | "logScope">,
  logger: LoggerPort
) {
  const { provider, sourceLanguage, targetLanguage, signal } = options;
  const scope = options.logScope ?? "pipeline";
  const translated: string[] = [];

  for (let offset = 0; offset < texts.length; offset += BATCH_SIZE) {
    signal?.throwIfAborted();
    const batch = texts.slice(offset, offset + BATCH_SIZE);
    try {
      const result = await provider.translateBatch(batch, sourceLanguage, targetLanguage, signal);
      translated.push(...fitToLength(result, batch.length));
    } catch (error) {
      signal?.throwIfAborted();
      await logger.warn(scope, `Batch translation failed, falling back to single lines: ${errorMessage(error)}`);
      for (const text of batch) {
        try {
          translated.push(await provider.translate(text, sourceLanguage, targetLanguage, signal));
        } catch (lineError) {
          signal?.throwIfAborted();
          await logger.warn(scope, `Line translation failed, keeping original: ${errorMessage(lineError)}`);
          translated.push(text);
        }
      }
    }
    await options.onProgress?.(batchProgress(translated.length, texts.length));
  }
  return translated;
}

function withTexts(document: SubtitleDocument, texts: string[]): SubtitleDocument {
  return {
    ...document,
    events: document.events.map((event, index) => ({ ...event, fields: { ...event.fields }, text: texts[index] ?? event.text }))
  };
}

// Writes to `outputPath` directly; callers decide how the file gets published.
async function runSubtitleTranslation(options: SubtitleTranslationOptions, deps: PipelineDependencies) {
  const original = await deps.subtitles.load(options.sourcePath);
  if (!original.events.length) {
    throw new StructuralInputError("Subtitle file is empty");
  }
  const texts = original.events.map((event) => event.text);
  const translations = await translateTexts(texts, options, deps.logger);
  let result = withTexts(original, translations);
  if (options.bilingual) {
    result = deps.subtitles.composeBilingual(original, result, options.outputFormat);
  }
  options.signal?.throwIfAborted();
  await deps.subtitles.save(result, options.outputPath, options.outputFormat);
  return options.outputPath;
}

/** The configured sidecar format, or the format of `filePath` when output goes into a container. */
export function resolveSubtitleFormat(outputFormat: OutputFormat | undefined, filePath: string): SubtitleFormat {
  if (outputFormat && isSidecarFormat(outputFormat)) {
    return outputFormat;
  }
  return extensionOf(filePath) === ".ass" ? "ass" : "srt";
}

/**
 * Translates a standalone subtitle file. The result is written beside the output as a
 * temporary file and renamed into place, then progress 100 is reported.
 */
export async function translateSubtitleFile(options: TranslateSubtitleFileOptions, deps: PipelineDependencies) {
  const outputFormat = resolveSubtitleFormat(options.outputFormat, options.outputPath);
  const stagingPath = `${options.outputPath}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await runSubtitleTranslation({ ...options, outputPath: stagingPath, outputFormat }, deps);
    await deps.storage.move(stagingPath, options.outputPath);
  } finally {
    await deps.storage.remove(stagingPath);
  }
  await options.onProgress?.(100);
  return options.outputPath;
}

/** Extracts a text subtitle stream, translates it and writes a sidecar file or a new container. */
export async function translateContainer(options: TranslateContainerOptions, deps: PipelineDependencies) {
  const { containerPath, targetLanguage, signal } = options;
  const scope = options.logScope ?? "pipeline";
  await options.onProgress?.(5);

  const tracks = await deps.container.listSubtitleTracks(containerPath, signal);
  const track = selectSubtitleTrack(tracks, options.trackIndex);
  await deps.logger.info(scope, `Using subtitle track ${track.index} (${track.codec}, ${track.language ?? "und"}).`);

  const tempDir = await deps.storage.ensureDir(deps.tempDir);
  const id = randomUUID();
  const sidecarFormat = isSidecarFormat(options.outputFormat) ? options.outputFormat : null;
  const extractedPath = path.join(tempDir, `${id}.srt`);
  const translatedPath = path.join(tempDir, `${id}.translated.${sidecarFormat ?? "srt"}`);
  const ext = path.extname(containerPath);
  // Staged beside the source so the final rename stays on one filesystem.
  const muxTarget = `${containerPath.slice(0, containerPath.length - ext.length)}.translated.${id.slice(0, 8)}${ext}`;

  try {
    await deps.container.extractSubtitle({ filePath: containerPath, trackIndex: track.index, outputPath: extractedPath, signal });
    await options.onProgress?.(10);

    await runSubtitleTranslation(
      {
        sourcePath: extractedPath,
        outputPath: translatedPath,
        provider: options.provider,
        sourceLanguage: options.sourceLanguage,
        targetLanguage,
        bilingual: options.bilingual,
        outputFormat: sidecarFormat ?? "srt",
        onProgress: options.onProgress,
        signal,
        logScope: scope
      },
      deps
    );

    if (sidecarFormat) {
      const outputPath = sidecarPath(containerPath, targetLanguage, sidecarFormat);
      await deps.storage.move(translatedPath, outputPath);
      await options.onProgress?.(100);
      return outputPath;
    }

    await options.onProgress?.(95);
    const trackName = options.bilingual ? `${targetLanguage} (Bilingual)` : targetLanguage;
    await deps.container.muxSubtitle({
      containerPath,
      subtitlePath: translatedPath,
      outputPath: muxTarget,
      languageCode: getLanguageCode(targetLanguage),
      trackName,
      signal
    });

    const outputPath = options.overwrite ? containerPath : translatedContainerPath(containerPath);
    await deps.storage.move(muxTarget, outputPath);
    if (options.overwrite) {
      await deps.storage.remove(translatedContainerPath(containerPath));
    }
    await options.onProgress?.(100);
    return outputPath;
  } finally {
    await Promise.all([extractedPath, translatedPath, muxTarget].map((file) => deps.storage.remove(file)));
  }
}
