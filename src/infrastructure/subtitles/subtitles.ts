import { promises as fs } from "node:fs";
import path from "node:path";
import type { SubtitleDocument, SubtitleFormat } from "../../domain/types";
import type { SubtitlePort } from "../../interfaces/ports";
import { parseAss, toAss } from "./ass";
import { composeBilingual } from "./bilingual";
import { decodeSubtitle } from "./encoding";
import { parseSrt, toSrt } from "./srt";

export function subtitleFormatFromPath(filePath: string): SubtitleFormat {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".ass" || ext === ".ssa" ? "ass" : "srt";
}

export function parseSubtitle(content: string, format: SubtitleFormat) {
  return format === "ass" || content.includes("[Script Info]") ? parseAss(content) : parseSrt(content);
}

export function serializeSubtitle(document: SubtitleDocument, format: SubtitleFormat) {
  return format === "ass" ? toAss(document) : toSrt(document);
}

export class SubtitleService implements SubtitlePort {
  async load(filePath: string) {
    const buffer = await fs.readFile(filePath);
    const { text } = decodeSubtitle(buffer);
    return parseSubtitle(text, subtitleFormatFromPath(filePath));
  }

  /** Writes UTF-8; the format defaults to the one implied by the file extension. */
  async save(document: SubtitleDocument, filePath: string, format = subtitleFormatFromPath(filePath)) {
    await fs.writeFile(filePath, serializeSubtitle(document, format), "utf-8");
  }

  composeBilingual(original: SubtitleDocument, translated: SubtitleDocument, format: SubtitleFormat) {
    return composeBilingual(original, translated, format);
  }
}
