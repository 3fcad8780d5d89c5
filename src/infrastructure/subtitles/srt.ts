import type { SubtitleDocument, SubtitleEvent } from "../../domain/types";
import { createEmptyDocument } from "./ass";

export function parseSrt(srt: string): SubtitleDocument {
  const blocks = srt
    .replace(/^\uFEFF/, "")
    .split(/\r?\n\s*\r?\n/)
    .filter((block) => block.trim());
  const events: SubtitleEvent[] = [];
  for (const block of blocks) {
    const lines = block.split(/\r?\n/).filter((line) => line.trim());
    if (lines.length < 2) {
      continue;
    }
    const timeIndex = lines[1].includes("-->") ? 1 : 0;
    const [startRaw, endRaw] = lines[timeIndex].split("-->").map((part) => part.trim());
    if (!startRaw || !endRaw) {
      continue;
    }
    const start = parseTime(startRaw);
    const end = parseTime(endRaw.split(/\s+/)[0]);
    if (Number.isNaN(start) || Number.isNaN(end)) {
      continue;
    }
    events.push({
      start,
      end,
      text: lines.slice(timeIndex + 1).join("\\N"),
      style: "Default",
      kind: "Dialogue",
      fields: {}
    });
  }
  return { ...createEmptyDocument("srt"), events };
}

export function toSrt(document: SubtitleDocument): string {
  return document.events
    .filter((event) => event.kind === "Dialogue")
    .map((event, index) => {
      const start = formatTime(event.start);
      const end = formatTime(event.end);
      const text = document.format === "ass" ? assTextToSrt(event.text) : event.text;
      return `${index + 1}\n${start} --> ${end}\n${text.replaceAll("\\N", "\n")}\n`;
    })
    .join("\n");
}

const ASS_TO_HTML: Array<[RegExp, string]> = [
  [/\{\\i1\}/g, "<i>"],
  [/\{\\i0\}/g, "</i>"],
  [/\{\\b1\}/g, "<b>"],
  [/\{\\b0\}/g, "</b>"],
  [/\{\\u1\}/g, "<u>"],
  [/\{\\u0\}/g, "</u>"]
];

function assTextToSrt(text: string) {
  let converted = text;
  for (const [pattern, replacement] of ASS_TO_HTML) {
    converted = converted.replace(pattern, replacement);
  }
  return converted.replace(/\{[^}]*\}/g, "").replaceAll("\\n", "\\N").replaceAll("\\h", " ");
}

function parseTime(value: string) {
  const [time, msRaw] = value.split(/,|\./);
  const parts = time.split(":").map((part) => Number(part));
  const [hours, minutes, seconds] = parts.length === 3 ? parts : [0, parts[0], parts[1]];
  const ms = Number((msRaw ?? "0").padEnd(3, "0").slice(0, 3));
  return (hours * 3600 + minutes * 60 + seconds) * 1000 + ms;
}

function formatTime(totalMs: number) {
  const ms = Math.max(0, Math.round(totalMs));
  const hrs = Math.floor(ms / 3_600_000);
  const mins = Math.floor((ms % 3_600_000) / 60_000);
  const secs = Math.floor((ms % 60_000) / 1000);
  return `${pad(hrs)}:${pad(mins)}:${pad(secs)},${pad(ms % 1000, 3)}`;
}

function pad(value: number, size = 2) {
  return value.toString().padStart(size, "0");
}
