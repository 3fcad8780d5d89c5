import type { SubtitleDocument, SubtitleEvent, SubtitleFormat, SubtitleSection, SubtitleStyle } from "../../domain/types";

export const DEFAULT_FONT_SIZE = 20;

const DEFAULT_SCRIPT_INFO = ["ScriptType: v4.00+", "WrapStyle: 0", "ScaledBorderAndShadow: yes", "Collisions: Normal"];

const DEFAULT_STYLE_FORMAT = [
  "Name",
  "Fontname",
  "Fontsize",
  "PrimaryColour",
  "SecondaryColour",
  "OutlineColour",
  "BackColour",
  "Bold",
  "Italic",
  "Underline",
  "StrikeOut",
  "ScaleX",
  "ScaleY",
  "Spacing",
  "Angle",
  "BorderStyle",
  "Outline",
  "Shadow",
  "Alignment",
  "MarginL",
  "MarginR",
  "MarginV",
  "Encoding"
];

const DEFAULT_STYLE_VALUES = [
  "Default",
  "Arial",
  String(DEFAULT_FONT_SIZE),
  "&H00FFFFFF",
  "&H000000FF",
  "&H00000000",
  "&H00000000",
  "0",
  "0",
  "0",
  "0",
  "100",
  "100",
  "0",
  "0",
  "1",
  "2",
  "2",
  "2",
  "10",
  "10",
  "10",
  "1"
];

const DEFAULT_EVENT_FORMAT = ["Layer", "Start", "End", "Style", "Name", "MarginL", "MarginR", "MarginV", "Effect", "Text"];

const CORE_SECTIONS = new Set(["script info", "v4+ styles", "v4 styles", "events"]);
const EVENT_CORE_FIELDS = new Set(["start", "end", "style", "text"]);

export function createEmptyDocument(format: SubtitleFormat): SubtitleDocument {
  return {
    format,
    scriptInfo: [],
    styleFormat: [],
    styles: [],
    eventFormat: [],
    events: [],
    extraSections: []
  };
}

export function parseAss(content: string): SubtitleDocument {
  const scriptInfo: string[] = [];
  const styles: SubtitleStyle[] = [];
  const events: SubtitleEvent[] = [];
  const extraSections: SubtitleSection[] = [];
  let styleFormat: string[] = [];
  let eventFormat: string[] = [];
  let section = "";
  let extra: SubtitleSection | null = null;

  for (const rawLine of content.replace(/^\uFEFF/, "").split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const header = line.match(/^\[(.+)\]$/);
    if (header) {
      section = header[1].toLowerCase();
      extra = CORE_SECTIONS.has(section) ? null : { header: line, lines: [] };
      if (extra) {
        extraSections.push(extra);
      }
      continue;
    }
    if (extra) {
      extra.lines.push(line);
      continue;
    }
    if (section === "script info") {
      scriptInfo.push(line);
      continue;
    }

    const separator = line.indexOf(":");
    if (separator < 0) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trimStart();

    if (section === "v4+ styles" || section === "v4 styles") {
      if (key === "Format") {
        styleFormat = splitList(value);
      } else if (key === "Style") {
        styles.push(parseStyle(value, styleFormat.length ? styleFormat : DEFAULT_STYLE_FORMAT));
      }
    } else if (section === "events") {
      if (key === "Format") {
        eventFormat = splitList(value);
      } else if (key === "Dialogue" || key === "Comment") {
        events.push(parseEvent(key, value, eventFormat.length ? eventFormat : DEFAULT_EVENT_FORMAT));
      }
    }
  }

  return { format: "ass", scriptInfo, styleFormat, styles, eventFormat, events, extraSections };
}

export function toAss(document: SubtitleDocument): string {
  const scriptInfo = document.scriptInfo.length ? document.scriptInfo : DEFAULT_SCRIPT_INFO;
  const styleFormat = document.styleFormat.length ? document.styleFormat : DEFAULT_STYLE_FORMAT;
  const eventFormat = document.eventFormat.length ? document.eventFormat : DEFAULT_EVENT_FORMAT;
  const styles = document.styles.length ? document.styles : [parseStyle(DEFAULT_STYLE_VALUES.join(","), DEFAULT_STYLE_FORMAT)];

  const blocks: string[][] = [
    ["[Script Info]", ...scriptInfo],
    [
      "[V4+ Styles]",
      `Format: ${styleFormat.join(", ")}`,
      ...styles.map((style) => `Style: ${styleFormat.map((field) => styleValue(style, field)).join(",")}`)
    ],
    [
      "[Events]",
      `Format: ${eventFormat.join(", ")}`,
      ...document.events.map((event) => {
        const text = document.format === "srt" ? srtTextToAss(event.text) : event.text;
        return `${event.kind}: ${eventFormat.map((field) => eventValue(event, field, text)).join(",")}`;
      })
    ],
    ...document.extraSections.map((extra) => [extra.header, ...extra.lines])
  ];
  return `${blocks.map((block) => block.join("\n")).join("\n\n")}\n`;
}

/** Font size of the `Default` style, or the stock size when the document has none. */
export function getDefaultFontSize(document: SubtitleDocument) {
  const size = document.styles.find((style) => style.name === "Default")?.fontSize;
  return size !== undefined && Number.isFinite(size) && size > 0 ? size : DEFAULT_FONT_SIZE;
}

function parseStyle(value: string, format: string[]): SubtitleStyle {
  const parts = splitFields(value, format.length);
  const values: Record<string, string> = {};
  format.forEach((field, index) => {
    values[field] = (parts[index] ?? "").trim();
  });
  const lookup = lowercaseLookup(values);
  return {
    name: lookup.get("name") ?? "Default",
    fontSize: Number(lookup.get("fontsize") ?? DEFAULT_FONT_SIZE),
    values
  };
}

function parseEvent(kind: SubtitleEvent["kind"], value: string, format: string[]): SubtitleEvent {
  const parts = splitFields(value, format.length);
  const fields: Record<string, string> = {};
  let start = 0;
  let end = 0;
  let style = "Default";
  let text = "";
  format.forEach((field, index) => {
    const raw = parts[index] ?? "";
    switch (field.toLowerCase()) {
      case "start":
        start = parseAssTime(raw.trim());
        break;
      case "end":
        end = parseAssTime(raw.trim());
        break;
      case "style":
        style = raw.trim() || "Default";
        break;
      case "text":
        text = raw;
        break;
      default:
        fields[field] = raw.trim();
    }
  });
  return { start, end, text, style, kind, fields };
}

function styleValue(style: SubtitleStyle, field: string) {
  const stored = style.values[field];
  if (stored !== undefined) {
    return stored;
  }
  const key = field.toLowerCase();
  if (key === "name") {
    return style.name;
  }
  if (key === "fontsize") {
    return String(style.fontSize);
  }
  const fallback = DEFAULT_STYLE_FORMAT.findIndex((name) => name.toLowerCase() === key);
  return fallback >= 0 ? DEFAULT_STYLE_VALUES[fallback] : "";
}

function eventValue(event: SubtitleEvent, field: string, text: string) {
  const key = field.toLowerCase();
  if (EVENT_CORE_FIELDS.has(key)) {
    if (key === "start") {
      return formatAssTime(event.start);
    }
    if (key === "end") {
      return formatAssTime(event.end);
    }
    return key === "style" ? event.style : text;
  }
  const stored = event.fields[field];
  if (stored !== undefined) {
    return stored;
  }
  return key === "layer" || key.startsWith("margin") ? "0" : "";
}

function srtTextToAss(text: string) {
  return text
    .replace(/<i>/gi, "{\\i1}")
    .replace(/<\/i>/gi, "{\\i0}")
    .replace(/<b>/gi, "{\\b1}")
    .replace(/<\/b>/gi, "{\\b0}")
    .replace(/<u>/gi, "{\\u1}")
    .replace(/<\/u>/gi, "{\\u0}")
    .replace(/<\/?font[^>]*>/gi, "");
}

function splitList(value: string) {
  return value.split(",").map((part) => part.trim());
}

// The last field (Text) may itself contain commas.
function splitFields(value: string, count: number) {
  const parts: string[] = [];
  let rest = value;
  for (let i = 0; i < count - 1; i += 1) {
    const comma = rest.indexOf(",");
    if (comma < 0) {
      break;
    }
    parts.push(rest.slice(0, comma));
    rest = rest.slice(comma + 1);
  }
  parts.push(rest);
  return parts;
}

function lowercaseLookup(values: Record<string, string>) {
  return new Map(Object.entries(values).map(([key, value]) => [key.toLowerCase(), value]));
}

function parseAssTime(value: string) {
  const match = value.match(/^(\d+):(\d{1,2}):(\d{1,2})(?:[.:](\d{1,3}))?$/);
  if (!match) {
    return 0;
  }
  const fraction = (match[4] ?? "0").padEnd(2, "0");
  const ms = fraction.length === 3 ? Number(fraction) : Number(fraction) * 10;
  return (Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3])) * 1000 + ms;
}

function formatAssTime(totalMs: number) {
  const cs = Math.max(0, Math.round(totalMs / 10));
  const hrs = Math.floor(cs / 360_000);
  const mins = Math.floor((cs % 360_000) / 6000);
  const secs = Math.floor((cs % 6000) / 100);
  return `${hrs}:${pad(mins)}:${pad(secs)}.${pad(cs % 100)}`;
}

function pad(value: number) {
  return value.toString().padStart(2, "0");
}
