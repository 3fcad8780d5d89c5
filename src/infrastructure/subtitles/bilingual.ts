import type { SubtitleDocument, SubtitleFormat } from "../../domain/types";
import { getDefaultFontSize } from "./ass";

/**
 * Stacks each translated line above its original. Styled output shrinks the
 * original to 80% of the Default style size, never below 10.
 */
export function composeBilingual(
  original: SubtitleDocument,
  translated: SubtitleDocument,
  format: SubtitleFormat
): SubtitleDocument {
  const smallSize = Math.max(10, Math.floor(getDefaultFontSize(original) * 0.8));
  const events = translated.events.map((event, index) => {
    const originalText = original.events[index]?.text ?? "";
    const text = format === "ass" ? `${event.text}\\N{\\fs${smallSize}}${originalText}{\\r}` : `${event.text}\\N${originalText}`;
    return { ...event, fields: { ...event.fields }, text };
  });
  return { ...translated, events };
}
