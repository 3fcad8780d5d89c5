import { ProviderError } from "../../domain/errors";
import type { ProviderId } from "../../domain/types";
import type { TranslationProvider } from "../../interfaces/ports";
import type { ChatClient } from "./chatClient";

export const SYSTEM_PROMPT =
  "You are a professional subtitle translator. Translate accurately while maintaining natural flow.";

const NUMBERED_LINE = /^\[(\d+)\]\s*(.*)$/;

function describeDirection(sourceLanguage: string, targetLanguage: string) {
  return sourceLanguage === "auto" ? `to ${targetLanguage}` : `from ${sourceLanguage} to ${targetLanguage}`;
}

export function buildTranslationPrompt(text: string, sourceLanguage: string, targetLanguage: string) {
  return [
    `Translate the following subtitle text ${describeDirection(sourceLanguage, targetLanguage)}.`,
    "",
    "Rules:",
    "1. Keep the translation natural and fluent",
    "2. Preserve the original meaning and tone",
    "3. Keep formatting tags such as {\\an8} or {\\pos(x,y)} untouched",
    "4. Output only the translation, without explanations",
    "5. Keep the line structure when the text spans several lines",
    "",
    "Text to translate:",
    text,
    "",
    "Translation:"
  ].join("\n");
}

export function buildBatchPrompt(texts: string[], sourceLanguage: string, targetLanguage: string) {
  const numbered = texts.map((text, index) => `[${index + 1}] ${text}`);
  return [
    `Translate the following subtitle lines ${describeDirection(sourceLanguage, targetLanguage)}.`,
    "",
    "Rules:",
    "1. Keep translations natural and fluent",
    "2. Preserve the original meaning and tone",
    "3. Keep formatting tags such as {\\an8} or {\\pos(x,y)} untouched",
    "4. Output only the translations, one per line, numbered as [n] like the input",
    "5. Do not add explanations",
    "",
    "Lines to translate:",
    ...numbered,
    "",
    "Translations:"
  ].join("\n");
}

/**
 * Reads a numbered reply back into positional translations. Numbered lines are taken
 * in order of appearance; an unnumbered, non-empty line counts as the next entry.
 * The result always has exactly `expected` items.
 */
export function parseBatchResponse(response: string, expected: number) {
  const translations: string[] = [];
  for (const line of response.trim().split("\n")) {
    const trimmed = line.trim();
    const match = trimmed.match(NUMBERED_LINE);
    if (match) {
      translations.push(match[2]);
    } else if (trimmed && !trimmed.startsWith("[")) {
      translations.push(trimmed);
    }
  }
  while (translations.length < expected) {
    translations.push("");
  }
  return translations.slice(0, expected);
}

export class ChatTranslationProvider implements TranslationProvider {
  constructor(
    readonly id: ProviderId,
    private readonly client: ChatClient
  ) {}

  async translate(text: string, sourceLanguage: string, targetLanguage: string, signal?: AbortSignal) {
    const reply = await this.complete(buildTranslationPrompt(text, sourceLanguage, targetLanguage), signal);
    return reply.trim();
  }

  async translateBatch(texts: string[], sourceLanguage: string, targetLanguage: string, signal?: AbortSignal) {
    if (!texts.length) {
      return [];
    }
    const reply = await this.complete(buildBatchPrompt(texts, sourceLanguage, targetLanguage), signal);
    // A blank reply carries no translations; rejecting lets the caller retry line by line.
    if (!reply.trim()) {
      throw new ProviderError(this.id, "Empty batch response from model");
    }
    return parseBatchResponse(reply, texts.length);
  }

  private async complete(prompt: string, signal?: AbortSignal) {
    const reply = await this.client.complete({ system: SYSTEM_PROMPT, prompt, signal });
    if (reply === null) {
      throw new ProviderError(this.id, "Empty response from model");
    }
    return reply;
  }
}
