import { z } from "zod";
import { ProviderError } from "../../domain/errors";
import type { ChatClient } from "./chatClient";

export const ANTHROPIC_VERSION = "2023-06-01";

export type AnthropicClientConfig = {
  apiKey: string;
  model: string;
  baseUrl: string;
  maxTokens?: number;
};

const messageResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }))
});

const errorResponseSchema = z.object({
  error: z.object({ message: z.string() })
});

export function createAnthropicChatClient(config: AnthropicClientConfig, fetchImpl: typeof fetch = fetch): ChatClient {
  const endpoint = `${config.baseUrl.replace(/\/+$/, "")}/v1/messages`;
  return {
    async complete({ system, prompt, signal }) {
      const response = await fetchImpl(endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "x-api-key": config.apiKey,
          "anthropic-version": ANTHROPIC_VERSION
        },
        body: JSON.stringify({
          model: config.model,
          max_tokens: config.maxTokens ?? 4096,
          system,
          messages: [{ role: "user", content: prompt }]
        }),
        signal
      });

      const body: unknown = await response.json().catch(() => null);
      if (!response.ok) {
        const parsedError = errorResponseSchema.safeParse(body);
        const message = parsedError.success ? parsedError.data.error.message : `API error: ${response.status}`;
        throw new ProviderError("claude", message, response.status);
      }
      const parsed = messageResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ProviderError("claude", "Unexpected response shape", response.status);
      }
      const textBlock = parsed.data.content.find((block) => block.type === "text");
      return textBlock?.text ?? null;
    }
  };
}
