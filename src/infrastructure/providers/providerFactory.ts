import { z } from "zod";
import { ProviderError } from "../../domain/errors";
import type { Settings } from "../../config/settings";
import { PROVIDER_IDS } from "../../domain/types";
import type { ProviderId } from "../../domain/types";
import type { ProviderFactoryPort, TranslationProvider } from "../../interfaces/ports";
import { createAnthropicChatClient } from "./anthropicClient";
import type { ChatClient } from "./chatClient";
import { ChatTranslationProvider } from "./chatTranslationProvider";
import { createOpenAIChatClient } from "./openaiClient";

const providerIdSchema = z.enum(PROVIDER_IDS);

export function parseProviderId(value: string): ProviderId {
  const parsed = providerIdSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(`Unknown LLM provider: ${value}`);
  }
  return parsed.data;
}

function requireApiKey(id: ProviderId, apiKey: string) {
  if (!apiKey.trim()) {
    throw new ProviderError(id, "API key is not configured");
  }
  return apiKey;
}

export function createChatClient(id: ProviderId, settings: Settings): ChatClient {
  switch (id) {
    case "openai":
      return createOpenAIChatClient({
        apiKey: requireApiKey("openai", settings.openaiApiKey),
        model: settings.openaiModel,
        baseUrl: settings.openaiBaseUrl
      });
    case "deepseek":
      return createOpenAIChatClient({
        apiKey: requireApiKey("deepseek", settings.deepseekApiKey),
        model: settings.deepseekModel,
        baseUrl: settings.deepseekBaseUrl
      });
    case "glm":
      return createOpenAIChatClient({
        apiKey: requireApiKey("glm", settings.glmApiKey),
        model: settings.glmModel,
        baseUrl: settings.glmBaseUrl
      });
    case "claude":
      return createAnthropicChatClient({
        apiKey: requireApiKey("claude", settings.claudeApiKey),
        model: settings.claudeModel,
        baseUrl: settings.claudeBaseUrl
      });
    default: {
      const unreachable: never = id;
      throw new Error(`Unknown LLM provider: ${String(unreachable)}`);
    }
  }
}

export class ProviderFactory implements ProviderFactoryPort {
  create(providerId: string, settings: Settings): TranslationProvider {
    const id = parseProviderId(providerId);
    return new ChatTranslationProvider(id, createChatClient(id, settings));
  }
}
