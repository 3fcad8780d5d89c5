import OpenAI from "openai";
import type { ChatClient } from "./chatClient";

export type OpenAIClientConfig = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
};

/** Chat completions client; DeepSeek and GLM speak the same protocol behind their own base URLs. */
export function createOpenAIChatClient(config: OpenAIClientConfig): ChatClient {
  const openai = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  return {
    async complete({ system, prompt, signal }) {
      const completion = await openai.chat.completions.create(
        {
          model: config.model,
          messages: [
            { role: "system", content: system },
            { role: "user", content: prompt }
          ],
          temperature: config.temperature ?? 0.3
        },
        { signal }
      );
      return completion.choices[0]?.message.content ?? null;
    }
  };
}
