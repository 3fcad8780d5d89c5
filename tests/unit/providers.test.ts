import { describe, expect, it, vi } from "vitest";
import { loadSettings } from "../../src/config/settings";
import { ProviderError } from "../../src/domain/errors";
import { ANTHROPIC_VERSION, createAnthropicChatClient } from "../../src/infrastructure/providers/anthropicClient";
import type { ChatClient, ChatRequest } from "../../src/infrastructure/providers/chatClient";
import {
  ChatTranslationProvider,
  buildBatchPrompt,
  buildTranslationPrompt,
  parseBatchResponse
} from "../../src/infrastructure/providers/chatTranslationProvider";
import { ProviderFactory, parseProviderId } from "../../src/infrastructure/providers/providerFactory";

class ScriptedClient implements ChatClient {
  requests: ChatRequest[] = [];

  constructor(private readonly replies: Array<string | null>) {}

  async complete(request: ChatRequest) {
    this.requests.push(request);
    const reply = this.replies.shift();
    return reply === undefined ? null : reply;
  }
}

describe("batch prompts", () => {
  it("numbers each line", () => {
    const prompt = buildBatchPrompt(["Hello", "Bye"], "auto", "Chinese");
    expect(prompt.split("\n")[0]).toBe("Translate the following subtitle lines to Chinese.");
    expect(prompt).toContain("\n[1] Hello\n[2] Bye\n");
  });

  it("names the source language when known", () => {
    expect(buildTranslationPrompt("Hi", "English", "French").split("\n")[0]).toBe(
      "Translate the following subtitle text from English to French."
    );
  });

  it("parses numbered replies positionally", () => {
    expect(parseBatchResponse("[1] 你好\n[2] 世界\n", 3)).toEqual(["你好", "世界", ""]);
    expect(parseBatchResponse("[1] a\n[2] b\n[3] c", 2)).toEqual(["a", "b"]);
    expect(parseBatchResponse("  [1]   spaced  \n\n[2]\n", 2)).toEqual(["spaced", ""]);
  });

  it("keeps the input count for partially numbered replies", () => {
    expect(parseBatchResponse("[1] Uno\nDos\n[3] Tres", 3)).toEqual(["Uno", "Dos", "Tres"]);
    expect(parseBatchResponse("Uno\n[2] Dos", 4)).toEqual(["Uno", "Dos", "", ""]);
    expect(parseBatchResponse("[note] draft\nUno\nDos\nTres", 2)).toEqual(["Uno", "Dos"]);
    expect(parseBatchResponse("", 2)).toEqual(["", ""]);
  });
});

describe("ChatTranslationProvider", () => {
  it("translates a batch through one request", async () => {
    const client = new ScriptedClient(["[1] Bonjour\n[2] Au revoir"]);
    const provider = new ChatTranslationProvider("openai", client);
    expect(await provider.translateBatch(["Hello", "Bye"], "auto", "French")).toEqual(["Bonjour", "Au revoir"]);
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0].system).toContain("subtitle translator");
  });

  it("rejects a blank batch reply so lines can be retried one by one", async () => {
    const provider = new ChatTranslationProvider("glm", new ScriptedClient(["  \n\n"]));
    const error = provider.translateBatch(["Hello", "Bye"], "auto", "French");
    await expect(error).rejects.toBeInstanceOf(ProviderError);
    await expect(error).rejects.toThrow("glm: Empty batch response from model");
  });

  it("skips the request for an empty batch", async () => {
    const client = new ScriptedClient([]);
    const provider = new ChatTranslationProvider("openai", client);
    expect(await provider.translateBatch([], "auto", "French")).toEqual([]);
    expect(client.requests).toHaveLength(0);
  });

  it("trims single translations and rejects empty replies", async () => {
    const provider = new ChatTranslationProvider("deepseek", new ScriptedClient(["  Hola \n", null]));
    expect(await provider.translate("Hello", "auto", "Spanish")).toBe("Hola");
    await expect(provider.translate("Hello", "auto", "Spanish")).rejects.toThrow("deepseek: Empty response from model");
  });
});

describe("Anthropic client", () => {
  it("posts a messages request and returns the text block", async () => {
    let capturedUrl = "";
    let capturedInit: RequestInit | undefined;
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      capturedUrl = String(input);
      capturedInit = init;
      return new Response(JSON.stringify({ content: [{ type: "text", text: "Bonjour" }] }), { status: 200 });
    });
    const client = createAnthropicChatClient(
      { apiKey: "test-secret", model: "claude-test", baseUrl: "https://llm.example.test/" },
      fetchMock
    );

    expect(await client.complete({ system: "sys", prompt: "Hello" })).toBe("Bonjour");
    expect(capturedUrl).toBe("https://llm.example.test/v1/messages");
    const headers = new Headers(capturedInit?.headers);
    expect(headers.get("x-api-key")).toBe("test-secret");
    expect(headers.get("anthropic-version")).toBe(ANTHROPIC_VERSION);
    expect(JSON.parse(String(capturedInit?.body))).toEqual({
      model: "claude-test",
      max_tokens: 4096,
      system: "sys",
      messages: [{ role: "user", content: "Hello" }]
    });
  });

  it("raises a ProviderError with the API message", async () => {
    const fetchMock = vi.fn(
      async () => new Response(JSON.stringify({ error: { message: "invalid x-api-key" } }), { status: 401 })
    );
    const client = createAnthropicChatClient({ apiKey: "test-secret", model: "m", baseUrl: "https://llm.example.test" }, fetchMock);
    const failure = client.complete({ system: "s", prompt: "p" });
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow("claude: invalid x-api-key");
  });
});

describe("ProviderFactory", () => {
  it("normalizes provider ids", () => {
    expect(parseProviderId(" Claude ")).toBe("claude");
    expect(() => parseProviderId("mistral")).toThrow("Unknown LLM provider: mistral");
  });

  it("requires an API key", () => {
    const factory = new ProviderFactory();
    expect(() => factory.create("openai", loadSettings({}))).toThrow("openai: API key is not configured");
    expect(factory.create("glm", loadSettings({ GLM_API_KEY: "test-secret" })).id).toBe("glm");
  });
});
