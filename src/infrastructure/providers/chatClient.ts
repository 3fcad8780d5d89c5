export type ChatRequest = {
  system: string;
  prompt: string;
  signal?: AbortSignal;
};

/** One system + user turn against a chat model; resolves to the reply text. */
export interface ChatClient {
  complete(request: ChatRequest): Promise<string | null>;
}
