import OpenAI from "openai";

/** The slice of the SDK the enrichment client calls */
export interface CompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { timeout?: number }
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export type CompletionsClientFactory = (apiKey: string, timeoutMs: number) => CompletionsClient;

export const createOpenAIClient: CompletionsClientFactory = (apiKey, timeoutMs) =>
  new OpenAI({
    apiKey,
    timeout: timeoutMs,
    maxRetries: 0,
    defaultHeaders: { "User-Agent": "artwork-gallery-enrichment/1.0" },
  });
