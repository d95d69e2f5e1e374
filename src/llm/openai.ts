import OpenAI from "openai";
import type { CallOptions, CompletionOptions, LLMClient, LLMMessage } from "./client.js";
import type { EmbeddingClient } from "./embedding.js";

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

/** Embedding input cap; longer texts are truncated before the request. */
const MAX_EMBED_CHARS = 8000;

function createSdk(apiKey: string, timeoutMs: number): OpenAI {
  // Retries are the caller's business; the SDK would otherwise retry twice.
  return new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
}

export function createOpenAIClient(options: OpenAIClientOptions): LLMClient {
  const openai = createSdk(options.apiKey, options.timeoutMs);

  return {
    provider: "openai",
    model: options.model,
    async complete(messages: LLMMessage[], callOptions?: CompletionOptions): Promise<string> {
      const response = await openai.chat.completions.create(
        {
          model: options.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          max_tokens: callOptions?.maxTokens ?? options.maxTokens ?? 1024,
          temperature: callOptions?.temperature ?? options.temperature ?? 0.2,
        },
        { signal: callOptions?.signal }
      );
      const content = response.choices[0]?.message?.content;
      if (content == null) throw new Error("Empty LLM response");
      return content;
    },
  };
}

export function createOpenAIEmbeddingClient(options: { apiKey: string; model: string; timeoutMs: number }): EmbeddingClient {
  const openai = createSdk(options.apiKey, options.timeoutMs);

  return {
    provider: "openai-embeddings",
    model: options.model,
    async embed(text: string, callOptions?: CallOptions): Promise<number[]> {
      const response = await openai.embeddings.create(
        {
          model: options.model,
          input: text.slice(0, MAX_EMBED_CHARS),
        },
        { signal: callOptions?.signal }
      );
      const vec = response.data[0]?.embedding;
      if (!vec || !Array.isArray(vec)) throw new Error("Empty embedding response");
      return vec;
    },
    async embedMany(texts: string[], callOptions?: CallOptions): Promise<number[][]> {
      if (texts.length === 0) return [];
      const response = await openai.embeddings.create(
        {
          model: options.model,
          input: texts.map((t) => t.slice(0, MAX_EMBED_CHARS)),
        },
        { signal: callOptions?.signal }
      );
      const byIndex = new Map(response.data.map((item) => [item.index, item.embedding]));
      const vectors: number[][] = [];
      for (let i = 0; i < texts.length; i++) {
        const vec = byIndex.get(i);
        if (!vec) throw new Error(`Embedding response is missing input ${i}`);
        vectors.push(vec);
      }
      return vectors;
    },
  };
}
