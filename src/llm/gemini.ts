import { GoogleGenAI, type Content } from "@google/genai";
import type { CompletionOptions, LLMClient, LLMMessage } from "./client.js";

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Gemini keeps the system prompt out of the turn list and calls the assistant "model".
 */
export function toGeminiContents(messages: LLMMessage[]): { systemInstruction?: string; contents: Content[] } {
  const system = messages
    .filter((m) => m.role === "system")
    .map((m) => m.content)
    .join("\n\n");
  const contents: Content[] = messages
    .filter((m) => m.role !== "system")
    .map((m) => ({
      role: m.role === "assistant" ? "model" : "user",
      parts: [{ text: m.content }],
    }));
  return { systemInstruction: system || undefined, contents };
}

export function createGeminiClient(options: GeminiClientOptions): LLMClient {
  const ai = new GoogleGenAI({ apiKey: options.apiKey, httpOptions: { timeout: options.timeoutMs } });

  return {
    provider: "gemini",
    model: options.model,
    async complete(messages: LLMMessage[], callOptions?: CompletionOptions): Promise<string> {
      const { systemInstruction, contents } = toGeminiContents(messages);
      const response = await ai.models.generateContent({
        model: options.model,
        contents,
        config: {
          systemInstruction,
          temperature: callOptions?.temperature ?? options.temperature,
          maxOutputTokens: callOptions?.maxTokens ?? options.maxTokens,
          abortSignal: callOptions?.signal,
        },
      });
      const text = response.text;
      if (text == null) throw new Error("Empty Gemini response");
      return text;
    },
  };
}
