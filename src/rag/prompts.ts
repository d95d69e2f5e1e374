import type { LLMMessage } from "../llm/client.js";
import type { ScoredRecord } from "../retrieval/vectorStore.js";

export const SYSTEM_PROMPT = "You are a helpful assistant.";

/** Retrieved texts, most similar first, separated by a blank line. */
export function buildContext(records: ScoredRecord[]): string {
  return records.map((r) => r.text).join("\n\n");
}

export function composeRagPrompt(query: string, context: string): string {
  return `Use the following context to answer the query.

Context:
${context}

Query: ${query}`;
}

export function buildMessages(query: string, records: ScoredRecord[]): LLMMessage[] {
  const content = records.length > 0 ? composeRagPrompt(query, buildContext(records)) : query;
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content },
  ];
}
