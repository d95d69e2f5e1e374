import type { LLMMessage } from "../llm/client.js";

export type ChatExchange = LLMMessage;

const DEFAULT_HISTORY = 10;

/**
 * Conversation history kept by the chat client for display. Lives only in this process.
 */
export class ConversationMemory {
  private messages: ChatExchange[] = [];

  add(role: ChatExchange["role"], content: string): void {
    this.messages.push({ role, content });
  }

  /** The most recent `limit` exchanges, oldest first. */
  history(limit = DEFAULT_HISTORY): ChatExchange[] {
    if (limit <= 0) return [];
    return this.messages.slice(-limit).map((m) => ({ ...m }));
  }

  get size(): number {
    return this.messages.length;
  }

  clear(): void {
    this.messages = [];
  }
}
