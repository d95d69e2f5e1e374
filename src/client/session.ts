import { AgentApiError, type AgentApiClient } from "./apiClient.js";
import type { ConversationMemory } from "./memory.js";

export interface ChatSession {
  api: AgentApiClient;
  memory: ConversationMemory;
  provider?: string;
}

export type CommandResult = { output: string[]; quit?: boolean };

/**
 * Handle one line of input: a slash command, or a query sent to /chat.
 */
export async function handleLine(session: ChatSession, line: string): Promise<CommandResult> {
  const input = line.trim();
  if (!input) return { output: [] };

  if (input === "/quit" || input === "/exit") return { output: [], quit: true };
  if (input === "/clear") {
    session.memory.clear();
    return { output: ["History cleared."] };
  }
  if (input === "/history") {
    const history = session.memory.history();
    if (history.length === 0) return { output: ["(no history)"] };
    return { output: history.map((m) => `${m.role}: ${m.content}`) };
  }
  if (input.startsWith("/provider")) {
    const name = input.slice("/provider".length).trim();
    session.provider = name || undefined;
    return { output: [`Provider: ${session.provider ?? "server default"}`] };
  }

  session.memory.add("user", input);
  try {
    const answer = await session.api.chat(input, session.provider);
    session.memory.add("assistant", answer);
    return { output: [answer] };
  } catch (err) {
    if (err instanceof AgentApiError) {
      return { output: [`Error (${err.status} ${err.category}): ${err.message}`] };
    }
    return { output: [`Error: ${err instanceof Error ? err.message : String(err)}`] };
  }
}
