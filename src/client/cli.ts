#!/usr/bin/env node
/**
 * Interactive terminal chat against a running agent. Runs as its own process and
 * reaches the agent only over HTTP; the conversation history stays here.
 */
import dotenv from "dotenv";
import { createInterface } from "readline/promises";
import { AgentApiClient } from "./apiClient.js";
import { ConversationMemory } from "./memory.js";
import { handleLine, type ChatSession } from "./session.js";

async function main(): Promise<void> {
  dotenv.config();
  const baseUrl = process.env.AGENT_URL ?? `http://localhost:${process.env.PORT ?? "9000"}`;
  const session: ChatSession = { api: new AgentApiClient(baseUrl), memory: new ConversationMemory() };
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  console.log(`Chatting with ${baseUrl}. Commands: /provider <name>, /history, /clear, /quit`);
  try {
    for (;;) {
      const line = await rl.question("> ");
      const result = await handleLine(session, line);
      for (const out of result.output) console.log(out);
      if (result.quit) break;
    }
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
