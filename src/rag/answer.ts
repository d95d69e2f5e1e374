import { configurationError, validationError } from "../errors.js";
import type { ProviderRole } from "../config.js";
import { callUpstream } from "../lib/timeout.js";
import { createLogger } from "../lib/log.js";
import type { ScoredRecord } from "../retrieval/vectorStore.js";
import { retrievalBackend, type AgentDeps } from "./deps.js";
import { buildMessages } from "./prompts.js";

const log = createLogger("chat");

export interface AnswerResult {
  answer: string;
  /** Which backend produced the answer, e.g. "openai". */
  provider: string;
  /** Records placed in the prompt; empty when no retrieval happened. */
  context: ScoredRecord[];
}

export function validateQuery(query: unknown): string {
  if (typeof query !== "string" || !query.trim()) {
    throw validationError("query must be a non-empty string");
  }
  return query.trim();
}

/**
 * Answer a query. The fallback backend gets the raw query with no retrieval; the primary
 * backend gets the top-k stored records as context when a store is configured, or the
 * bare query otherwise. Provider failures are not retried.
 */
export async function answerQuery(deps: AgentDeps, query: unknown, role: ProviderRole): Promise<AnswerResult> {
  const q = validateQuery(query);
  const timeoutMs = deps.config.requestTimeoutMs;

  if (role === "fallback") {
    const fallback = deps.fallback;
    if (!fallback) throw configurationError("Fallback provider is not configured (set GEMINI_API_KEY)");
    const answer = await callUpstream(fallback.provider, timeoutMs, (signal) =>
      fallback.complete([{ role: "user", content: q }], { signal })
    );
    return { answer, provider: fallback.provider, context: [] };
  }

  const primary = deps.primary;
  if (!primary) throw configurationError("Primary provider is not configured (set OPENAI_API_KEY)");

  let context: ScoredRecord[] = [];
  const backend = retrievalBackend(deps);
  if (backend) {
    const { store, embedder } = backend;
    const embedding = await callUpstream(embedder.provider, timeoutMs, (signal) => embedder.embed(q, { signal }));
    const retrieved = await callUpstream(store.provider, timeoutMs, (signal) =>
      store.query(embedding, deps.config.topK, { signal })
    );
    context = retrieved.slice(0, deps.config.topK);
    log.debug(`Retrieved ${context.length} record(s) for query`);
  } else {
    log.debug("No vector store configured; sending bare query");
  }

  const answer = await callUpstream(primary.provider, timeoutMs, (signal) =>
    primary.complete(buildMessages(q, context), { signal })
  );
  return { answer, provider: primary.provider, context };
}
