import type { AgentConfig } from "../config.js";
import type { LLMClient } from "../llm/client.js";
import type { EmbeddingClient } from "../llm/embedding.js";
import type { VectorStore } from "../retrieval/vectorStore.js";

/**
 * Everything the orchestrators need, built once at startup and passed in.
 * A null handle means that collaborator is not configured.
 */
export interface AgentDeps {
  config: AgentConfig;
  primary: LLMClient | null;
  fallback: LLMClient | null;
  embedder: EmbeddingClient | null;
  store: VectorStore | null;
}

/** Retrieval is possible only with both a store and an embedder to feed it. */
export function retrievalBackend(deps: AgentDeps): { store: VectorStore; embedder: EmbeddingClient } | null {
  if (!deps.store || !deps.embedder) return null;
  return { store: deps.store, embedder: deps.embedder };
}
