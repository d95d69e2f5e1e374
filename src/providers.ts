import type { AgentConfig } from "./config.js";
import { createLogger } from "./lib/log.js";
import { createGeminiClient } from "./llm/gemini.js";
import { createOpenAIClient, createOpenAIEmbeddingClient } from "./llm/openai.js";
import { ChromaVectorStore } from "./retrieval/chromaStore.js";
import { LocalVectorStore } from "./retrieval/localStore.js";
import type { VectorStore } from "./retrieval/vectorStore.js";
import type { AgentDeps } from "./rag/deps.js";

const log = createLogger("providers");

function createStore(config: AgentConfig): VectorStore | null {
  const { kind, localPath, chromaUrl, chromaCollection } = config.vectorStore;
  if (kind === "chroma") return new ChromaVectorStore({ url: chromaUrl, collection: chromaCollection });
  if (kind === "local") return new LocalVectorStore(localPath);
  return null;
}

/**
 * Build the provider handles once from configuration. Missing keys leave the matching
 * handle null; the orchestrators report that per request.
 */
export function createDeps(config: AgentConfig): AgentDeps {
  const { requestTimeoutMs: timeoutMs, temperature, maxTokens } = config;

  const primary = config.openai.apiKey
    ? createOpenAIClient({ apiKey: config.openai.apiKey, model: config.openai.model, timeoutMs, temperature, maxTokens })
    : null;
  const fallback = config.gemini.apiKey
    ? createGeminiClient({ apiKey: config.gemini.apiKey, model: config.gemini.model, timeoutMs, temperature, maxTokens })
    : null;

  // Retrieval backs the primary provider only; a fallback default runs without a store.
  const retrievalWanted = config.defaultProvider === "primary" && config.vectorStore.kind !== "none";
  const embedder =
    retrievalWanted && config.embedding.apiKey
      ? createOpenAIEmbeddingClient({ apiKey: config.embedding.apiKey, model: config.embedding.model, timeoutMs })
      : null;
  const store = retrievalWanted && embedder ? createStore(config) : null;

  if (!primary) log.warn("OPENAI_API_KEY is not set; primary chat is unavailable.");
  if (!fallback) log.warn("GEMINI_API_KEY is not set; fallback chat is unavailable.");
  if (store) log.info(`Vector store: ${store.provider}`);
  else log.info("No vector store configured; ingest will be skipped and chat runs without retrieval.");

  return { config, primary, fallback, embedder, store };
}
