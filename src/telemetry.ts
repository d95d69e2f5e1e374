import type { ProviderRole, VectorStoreKind } from "./config.js";
import type { AgentDeps } from "./rag/deps.js";

const KEY_PREFIX_CHARS = 6;

/** Show only a short prefix of a secret; never more than half of it. */
export function redactKey(key: string | undefined): string {
  if (!key) return "(none)";
  const visible = Math.min(KEY_PREFIX_CHARS, Math.floor(key.length / 2));
  return `${key.slice(0, visible)}...`;
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "(invalid url)";
  }
}

export interface Telemetry {
  provider: ProviderRole;
  providers: Record<ProviderRole, { name: string; model: string; configured: boolean }>;
  embedding: { model: string; configured: boolean };
  vectorStore: { kind: VectorStoreKind; configured: boolean; location: string | null };
  keys: { openai: string; embedding: string; gemini: string };
  topK: number;
  requestTimeoutMs: number;
}

/** Configuration diagnostics with secrets redacted. Reads configuration only; no provider calls. */
export function buildTelemetry(deps: AgentDeps): Telemetry {
  const { config } = deps;
  const kind: VectorStoreKind = deps.store ? config.vectorStore.kind : "none";
  let location: string | null = null;
  if (kind === "chroma") location = `${hostOf(config.vectorStore.chromaUrl)}/${config.vectorStore.chromaCollection}`;
  else if (kind === "local") location = config.vectorStore.localPath ?? "memory";

  return {
    provider: config.defaultProvider,
    providers: {
      primary: { name: deps.primary?.provider ?? "openai", model: config.openai.model, configured: deps.primary !== null },
      fallback: { name: deps.fallback?.provider ?? "gemini", model: config.gemini.model, configured: deps.fallback !== null },
    },
    embedding: { model: config.embedding.model, configured: deps.embedder !== null },
    vectorStore: { kind, configured: deps.store !== null, location },
    keys: {
      openai: redactKey(config.openai.apiKey),
      embedding: redactKey(config.embedding.apiKey),
      gemini: redactKey(config.gemini.apiKey),
    },
    topK: config.topK,
    requestTimeoutMs: config.requestTimeoutMs,
  };
}
