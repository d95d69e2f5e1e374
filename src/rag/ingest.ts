import { randomUUID } from "crypto";
import { validationError } from "../errors.js";
import { callUpstream } from "../lib/timeout.js";
import { createLogger } from "../lib/log.js";
import type { DocumentRecord } from "../retrieval/vectorStore.js";
import { retrievalBackend, type AgentDeps } from "./deps.js";

const log = createLogger("ingest");

export const NO_STORE_REASON = "no vector store configured";

/** Texts per embedding request; batches are sent one after another. */
export const EMBED_BATCH_SIZE = 64;

export type IngestResult = { status: "stored"; storedCount: number } | { status: "skipped"; reason: string };

/** Non-empty array of strings that are non-empty after trimming; returns the trimmed texts. */
export function validateTexts(texts: unknown): string[] {
  if (!Array.isArray(texts) || texts.length === 0) {
    throw validationError("texts must be a non-empty array of strings");
  }
  return texts.map((t, i) => {
    if (typeof t !== "string" || !t.trim()) {
      throw validationError(`texts[${i}] must be a non-empty string`, { index: i });
    }
    return t.trim();
  });
}

/**
 * Embed each text and write the batch to the vector store.
 * All-or-nothing: every embedding is computed before the single store write, and any
 * failure fails the whole call. At most one embedding request is in flight.
 */
export async function ingestTexts(
  deps: AgentDeps,
  texts: unknown,
  sourceTag: string,
  extraMetadata: Record<string, string> = {}
): Promise<IngestResult> {
  const backend = retrievalBackend(deps);
  if (!backend) {
    log.info("Ingest skipped: no vector store configured");
    return { status: "skipped", reason: NO_STORE_REASON };
  }
  const cleaned = validateTexts(texts);
  const { store, embedder } = backend;
  const timeoutMs = deps.config.requestTimeoutMs;

  const embeddings: number[][] = [];
  for (let start = 0; start < cleaned.length; start += EMBED_BATCH_SIZE) {
    const batch = cleaned.slice(start, start + EMBED_BATCH_SIZE);
    const vectors = await callUpstream(embedder.provider, timeoutMs, (signal) => embedder.embedMany(batch, { signal }));
    embeddings.push(...vectors);
  }
  const records: DocumentRecord[] = cleaned.map((text, i) => ({
    id: randomUUID(),
    text,
    metadata: { ...extraMetadata, source: sourceTag },
    embedding: embeddings[i],
  }));
  const storedCount = await callUpstream(store.provider, timeoutMs, (signal) => store.add(records, { signal }));
  log.info(`Stored ${storedCount} record(s) from "${sourceTag}"`);
  return { status: "stored", storedCount };
}
