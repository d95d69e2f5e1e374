import type { CallOptions } from "../llm/client.js";

export interface DocumentRecord {
  id: string;
  text: string;
  metadata: Record<string, string>;
  embedding: number[];
}

export interface ScoredRecord {
  id: string;
  text: string;
  metadata: Record<string, string>;
  /** Cosine similarity to the query; higher is closer. */
  score: number;
}

/**
 * Persists embedded documents and answers nearest-neighbour queries.
 * Insert only: records are never updated or removed.
 */
export interface VectorStore {
  /** Provider name reported in errors and telemetry. */
  readonly provider: string;
  /** Writes the whole batch or nothing; resolves to the number of records stored. */
  add(records: DocumentRecord[], options?: CallOptions): Promise<number>;
  /** Up to `limit` records, most similar first, ties in insertion order. */
  query(embedding: number[], limit: number, options?: CallOptions): Promise<ScoredRecord[]>;
  count(options?: CallOptions): Promise<number>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}
