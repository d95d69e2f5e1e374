import type { CallOptions } from "./client.js";

/**
 * Turns text into a vector. Stored and query embeddings must come from the same model.
 */
export interface EmbeddingClient {
  readonly provider: string;
  readonly model: string;
  embed(text: string, options?: CallOptions): Promise<number[]>;
  /** One request for the whole list; vectors come back in input order. */
  embedMany(texts: string[], options?: CallOptions): Promise<number[][]>;
}
