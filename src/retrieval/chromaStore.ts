import { ChromaClient, type Collection } from "chromadb";
import type { CallOptions } from "../llm/client.js";
import type { DocumentRecord, ScoredRecord, VectorStore } from "./vectorStore.js";

export interface ChromaStoreOptions {
  url: string;
  collection: string;
}

function toStringMap(metadata: Record<string, unknown> | null | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata ?? {})) {
    if (value != null) out[key] = String(value);
  }
  return out;
}

/**
 * Vector store backed by a Chroma server over its REST API. The collection uses cosine
 * space so a returned distance d maps to similarity 1 - d.
 *
 * The chromadb client takes no per-request signal. An aborted signal stops a call that has
 * not reached the server yet; a write already sent can still land after the caller timed out.
 */
export class ChromaVectorStore implements VectorStore {
  readonly provider = "chroma";
  private readonly client: ChromaClient;
  private collection: Promise<Collection> | null = null;

  constructor(private readonly options: ChromaStoreOptions) {
    this.client = new ChromaClient({ path: options.url });
  }

  get url(): string {
    return this.options.url;
  }

  get collectionName(): string {
    return this.options.collection;
  }

  async add(records: DocumentRecord[], options?: CallOptions): Promise<number> {
    if (records.length === 0) return 0;
    const collection = await this.getCollection();
    options?.signal?.throwIfAborted();
    await collection.add({
      ids: records.map((r) => r.id),
      embeddings: records.map((r) => r.embedding),
      documents: records.map((r) => r.text),
      metadatas: records.map((r) => ({ ...r.metadata })),
    });
    return records.length;
  }

  async query(embedding: number[], limit: number, options?: CallOptions): Promise<ScoredRecord[]> {
    const collection = await this.getCollection();
    options?.signal?.throwIfAborted();
    const result = await collection.query({ queryEmbeddings: [embedding], nResults: limit });
    const ids = result.ids[0] ?? [];
    const out: ScoredRecord[] = [];
    ids.forEach((id, i) => {
      const text = result.documents[0]?.[i];
      if (text == null) return;
      const distance = result.distances?.[0]?.[i];
      out.push({
        id,
        text,
        metadata: toStringMap(result.metadatas[0]?.[i]),
        score: distance == null ? 0 : 1 - distance,
      });
    });
    return out;
  }

  async count(options?: CallOptions): Promise<number> {
    const collection = await this.getCollection();
    options?.signal?.throwIfAborted();
    return collection.count();
  }

  /** Connects lazily; a failed connection is retried on the next call. */
  private getCollection(): Promise<Collection> {
    if (!this.collection) {
      this.collection = this.client
        .getOrCreateCollection({ name: this.options.collection, metadata: { "hnsw:space": "cosine" } })
        .catch((err: unknown) => {
          this.collection = null;
          throw err;
        });
    }
    return this.collection;
  }
}
