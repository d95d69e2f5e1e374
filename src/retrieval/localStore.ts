import { readFile, writeFile, mkdir, rename, rm } from "fs/promises";
import path from "path";
import { configurationError } from "../errors.js";
import { createLogger } from "../lib/log.js";
import type { CallOptions } from "../llm/client.js";
import { cosineSimilarity, type DocumentRecord, type ScoredRecord, type VectorStore } from "./vectorStore.js";

const log = createLogger("local-store");

interface StoreFile {
  records: DocumentRecord[];
  updatedAt: string;
}

function isStringMap(value: unknown): value is Record<string, string> {
  return typeof value === "object" && value !== null && Object.values(value).every((v) => typeof v === "string");
}

function isRecord(value: unknown): value is DocumentRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "text" in value &&
    typeof value.text === "string" &&
    "embedding" in value &&
    Array.isArray(value.embedding) &&
    value.embedding.every((n: unknown) => typeof n === "number") &&
    "metadata" in value &&
    isStringMap(value.metadata)
  );
}

/**
 * In-process vector store. With a file path the records are kept in a JSON file
 * and loaded on first use; without one they live only as long as the process.
 */
export class LocalVectorStore implements VectorStore {
  readonly provider = "local-store";
  private records: DocumentRecord[] | null = null;
  private loading: Promise<DocumentRecord[]> | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  /** Set when the file held entries that could not be read; writes would lose them. */
  private unreadable: string | null = null;

  constructor(private readonly filePath?: string) {}

  get persistent(): boolean {
    return this.filePath !== undefined;
  }

  /**
   * Adds run one at a time so a failed write can roll back only its own batch.
   * An aborted signal cancels the batch while it waits and up to the final rename.
   */
  add(records: DocumentRecord[], options?: CallOptions): Promise<number> {
    const run = this.writeChain.then(() => this.addNow(records, options?.signal));
    this.writeChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async addNow(records: DocumentRecord[], signal?: AbortSignal): Promise<number> {
    const current = await this.load();
    if (this.unreadable) {
      throw configurationError(`Refusing to overwrite ${this.filePath}: ${this.unreadable}`);
    }
    const expected = this.dimension(current) ?? records[0]?.embedding.length;
    for (const r of records) {
      if (r.embedding.length === 0 || r.embedding.length !== expected) {
        throw configurationError(
          `Embedding dimension mismatch: store holds ${expected}-d vectors, got ${r.embedding.length}-d`,
          { expected, received: r.embedding.length }
        );
      }
    }
    signal?.throwIfAborted();
    const before = current.length;
    current.push(...records);
    try {
      await this.save(current, signal);
    } catch (err) {
      current.length = before;
      throw err;
    }
    return records.length;
  }

  async query(embedding: number[], limit: number): Promise<ScoredRecord[]> {
    const current = await this.load();
    if (current.length === 0) return [];
    const dim = this.dimension(current);
    if (dim !== undefined && dim !== embedding.length) {
      throw configurationError(
        `Embedding dimension mismatch: store holds ${dim}-d vectors, query is ${embedding.length}-d`,
        { expected: dim, received: embedding.length }
      );
    }
    const scored = current.map((r) => ({
      id: r.id,
      text: r.text,
      metadata: { ...r.metadata },
      score: cosineSimilarity(embedding, r.embedding),
    }));
    // Array.prototype.sort is stable, so equal scores stay in insertion order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, limit));
  }

  async count(): Promise<number> {
    return (await this.load()).length;
  }

  private dimension(records: DocumentRecord[]): number | undefined {
    return records[0]?.embedding.length;
  }

  private load(): Promise<DocumentRecord[]> {
    if (this.records) return Promise.resolve(this.records);
    if (!this.loading) {
      this.loading = this.readFromDisk().then(
        (records) => {
          this.records = records;
          return records;
        },
        (err: unknown) => {
          this.loading = null;
          throw err;
        }
      );
    }
    return this.loading;
  }

  private async readFromDisk(): Promise<DocumentRecord[]> {
    if (!this.filePath) return [];
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    const data: unknown = JSON.parse(raw);
    if (typeof data !== "object" || data === null || !("records" in data) || !Array.isArray(data.records)) {
      this.markUnreadable("file has no records array");
      return [];
    }
    const records = data.records.filter(isRecord);
    const dropped = data.records.length - records.length;
    if (dropped > 0) this.markUnreadable(`${dropped} malformed record(s) could not be loaded`);
    return records;
  }

  private markUnreadable(reason: string): void {
    this.unreadable = reason;
    log.warn(`${this.filePath}: ${reason}; the store is read-only until the file is fixed`);
  }

  private async save(records: DocumentRecord[], signal?: AbortSignal): Promise<void> {
    if (!this.filePath) return;
    const toSave: StoreFile = { records, updatedAt: new Date().toISOString() };
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(toSave), "utf-8");
    if (signal?.aborted) {
      await rm(tmp, { force: true });
      signal.throwIfAborted();
    }
    await rename(tmp, this.filePath);
  }
}
