import { describe, it, expect, vi, beforeEach } from "vitest";

const mockAdd = vi.fn();
const mockQuery = vi.fn();
const mockCount = vi.fn();
const mockGetOrCreateCollection = vi.fn();
const mockClientCtor = vi.fn();

vi.mock("chromadb", () => ({
  ChromaClient: vi.fn().mockImplementation((options: unknown) => {
    mockClientCtor(options);
    return { getOrCreateCollection: mockGetOrCreateCollection };
  }),
}));

import { ChromaVectorStore } from "../../../src/retrieval/chromaStore.js";

describe("ChromaVectorStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockGetOrCreateCollection.mockResolvedValue({ add: mockAdd, query: mockQuery, count: mockCount });
  });

  it("connects to the configured server and creates a cosine collection once", async () => {
    const store = new ChromaVectorStore({ url: "http://chroma_service:8000", collection: "docs" });
    mockCount.mockResolvedValue(4);

    expect(await store.count()).toBe(4);
    expect(await store.count()).toBe(4);

    expect(mockClientCtor).toHaveBeenCalledWith({ path: "http://chroma_service:8000" });
    expect(mockGetOrCreateCollection).toHaveBeenCalledTimes(1);
    expect(mockGetOrCreateCollection).toHaveBeenCalledWith({ name: "docs", metadata: { "hnsw:space": "cosine" } });
  });

  it("writes a batch in one add call", async () => {
    const store = new ChromaVectorStore({ url: "http://localhost:8000", collection: "docs" });
    mockAdd.mockResolvedValue(undefined);

    const stored = await store.add([
      { id: "1", text: "Cats are mammals", metadata: { source: "ingest_api" }, embedding: [1, 0] },
      { id: "2", text: "Dogs are mammals", metadata: { source: "ingest_api" }, embedding: [0, 1] },
    ]);

    expect(stored).toBe(2);
    expect(mockAdd).toHaveBeenCalledWith({
      ids: ["1", "2"],
      embeddings: [
        [1, 0],
        [0, 1],
      ],
      documents: ["Cats are mammals", "Dogs are mammals"],
      metadatas: [{ source: "ingest_api" }, { source: "ingest_api" }],
    });
  });

  it("does not send a write whose caller has already given up", async () => {
    const store = new ChromaVectorStore({ url: "http://localhost:8000", collection: "docs" });
    const controller = new AbortController();
    controller.abort();

    await expect(
      store.add([{ id: "1", text: "Cats", metadata: {}, embedding: [1, 0] }], { signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(mockAdd).not.toHaveBeenCalled();
  });

  it("skips the server for an empty batch", async () => {
    const store = new ChromaVectorStore({ url: "http://localhost:8000", collection: "docs" });
    expect(await store.add([])).toBe(0);
    expect(mockGetOrCreateCollection).not.toHaveBeenCalled();
  });

  it("maps query results to scored records", async () => {
    const store = new ChromaVectorStore({ url: "http://localhost:8000", collection: "docs" });
    mockQuery.mockResolvedValue({
      ids: [["1", "2", "3"]],
      documents: [["Cats are mammals", null, "Fish swim"]],
      metadatas: [[{ source: "upload", page: 2 }, null, null]],
      distances: [[0.25, 0.5, 0.75]],
    });

    const results = await store.query([1, 0], 3);

    expect(mockQuery).toHaveBeenCalledWith({ queryEmbeddings: [[1, 0]], nResults: 3 });
    expect(results).toEqual([
      { id: "1", text: "Cats are mammals", metadata: { source: "upload", page: "2" }, score: 0.75 },
      { id: "3", text: "Fish swim", metadata: {}, score: 0.25 },
    ]);
  });

  it("retries the connection after a failure", async () => {
    const store = new ChromaVectorStore({ url: "http://localhost:8000", collection: "docs" });
    mockGetOrCreateCollection.mockRejectedValueOnce(new TypeError("fetch failed"));
    mockCount.mockResolvedValue(0);

    await expect(store.count()).rejects.toThrow("fetch failed");
    await expect(store.count()).resolves.toBe(0);
    expect(mockGetOrCreateCollection).toHaveBeenCalledTimes(2);
  });
});
