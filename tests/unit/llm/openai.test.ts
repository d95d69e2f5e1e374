import { describe, it, expect, vi, beforeEach } from "vitest";

const mockCreateCompletion = vi.fn();
const mockCreateEmbedding = vi.fn();
const mockCtor = vi.fn();

vi.mock("openai", () => ({
  default: vi.fn().mockImplementation((options: unknown) => {
    mockCtor(options);
    return {
      chat: { completions: { create: mockCreateCompletion } },
      embeddings: { create: mockCreateEmbedding },
    };
  }),
}));

import { createOpenAIClient, createOpenAIEmbeddingClient } from "../../../src/llm/openai.js";

describe("createOpenAIClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("disables SDK retries and applies the timeout", () => {
    createOpenAIClient({ apiKey: "test-openai-key", model: "gpt-4o", timeoutMs: 1234 });
    expect(mockCtor).toHaveBeenCalledWith({ apiKey: "test-openai-key", timeout: 1234, maxRetries: 0 });
  });

  it("sends the messages and returns the first choice", async () => {
    mockCreateCompletion.mockResolvedValue({ choices: [{ message: { content: "Cats are mammals." } }] });
    const client = createOpenAIClient({ apiKey: "test-openai-key", model: "gpt-4o", timeoutMs: 1000, temperature: 0 });
    const signal = new AbortController().signal;

    const answer = await client.complete(
      [
        { role: "system", content: "You are a helpful assistant." },
        { role: "user", content: "Tell me about cats" },
      ],
      { signal }
    );

    expect(answer).toBe("Cats are mammals.");
    expect(client.provider).toBe("openai");
    expect(mockCreateCompletion).toHaveBeenCalledWith(
      {
        model: "gpt-4o",
        messages: [
          { role: "system", content: "You are a helpful assistant." },
          { role: "user", content: "Tell me about cats" },
        ],
        max_tokens: 1024,
        temperature: 0,
      },
      { signal }
    );
  });

  it("rejects an empty completion", async () => {
    mockCreateCompletion.mockResolvedValue({ choices: [] });
    const client = createOpenAIClient({ apiKey: "test-openai-key", model: "gpt-4o", timeoutMs: 1000 });
    await expect(client.complete([{ role: "user", content: "hi" }])).rejects.toThrow("Empty LLM response");
  });
});

describe("createOpenAIEmbeddingClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("embeds truncated input with the configured model", async () => {
    mockCreateEmbedding.mockResolvedValue({ data: [{ embedding: [0.1, 0.2] }] });
    const client = createOpenAIEmbeddingClient({
      apiKey: "test-openai-key",
      model: "text-embedding-3-small",
      timeoutMs: 1000,
    });

    const vector = await client.embed("x".repeat(9000));

    expect(vector).toEqual([0.1, 0.2]);
    expect(mockCreateEmbedding).toHaveBeenCalledWith(
      { model: "text-embedding-3-small", input: "x".repeat(8000) },
      { signal: undefined }
    );
  });

  it("rejects an empty embedding response", async () => {
    mockCreateEmbedding.mockResolvedValue({ data: [] });
    const client = createOpenAIEmbeddingClient({ apiKey: "test-openai-key", model: "m", timeoutMs: 1000 });
    await expect(client.embed("hi")).rejects.toThrow("Empty embedding response");
  });

  it("embeds a list in one request and orders the vectors by input index", async () => {
    mockCreateEmbedding.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    });
    const client = createOpenAIEmbeddingClient({ apiKey: "test-openai-key", model: "m", timeoutMs: 1000 });

    await expect(client.embedMany(["cats", "dogs"])).resolves.toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(mockCreateEmbedding).toHaveBeenCalledTimes(1);
    expect(mockCreateEmbedding).toHaveBeenCalledWith({ model: "m", input: ["cats", "dogs"] }, { signal: undefined });
  });

  it("rejects a list response with a missing vector", async () => {
    mockCreateEmbedding.mockResolvedValue({ data: [{ index: 0, embedding: [1, 0] }] });
    const client = createOpenAIEmbeddingClient({ apiKey: "test-openai-key", model: "m", timeoutMs: 1000 });
    await expect(client.embedMany(["cats", "dogs"])).rejects.toThrow("Embedding response is missing input 1");
  });
});
