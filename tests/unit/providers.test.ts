import { describe, it, expect } from "vitest";
import { loadConfig } from "../../src/config.js";
import { createDeps } from "../../src/providers.js";
import { ChromaVectorStore } from "../../src/retrieval/chromaStore.js";
import { LocalVectorStore } from "../../src/retrieval/localStore.js";

describe("createDeps", () => {
  it("builds every handle when both keys are present", () => {
    const deps = createDeps(
      loadConfig({ OPENAI_API_KEY: "test-openai-key", GEMINI_API_KEY: "test-gemini-key", LOCAL_STORE_PATH: "" })
    );

    expect(deps.primary?.provider).toBe("openai");
    expect(deps.primary?.model).toBe("gpt-4o");
    expect(deps.fallback?.provider).toBe("gemini");
    expect(deps.embedder?.model).toBe("text-embedding-3-small");
    expect(deps.store).toBeInstanceOf(LocalVectorStore);
  });

  it("builds a Chroma store when selected", () => {
    const deps = createDeps(loadConfig({ OPENAI_API_KEY: "test-openai-key", VECTOR_STORE: "chroma" }));
    expect(deps.store).toBeInstanceOf(ChromaVectorStore);
  });

  it("leaves retrieval out without an embedding key", () => {
    const deps = createDeps(loadConfig({ GEMINI_API_KEY: "test-gemini-key" }));
    expect(deps.primary).toBeNull();
    expect(deps.embedder).toBeNull();
    expect(deps.store).toBeNull();
  });

  it("leaves retrieval out when the fallback provider is the default", () => {
    const deps = createDeps(
      loadConfig({ OPENAI_API_KEY: "test-openai-key", GEMINI_API_KEY: "test-gemini-key", DEFAULT_PROVIDER: "gemini" })
    );
    expect(deps.primary).not.toBeNull();
    expect(deps.store).toBeNull();
  });

  it("leaves retrieval out when the store is disabled", () => {
    const deps = createDeps(loadConfig({ OPENAI_API_KEY: "test-openai-key", VECTOR_STORE: "none" }));
    expect(deps.embedder).toBeNull();
    expect(deps.store).toBeNull();
  });
});
