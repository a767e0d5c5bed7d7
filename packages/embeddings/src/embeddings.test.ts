import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { EmbeddingResult } from "@profile-rag/types";
import { ContractViolationError, ProviderError, ValidationError } from "@profile-rag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { EmbeddingClient } from "./embedding-client.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
import { GeminiEmbeddingProvider } from "./gemini-provider.js";
import { createEmbeddingProvider } from "./factory.js";

const gemini = vi.hoisted(() => ({
  getGenerativeModel: vi.fn(),
  embedContent: vi.fn(),
  batchEmbedContents: vi.fn(),
}));

vi.mock("@google/generative-ai", () => ({
  TaskType: { RETRIEVAL_QUERY: "RETRIEVAL_QUERY", RETRIEVAL_DOCUMENT: "RETRIEVAL_DOCUMENT" },
  GoogleGenerativeAI: class {
    getGenerativeModel(params: unknown) {
      gemini.getGenerativeModel(params);
      return { embedContent: gemini.embedContent, batchEmbedContents: gemini.batchEmbedContents };
    }
  },
}));

class FakeProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly calls: string[][] = [];

  constructor(
    readonly maxBatchSize = 3,
    private readonly respond: (texts: string[]) => number[][] = (texts) =>
      texts.map((t) => [t.length, 1, 0, 0]),
  ) {}

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push(texts);
    return { embeddings: this.respond(texts), model: "fake", tokensUsed: 0 };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async () => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("EmbeddingClient", () => {
  it("returns [] for empty input without calling the provider", async () => {
    const provider = new FakeProvider();

    await expect(new EmbeddingClient(provider).embedAll([])).resolves.toEqual([]);
    expect(provider.calls).toEqual([]);
  });

  it("splits into provider-sized batches and keeps input order", async () => {
    const provider = new FakeProvider(3);
    const texts = ["a", "bb", "ccc", "dddd", "eeeee", "ffffff", "g"];

    const vectors = await new EmbeddingClient(provider, { batchSize: 100 }).embedAll(texts);

    expect(provider.calls.map((batch) => batch.length)).toEqual([3, 3, 1]);
    expect(vectors.map((v) => v[0])).toEqual([1, 2, 3, 4, 5, 6, 1]);
  });

  it("uses the configured batch size when it is below the provider limit", async () => {
    const provider = new FakeProvider(96);

    await new EmbeddingClient(provider, { batchSize: 2 }).embedAll(["a", "b", "c", "d", "e"]);

    expect(provider.calls).toEqual([["a", "b"], ["c", "d"], ["e"]]);
  });

  it("rejects a batch with the wrong number of vectors", async () => {
    const provider = new FakeProvider(10, (texts) => texts.slice(1).map(() => [1, 2]));

    await expect(new EmbeddingClient(provider).embedAll(["a", "b"])).rejects.toThrow(
      "Embedding provider returned 1 vectors for 2 texts (batch 1/1)",
    );
  });

  it("rejects vectors of differing dimensionality across batches", async () => {
    let call = 0;
    const provider = new FakeProvider(1, (texts) => texts.map(() => (call++ === 0 ? [1, 2, 3, 4] : [1, 2, 3])));

    const error: unknown = await new EmbeddingClient(provider).embedAll(["a", "b"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ContractViolationError);
    expect(error).toMatchObject({
      message: "Embedding at index 1 has 3 dimensions, expected 4",
      isOperational: false,
    });
  });

  it("rejects empty vectors", async () => {
    const provider = new FakeProvider(10, (texts) => texts.map(() => []));

    await expect(new EmbeddingClient(provider).embedAll(["a"])).rejects.toBeInstanceOf(
      ContractViolationError,
    );
  });

  it("wraps raw provider failures in ProviderError", async () => {
    const provider = new FakeProvider(10, () => {
      throw new Error("socket hang up");
    });

    const error: unknown = await new EmbeddingClient(provider).embedAll(["a"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ message: "fake embedding failed: socket hang up", service: "fake" });
  });

  it("passes AppErrors through unchanged", async () => {
    const original = new ValidationError("bad input");
    const provider = new FakeProvider(10, () => {
      throw original;
    });

    await expect(new EmbeddingClient(provider).embedAll(["a"])).rejects.toBe(original);
  });
});

describe("BgeM3EmbeddingProvider", () => {
  it("posts texts to /embed and returns the vectors", async () => {
    const fetchMock = stubFetch(
      Response.json({ embeddings: [[0.1, 0.2], [0.3, 0.4]], tokens_used: 7 }),
    );
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local:8080/" });

    const result = await provider.batchEmbed(["one", "two"]);

    expect(result).toEqual({ embeddings: [[0.1, 0.2], [0.3, 0.4]], model: "bge-m3", tokensUsed: 7 });
    expect(fetchMock).toHaveBeenCalledWith("http://bge.local:8080/embed", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts: ["one", "two"] }),
    });
  });

  it("raises ProviderError with the upstream status", async () => {
    stubFetch(new Response("overloaded", { status: 503, statusText: "Service Unavailable" }));
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local:8080" });

    await expect(provider.batchEmbed(["x"])).rejects.toMatchObject({
      code: "PROVIDER_ERROR",
      upstreamStatus: 503,
      message: "BGE-M3 embedding failed: 503 Service Unavailable",
    });
  });

  it("raises ContractViolationError on a malformed body", async () => {
    stubFetch(Response.json({ vectors: [] }));
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local:8080" });

    await expect(provider.batchEmbed(["x"])).rejects.toBeInstanceOf(ContractViolationError);
  });

  it("reports health from /health", async () => {
    stubFetch(new Error("connect ECONNREFUSED"));
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local:8080" });

    await expect(provider.healthCheck()).resolves.toBe(false);
  });
});

describe("GeminiEmbeddingProvider", () => {
  beforeEach(() => {
    gemini.getGenerativeModel.mockReset();
    gemini.embedContent.mockReset();
    gemini.batchEmbedContents.mockReset();
  });

  it("embeds documents with the retrieval-document task type", async () => {
    gemini.batchEmbedContents.mockResolvedValue({
      embeddings: [{ values: [1, 0] }, { values: [0, 1] }],
    });
    const provider = new GeminiEmbeddingProvider({ apiKey: "test-key" });

    const result = await provider.batchEmbed(["alpha", "beta"]);

    expect(gemini.getGenerativeModel).toHaveBeenCalledWith({ model: "text-embedding-004" });
    expect(result).toEqual({ embeddings: [[1, 0], [0, 1]], model: "text-embedding-004", tokensUsed: 0 });
    expect(gemini.batchEmbedContents).toHaveBeenCalledWith({
      requests: [
        { content: { role: "user", parts: [{ text: "alpha" }] }, taskType: "RETRIEVAL_DOCUMENT" },
        { content: { role: "user", parts: [{ text: "beta" }] }, taskType: "RETRIEVAL_DOCUMENT" },
      ],
    });
  });

  it("embeds queries with the retrieval-query task type", async () => {
    gemini.embedContent.mockResolvedValue({ embedding: { values: [0.5, 0.5] } });
    const provider = new GeminiEmbeddingProvider({ apiKey: "test-key", model: "embedding-001" });

    const result = await provider.embed("what do they build?");

    expect(result.embeddings).toEqual([[0.5, 0.5]]);
    expect(gemini.embedContent).toHaveBeenCalledWith({
      content: { role: "user", parts: [{ text: "what do they build?" }] },
      taskType: "RETRIEVAL_QUERY",
    });
  });

  it("keeps the HTTP status of SDK failures", async () => {
    gemini.batchEmbedContents.mockRejectedValue(
      Object.assign(new Error("[429 Too Many Requests] quota"), { status: 429 }),
    );
    const provider = new GeminiEmbeddingProvider({ apiKey: "test-key" });

    await expect(provider.batchEmbed(["x"])).rejects.toMatchObject({
      code: "PROVIDER_ERROR",
      upstreamStatus: 429,
      service: "gemini",
    });
  });
});

describe("createEmbeddingProvider", () => {
  it("creates GeminiEmbeddingProvider for type 'gemini'", () => {
    const provider = createEmbeddingProvider({
      provider: "gemini",
      gemini: { apiKey: "test-key", model: "text-embedding-004" },
    });
    expect(provider.name).toBe("gemini");
    expect(provider.maxBatchSize).toBe(100);
  });

  it("creates CohereEmbeddingProvider for type 'cohere'", () => {
    const provider = createEmbeddingProvider({
      provider: "cohere",
      cohere: { apiKey: "test-key" },
    });
    expect(provider.name).toBe("cohere");
    expect(provider.maxBatchSize).toBe(96);
  });

  it("creates BgeM3EmbeddingProvider for type 'bge-m3'", () => {
    const provider = createEmbeddingProvider({
      provider: "bge-m3",
      bgeM3: { baseUrl: "http://localhost:8080" },
    });
    expect(provider.name).toBe("bge-m3");
  });

  it("throws for missing cohere config", () => {
    expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(
      "Cohere config is required",
    );
  });

  it("throws for a blank gemini key", () => {
    expect(() =>
      createEmbeddingProvider({ provider: "gemini", gemini: { apiKey: "" } }),
    ).toThrow("Gemini config is required");
  });
});
