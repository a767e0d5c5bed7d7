import { beforeEach, describe, it, expect } from "vitest";
import type { EmbeddingResult, IndexedPoint } from "@profile-rag/types";
import { ValidationError } from "@profile-rag/errors";
import type { IEmbeddingProvider } from "@profile-rag/embeddings";
import type { GenerateOptions, ILlmProvider, LlmCompletion } from "@profile-rag/llm";
import { InMemoryVectorStore } from "@profile-rag/vector-store";
import { retrieve } from "./retrieval-pipeline.js";
import { answer } from "./answer-pipeline.js";

/** Maps known questions onto fixed directions; everything else points at [0, 0, 1]. */
class FakeQueryProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly maxBatchSize = 10;
  queries: string[] = [];

  async embed(text: string): Promise<EmbeddingResult> {
    this.queries.push(text);
    const vector = text.includes("TypeScript") ? [1, 0, 0] : text.includes("Go") ? [0, 1, 0] : [0, 0, 1];
    return { embeddings: [vector], model: "fake", tokensUsed: 0 };
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return { embeddings: texts.map(() => [0, 0, 1]), model: "fake", tokensUsed: 0 };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

class RecordingLlm implements ILlmProvider {
  readonly name = "groq";
  readonly model = "llama3-8b-8192";
  prompts: string[] = [];

  async generate(prompt: string, _options?: GenerateOptions): Promise<LlmCompletion> {
    this.prompts.push(prompt);
    return { text: "Answer text", model: this.model };
  }

  async listModels(): Promise<string[]> {
    return [this.model];
  }
}

function point(id: number, vector: number[], text: string, source: string): IndexedPoint {
  return { id, vector, payload: { page_content: text, metadata: { source } } };
}

let store: InMemoryVectorStore;
let provider: FakeQueryProvider;

beforeEach(async () => {
  store = new InMemoryVectorStore();
  provider = new FakeQueryProvider();
  await store.createCollection({ name: "personal_profile", vectorSize: 3, distance: "cosine" });
  await store.upsert("personal_profile", [
    point(0, [1, 0, 0], "Five years of TypeScript.", "cv.md"),
    point(1, [0.9, 0.1, 0], "Built a TypeScript RAG service.", "projects/rag.md"),
    point(2, [0, 1, 0], "Wrote Go microservices.", "projects/go.md"),
  ]);
});

describe("retrieve", () => {
  it("embeds the trimmed question and returns scored chunks", async () => {
    const result = await retrieve(
      { question: "  What TypeScript experience?  ", topK: 2 },
      { embeddingProvider: provider, vectorStore: store, collectionName: "personal_profile" },
    );

    expect(provider.queries).toEqual(["What TypeScript experience?"]);
    expect(result.chunks.map((c) => [c.id, c.content, c.metadata])).toEqual([
      ["0", "Five years of TypeScript.", { source: "cv.md" }],
      ["1", "Built a TypeScript RAG service.", { source: "projects/rag.md" }],
    ]);
    expect(result.chunks[0]?.score).toBeCloseTo(1);
  });

  it("uses the configured default topK", async () => {
    const result = await retrieve(
      { question: "TypeScript?" },
      { embeddingProvider: provider, vectorStore: store, collectionName: "personal_profile", defaultTopK: 1 },
    );

    expect(result.chunks).toHaveLength(1);
  });

  it("rejects a blank question before embedding", async () => {
    await expect(
      retrieve(
        { question: "   " },
        { embeddingProvider: provider, vectorStore: store, collectionName: "personal_profile" },
      ),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(provider.queries).toEqual([]);
  });
});

describe("answer", () => {
  const template = "Context:\n{context}\n\nQuestion: {question}";

  it("renders retrieved context into the prompt and returns sources", async () => {
    const llm = new RecordingLlm();

    const result = await answer(
      { question: "Any Go?", topK: 1 },
      {
        embeddingProvider: provider,
        vectorStore: store,
        collectionName: "personal_profile",
        llm,
        systemPrompt: template,
      },
    );

    expect(llm.prompts).toEqual([
      "Context:\n[1] (Source: projects/go.md)\nWrote Go microservices.\n\nQuestion: Any Go?",
    ]);
    expect(result).toEqual({
      answer: "Answer text",
      sources: [{ content: "Wrote Go microservices.", metadata: { source: "projects/go.md" } }],
      model: "llama3-8b-8192",
      provider: "groq",
    });
  });

  it("still asks the model when nothing is retrieved", async () => {
    const llm = new RecordingLlm();
    const empty = new InMemoryVectorStore();
    await empty.createCollection({ name: "personal_profile", vectorSize: 3, distance: "cosine" });

    const result = await answer(
      { question: "Anything?" },
      {
        embeddingProvider: provider,
        vectorStore: empty,
        collectionName: "personal_profile",
        llm,
        systemPrompt: template,
      },
    );

    expect(llm.prompts).toEqual(["Context:\n\n\nQuestion: Anything?"]);
    expect(result.sources).toEqual([]);
  });
});
