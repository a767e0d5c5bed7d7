import type { EmbeddingResult } from "@profile-rag/types";
import type { IEmbeddingProvider } from "@profile-rag/embeddings";
import type { GenerateOptions, ILlmProvider, LlmCompletion } from "@profile-rag/llm";

/** Two-dimensional vectors derived from text length. */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly maxBatchSize = 16;
  failures: Error[] = [];

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const failure = this.failures.shift();
    if (failure) throw failure;
    return { embeddings: texts.map((t) => [t.length, 1]), model: "fake", tokensUsed: 0 };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

export class FakeLlmProvider implements ILlmProvider {
  readonly name = "fake";
  readonly model = "fake-model";
  prompts: string[] = [];

  constructor(
    private readonly reply: string,
    private readonly models: string[] = [],
  ) {}

  async generate(prompt: string, _options?: GenerateOptions): Promise<LlmCompletion> {
    this.prompts.push(prompt);
    return { text: this.reply, model: this.model };
  }

  async listModels(): Promise<string[]> {
    return this.models;
  }
}

/** Minimal environment for an in-memory store and a local embedding endpoint. */
export function testEnv(dataDir: string, extra: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    DATA_DIR: dataDir,
    SOURCE_DIRS: "CV",
    VECTOR_STORE: "memory",
    EMBEDDING_PROVIDER: "bge-m3",
    BGE_M3_URL: "http://localhost:9999",
    ...extra,
  };
}
