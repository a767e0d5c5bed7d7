import { GoogleGenerativeAI, TaskType, type GenerativeModel } from "@google/generative-ai";
import type { EmbeddingResult } from "@profile-rag/types";
import { ProviderError } from "@profile-rag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-004";
const BATCH_SIZE = 100; // batchEmbedContents limit

export interface GeminiProviderConfig {
  apiKey: string;
  model?: string;
}

export class GeminiEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "gemini";
  readonly maxBatchSize = BATCH_SIZE;
  private model: GenerativeModel;
  private modelName: string;

  constructor(config: GeminiProviderConfig) {
    this.modelName = config.model ?? DEFAULT_MODEL;
    this.model = new GoogleGenerativeAI(config.apiKey).getGenerativeModel({ model: this.modelName });
  }

  async embed(text: string): Promise<EmbeddingResult> {
    try {
      const response = await this.model.embedContent({
        content: { role: "user", parts: [{ text }] },
        taskType: TaskType.RETRIEVAL_QUERY,
      });
      return { embeddings: [response.embedding.values], model: this.modelName, tokensUsed: 0 };
    } catch (err) {
      throw ProviderError.wrap(err, this.name, "embedding");
    }
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      try {
        const response = await this.model.batchEmbedContents({
          requests: batch.map((text) => ({
            content: { role: "user", parts: [{ text }] },
            taskType: TaskType.RETRIEVAL_DOCUMENT,
          })),
        });
        allEmbeddings.push(...response.embeddings.map((e) => e.values));
      } catch (err) {
        throw ProviderError.wrap(err, this.name, "embedding");
      }
    }

    // The Gemini embedding API does not report token usage
    return { embeddings: allEmbeddings, model: this.modelName, tokensUsed: 0 };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
