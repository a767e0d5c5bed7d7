import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@profile-rag/types";
import { ProviderError } from "@profile-rag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const BATCH_SIZE = 96; // Cohere limit

type CohereInputType = "search_document" | "search_query";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly maxBatchSize = BATCH_SIZE;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedWith([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedWith(texts, "search_document");
  }

  private async embedWith(texts: string[], inputType: CohereInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      try {
        const response = await this.client.v2.embed({
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
        });

        if (response.embeddings.float) {
          allEmbeddings.push(...response.embeddings.float);
        }
        if (response.meta?.billedUnits?.inputTokens) {
          totalTokens += response.meta.billedUnits.inputTokens;
        }
      } catch (err) {
        throw ProviderError.wrap(err, this.name, "embedding");
      }
    }

    return { embeddings: allEmbeddings, model: this.model, tokensUsed: totalTokens };
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
