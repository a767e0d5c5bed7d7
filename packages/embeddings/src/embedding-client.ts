import type { EmbeddingVector } from "@profile-rag/types";
import { ContractViolationError, ProviderError } from "@profile-rag/errors";
import type { Logger } from "@profile-rag/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface EmbeddingClientOptions {
  /** Upper bound per provider call; the provider's own limit still applies. */
  batchSize?: number;
  logger?: Logger;
}

/**
 * Embeds a whole corpus through one provider.
 *
 * Batches go out one after another and their vectors are concatenated in input
 * order. Every response is checked for count and dimensionality; a provider that
 * answers with the wrong shape raises `ContractViolationError`. No retries here,
 * the caller owns the retry policy.
 */
export class EmbeddingClient {
  private readonly batchSize: number;
  private readonly logger?: Logger;

  constructor(
    private readonly provider: IEmbeddingProvider,
    options: EmbeddingClientOptions = {},
  ) {
    this.batchSize = Math.max(1, Math.min(options.batchSize ?? provider.maxBatchSize, provider.maxBatchSize));
    this.logger = options.logger;
  }

  get providerName(): string {
    return this.provider.name;
  }

  async embedAll(texts: readonly string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];

    const vectors: EmbeddingVector[] = [];
    const batchCount = Math.ceil(texts.length / this.batchSize);

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const batchNumber = i / this.batchSize + 1;

      let embeddings: EmbeddingVector[];
      try {
        ({ embeddings } = await this.provider.batchEmbed(batch));
      } catch (err) {
        throw ProviderError.wrap(err, this.provider.name, "embedding");
      }

      if (embeddings.length !== batch.length) {
        throw new ContractViolationError(
          `Embedding provider returned ${String(embeddings.length)} vectors for ${String(batch.length)} texts (batch ${String(batchNumber)}/${String(batchCount)})`,
          this.provider.name,
        );
      }

      vectors.push(...embeddings);
      this.logger?.debug(
        { provider: this.provider.name, batch: batchNumber, batches: batchCount, size: batch.length },
        "Embedded batch",
      );
    }

    assertUniformDimensions(vectors, this.provider.name);
    return vectors;
  }
}

function assertUniformDimensions(vectors: EmbeddingVector[], service: string): void {
  const expected = vectors[0]?.length ?? 0;
  if (expected === 0) {
    throw new ContractViolationError("Embedding provider returned an empty vector", service);
  }

  const offending = vectors.findIndex((vector) => vector.length !== expected);
  if (offending >= 0) {
    throw new ContractViolationError(
      `Embedding at index ${String(offending)} has ${String(vectors[offending]?.length ?? 0)} dimensions, expected ${String(expected)}`,
      service,
    );
  }
}
