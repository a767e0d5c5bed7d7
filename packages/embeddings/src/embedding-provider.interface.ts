import type { EmbeddingResult } from "@profile-rag/types";

export interface IEmbeddingProvider {
  readonly name: string;
  /** Largest number of texts accepted by one `batchEmbed` call. */
  readonly maxBatchSize: number;

  /** Embed a search query. Providers with task types use their query type here. */
  embed(text: string): Promise<EmbeddingResult>;
  /** Embed documents for indexing, in input order. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
