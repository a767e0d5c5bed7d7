import type { ChunkStrategy } from "./chunk.js";
import type { DistanceMetric } from "./pipeline.js";

export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type EmbeddingProviderType = "gemini" | "cohere" | "bge-m3";

export type LlmProviderType = "groq" | "openai" | "lm-studio" | "gemini";

export type VectorStoreType = "qdrant" | "memory";

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  ingestion: IngestionConfig;
  vectorStore: VectorStoreSettings;
  embeddings: EmbeddingSettings;
  llm: LlmSettings;
  retrieval: RetrievalConfig;
  redis: RedisConfig;
}

export interface IngestionConfig {
  dataDir: string;
  /** Absolute paths, in processing order. */
  sourceDirs: string[];
  collectionName: string;
  distance: DistanceMetric;
  chunkStrategy: ChunkStrategy;
  chunkSize: number;
  chunkOverlap: number;
  strictCollectionDimensions: boolean;
  maxRetries: number;
}

export interface VectorStoreSettings {
  type: VectorStoreType;
  qdrantUrl: string;
  qdrantApiKey?: string;
}

export interface EmbeddingSettings {
  provider: EmbeddingProviderType;
  batchSize: number;
  gemini: { apiKey: string; model: string };
  cohere: { apiKey: string; model: string };
  bgeM3: { baseUrl: string };
}

export interface LlmSettings {
  provider: LlmProviderType;
  model?: string;
  baseUrl?: string;
  apiKey: string;
}

export interface RetrievalConfig {
  topK: number;
  systemPrompt: string;
}

export interface RedisConfig {
  url: string;
}
