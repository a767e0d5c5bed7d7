import type { VectorStoreType } from "@profile-rag/types";
import { ConfigurationError } from "@profile-rag/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./in-memory-store.js";

export type {
  IVectorStore,
  UpsertOptions,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { InMemoryVectorStore } from "./in-memory-store.js";
export { VectorStoreManager, buildIndexedPoints } from "./vector-store-manager.js";
export type { EnsureCollectionResult, VectorStoreManagerOptions } from "./vector-store-manager.js";

export interface VectorStoreConfig {
  type: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ConfigurationError("qdrantUrl is required for Qdrant vector store");
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey);
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new ConfigurationError(`Unknown vector store type: ${String(config.type)}`);
  }
}
