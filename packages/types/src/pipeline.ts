import type { ChunkStrategy, ChunkingConfig } from "./chunk.js";
import type { DocumentMetadata } from "./document.js";

export type DistanceMetric = "cosine" | "dot" | "euclid" | "manhattan";

export const DISTANCE_METRICS = ["cosine", "dot", "euclid", "manhattan"] as const;

export interface CollectionDescriptor {
  name: string;
  vectorSize: number;
  distance: DistanceMetric;
}

export type EmbeddingVector = number[];

export interface EmbeddingResult {
  embeddings: EmbeddingVector[];
  model: string;
  tokensUsed: number;
}

export interface PointPayload {
  page_content: string;
  metadata: DocumentMetadata;
}

export interface IndexedPoint {
  id: number;
  vector: EmbeddingVector;
  payload: PointPayload;
}

export type IngestionState =
  | "INIT"
  | "LOADING"
  | "CHUNKING"
  | "EMBEDDING"
  | "STORING"
  | "DONE"
  | "FAILED";

export type IngestionStage = "loading" | "chunking" | "embedding" | "storing";

export interface IngestionInput {
  /** Processed in this order; the order fixes point IDs. */
  sourceDirs: string[];
  collectionName: string;
  distance: DistanceMetric;
  chunkStrategy: ChunkStrategy;
  chunking: ChunkingConfig;
}
