import type { CollectionDescriptor, IndexedPoint } from "@profile-rag/types";

export interface VectorSearchParams {
  vector: number[];
  topK: number;
  scoreThreshold?: number;
}

export interface VectorSearchResult {
  id: number | string;
  score: number;
  payload: Record<string, unknown>;
}

export interface UpsertOptions {
  /** Resolve only once the points are persisted and searchable. */
  wait?: boolean;
}

export interface IVectorStore {
  /** `null` when the collection does not exist. */
  getCollection(collectionName: string): Promise<CollectionDescriptor | null>;
  createCollection(descriptor: CollectionDescriptor): Promise<void>;
  upsert(collectionName: string, points: IndexedPoint[], options?: UpsertOptions): Promise<void>;
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  healthCheck(): Promise<boolean>;
}
