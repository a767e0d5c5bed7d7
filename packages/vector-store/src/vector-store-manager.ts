import type { Chunk, CollectionDescriptor, DistanceMetric, IndexedPoint } from "@profile-rag/types";
import { ConflictError, ContractViolationError } from "@profile-rag/errors";
import type { Logger } from "@profile-rag/logger";
import type { IVectorStore } from "./vector-store.interface.js";

export interface VectorStoreManagerOptions {
  /** Fail when an existing collection's size or metric differs from the run's. */
  strictDimensions?: boolean;
  logger?: Logger;
}

export interface EnsureCollectionResult {
  descriptor: CollectionDescriptor;
  created: boolean;
}

export class VectorStoreManager {
  private readonly strictDimensions: boolean;
  private readonly logger?: Logger;

  constructor(
    readonly store: IVectorStore,
    options: VectorStoreManagerOptions = {},
  ) {
    this.strictDimensions = options.strictDimensions ?? false;
    this.logger = options.logger;
  }

  /**
   * Create the collection if it is missing. An existing collection is reused
   * as-is unless strict mode is on, in which case a mismatch is a conflict.
   */
  async ensureCollection(
    name: string,
    vectorSize: number,
    distance: DistanceMetric,
  ): Promise<EnsureCollectionResult> {
    const existing = await this.store.getCollection(name);

    if (existing) {
      const mismatch = existing.vectorSize !== vectorSize || existing.distance !== distance;
      if (mismatch && this.strictDimensions) {
        throw new ConflictError(
          `Collection ${name} has size ${String(existing.vectorSize)}/${existing.distance}, run needs ${String(vectorSize)}/${distance}`,
          "COLLECTION_MISMATCH",
          { details: { existing, requested: { vectorSize, distance } } },
        );
      }
      if (mismatch) {
        this.logger?.warn(
          { collection: name, existing, requested: { vectorSize, distance } },
          "Existing collection does not match this run, using it as-is",
        );
      }
      return { descriptor: existing, created: false };
    }

    const descriptor: CollectionDescriptor = { name, vectorSize, distance };
    await this.store.createCollection(descriptor);
    this.logger?.info({ collection: name, vectorSize, distance }, "Created collection");
    return { descriptor, created: true };
  }

  async upsertPoints(name: string, points: IndexedPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.store.upsert(name, points, { wait: true });
    this.logger?.info({ collection: name, points: points.length }, "Upserted points");
  }
}

/**
 * Pair chunks with their vectors. IDs are positional (0..n-1) so a re-run over
 * unchanged inputs overwrites the same points.
 */
export function buildIndexedPoints(chunks: readonly Chunk[], vectors: readonly number[][]): IndexedPoint[] {
  if (chunks.length !== vectors.length) {
    throw new ContractViolationError(
      `Got ${String(vectors.length)} vectors for ${String(chunks.length)} chunks`,
      "embeddings",
    );
  }

  return chunks.map((chunk, id) => ({
    id,
    vector: vectors[id] ?? [],
    payload: { page_content: chunk.text, metadata: chunk.metadata },
  }));
}
