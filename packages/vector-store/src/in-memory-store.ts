import type { CollectionDescriptor, DistanceMetric, IndexedPoint } from "@profile-rag/types";
import { ConflictError, NotFoundError, ValidationError } from "@profile-rag/errors";
import type {
  IVectorStore,
  UpsertOptions,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

interface StoredCollection {
  descriptor: CollectionDescriptor;
  points: Map<number, IndexedPoint>;
}

/**
 * Process-local vector store with Qdrant's semantics: upserts overwrite by id,
 * cosine and dot rank by descending score, euclid and manhattan by ascending
 * distance (and `scoreThreshold` is then a maximum distance).
 */
export class InMemoryVectorStore implements IVectorStore {
  private collections = new Map<string, StoredCollection>();

  async getCollection(collectionName: string): Promise<CollectionDescriptor | null> {
    const stored = this.collections.get(collectionName);
    return stored ? { ...stored.descriptor } : null;
  }

  async createCollection(descriptor: CollectionDescriptor): Promise<void> {
    if (this.collections.has(descriptor.name)) {
      throw new ConflictError(`Collection ${descriptor.name} already exists`);
    }
    this.collections.set(descriptor.name, { descriptor: { ...descriptor }, points: new Map() });
  }

  async upsert(
    collectionName: string,
    points: IndexedPoint[],
    _options?: UpsertOptions,
  ): Promise<void> {
    const stored = this.require(collectionName);
    const { vectorSize } = stored.descriptor;

    const wrong = points.find((p) => p.vector.length !== vectorSize);
    if (wrong) {
      throw new ValidationError(
        `Vector dimension error: expected dim: ${String(vectorSize)}, got ${String(wrong.vector.length)}`,
        { vector: `point ${String(wrong.id)}` },
      );
    }

    for (const point of points) {
      stored.points.set(point.id, {
        id: point.id,
        vector: [...point.vector],
        payload: { page_content: point.payload.page_content, metadata: { ...point.payload.metadata } },
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const stored = this.require(collectionName);
    const { distance } = stored.descriptor;
    const ascending = ranksAscending(distance);

    const scored = [...stored.points.values()].map((point) => ({
      point,
      score: score(distance, params.vector, point.vector),
    }));

    return scored
      .filter(({ score: s }) => {
        if (params.scoreThreshold === undefined) return true;
        return ascending ? s <= params.scoreThreshold : s >= params.scoreThreshold;
      })
      .sort((a, b) => (ascending ? a.score - b.score : b.score - a.score) || a.point.id - b.point.id)
      .slice(0, params.topK)
      .map(({ point, score: s }) => ({
        id: point.id,
        score: s,
        payload: { page_content: point.payload.page_content, metadata: { ...point.payload.metadata } },
      }));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Number of stored points, for tests and dry runs. */
  count(collectionName: string): number {
    return this.collections.get(collectionName)?.points.size ?? 0;
  }

  private require(collectionName: string): StoredCollection {
    const stored = this.collections.get(collectionName);
    if (!stored) {
      throw new NotFoundError(`Collection ${collectionName} not found`);
    }
    return stored;
  }
}

function ranksAscending(distance: DistanceMetric): boolean {
  return distance === "euclid" || distance === "manhattan";
}

function score(distance: DistanceMetric, a: number[], b: number[]): number {
  switch (distance) {
    case "cosine": {
      const norms = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
      return norms === 0 ? 0 : dot(a, b) / norms;
    }
    case "dot":
      return dot(a, b);
    case "euclid":
      return Math.sqrt(a.reduce((sum, x, i) => sum + (x - (b[i] ?? 0)) ** 2, 0));
    case "manhattan":
      return a.reduce((sum, x, i) => sum + Math.abs(x - (b[i] ?? 0)), 0);
  }
}

function dot(a: number[], b: number[]): number {
  return a.reduce((sum, x, i) => sum + x * (b[i] ?? 0), 0);
}
