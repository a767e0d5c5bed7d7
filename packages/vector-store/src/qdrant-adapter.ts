import { QdrantClient } from "@qdrant/js-client-rest";
import type { CollectionDescriptor, DistanceMetric, IndexedPoint } from "@profile-rag/types";
import { ConflictError, ProviderError } from "@profile-rag/errors";
import type {
  IVectorStore,
  UpsertOptions,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

type QdrantDistance = "Cosine" | "Dot" | "Euclid" | "Manhattan";

const TO_QDRANT: Record<DistanceMetric, QdrantDistance> = {
  cosine: "Cosine",
  dot: "Dot",
  euclid: "Euclid",
  manhattan: "Manhattan",
};

const FROM_QDRANT: Record<string, DistanceMetric> = {
  Cosine: "cosine",
  Dot: "dot",
  Euclid: "euclid",
  Manhattan: "manhattan",
};

const SERVICE = "qdrant";

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async getCollection(collectionName: string): Promise<CollectionDescriptor | null> {
    try {
      const { exists } = await this.client.collectionExists(collectionName);
      if (!exists) return null;

      const info = await this.client.getCollection(collectionName);
      return toDescriptor(collectionName, info.config.params.vectors);
    } catch (err) {
      throw ProviderError.wrap(err, SERVICE, "collection lookup");
    }
  }

  async createCollection(descriptor: CollectionDescriptor): Promise<void> {
    try {
      await this.client.createCollection(descriptor.name, {
        vectors: {
          size: descriptor.vectorSize,
          distance: TO_QDRANT[descriptor.distance],
        },
      });
    } catch (err) {
      throw ProviderError.wrap(err, SERVICE, "collection creation");
    }
  }

  async upsert(
    collectionName: string,
    points: IndexedPoint[],
    options: UpsertOptions = {},
  ): Promise<void> {
    try {
      await this.client.upsert(collectionName, {
        wait: options.wait ?? true,
        points: points.map((p) => ({
          id: p.id,
          vector: p.vector,
          payload: { page_content: p.payload.page_content, metadata: p.payload.metadata },
        })),
      });
    } catch (err) {
      throw ProviderError.wrap(err, SERVICE, "upsert");
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    try {
      const results = await this.client.search(collectionName, {
        vector: params.vector,
        limit: params.topK,
        score_threshold: params.scoreThreshold,
        with_payload: true,
      });

      return results.map((r) => ({
        id: r.id,
        score: r.score,
        payload: r.payload ?? {},
      }));
    } catch (err) {
      throw ProviderError.wrap(err, SERVICE, "search");
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}

/** Only single unnamed vector configs are produced by this project. */
function toDescriptor(name: string, vectors: unknown): CollectionDescriptor {
  if (typeof vectors === "object" && vectors !== null) {
    const size: unknown = Reflect.get(vectors, "size");
    const distance: unknown = Reflect.get(vectors, "distance");
    const metric = typeof distance === "string" ? FROM_QDRANT[distance] : undefined;
    if (typeof size === "number" && metric) {
      return { name, vectorSize: size, distance: metric };
    }
  }
  throw new ConflictError(
    `Collection ${name} does not use a single unnamed vector config`,
    "COLLECTION_MISMATCH",
    { details: { collection: name } },
  );
}
