import type { DocumentMetadata, QueryRequest, RetrievalResult, ScoredChunk } from "@profile-rag/types";
import { ContractViolationError, ValidationError } from "@profile-rag/errors";
import type { Logger } from "@profile-rag/logger";
import type { IEmbeddingProvider } from "@profile-rag/embeddings";
import type { IVectorStore, VectorSearchResult } from "@profile-rag/vector-store";

const DEFAULT_TOP_K = 5;

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  /** Used when the request does not set `topK`. */
  defaultTopK?: number;
  logger?: Logger;
}

/**
 * Retrieval pipeline: Query -> Embed -> Vector Search
 */
export async function retrieve(
  request: QueryRequest,
  deps: RetrievalDependencies,
): Promise<RetrievalResult> {
  const startTime = Date.now();

  const question = request.question.trim();
  if (question.length === 0) {
    throw new ValidationError("Question must not be empty", { question: "required" });
  }
  const topK = request.topK ?? deps.defaultTopK ?? DEFAULT_TOP_K;
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new ValidationError("topK must be a positive integer", { topK: String(topK) });
  }

  // Embed the query
  const embeddingResult = await deps.embeddingProvider.embed(question);
  const queryVector = embeddingResult.embeddings[0];

  if (!queryVector || queryVector.length === 0) {
    throw new ContractViolationError(
      "Embedding provider returned no vector for the query",
      deps.embeddingProvider.name,
    );
  }

  const searchResults = await deps.vectorStore.search(deps.collectionName, {
    vector: queryVector,
    topK,
    scoreThreshold: request.scoreThreshold,
  });

  const chunks = searchResults.map(toScoredChunk);
  const retrievalTimeMs = Date.now() - startTime;
  deps.logger?.debug({ hits: chunks.length, topK, retrievalTimeMs }, "Retrieved chunks");

  return { chunks, retrievalTimeMs };
}

function toScoredChunk(result: VectorSearchResult): ScoredChunk {
  const content = result.payload["page_content"];
  return {
    id: String(result.id),
    content: typeof content === "string" ? content : "",
    score: result.score,
    metadata: readMetadata(result.payload["metadata"]),
  };
}

/** Keep string-valued entries only; anything else was not written by this project. */
function readMetadata(value: unknown): DocumentMetadata {
  if (typeof value !== "object" || value === null) return {};
  const metadata: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") metadata[key] = entry;
  }
  return metadata;
}
