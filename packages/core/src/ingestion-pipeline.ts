import { randomUUID } from "node:crypto";
import type { IngestionInput, IngestionStage, IngestionState, RawDocument } from "@profile-rag/types";
import { PipelineStageError, errorMessage, withRetry, type RetryOptions } from "@profile-rag/errors";
import type { Logger } from "@profile-rag/logger";
import { loadDirectory, type ExtractorRegistry } from "@profile-rag/loader";
import { chunkDocuments, createChunker, type IChunker } from "@profile-rag/chunker";
import type { EmbeddingClient } from "@profile-rag/embeddings";
import { buildIndexedPoints, type VectorStoreManager } from "@profile-rag/vector-store";
import { IngestionStateMachine } from "./ingestion-state.js";

export interface IngestionDependencies {
  registry: ExtractorRegistry;
  embeddings: EmbeddingClient;
  vectorStore: VectorStoreManager;
  logger: Logger;
  /** Overrides the chunker picked from `input.chunkStrategy`. */
  chunker?: IChunker;
  /** When set, the embedding and storing stages are retried with backoff. */
  retry?: RetryOptions;
  /** Files extracted in parallel within one directory. */
  loadConcurrency?: number;
  onStateChange?: (next: IngestionState, previous: IngestionState) => void;
  runId?: string;
}

export type IngestionOutcome =
  | {
      status: "success";
      pointCount: number;
      documentCount: number;
      chunkCount: number;
      collection: string;
      vectorSize: number;
      collectionCreated: boolean;
      durationMs: number;
    }
  | {
      status: "empty";
      reason: "no-documents" | "no-chunks";
      documentCount: number;
      durationMs: number;
    }
  | {
      status: "failed";
      stage: IngestionStage;
      error: PipelineStageError;
      durationMs: number;
    };

/**
 * Ingestion pipeline: Load -> Chunk -> Embed -> Store
 *
 * Never throws for stage failures; the outcome carries a PipelineStageError
 * naming the stage. Point ids are positional over the concatenated chunks of
 * all directories, in configured directory order, so re-running over the same
 * inputs overwrites the same points.
 */
export async function ingest(
  input: IngestionInput,
  deps: IngestionDependencies,
): Promise<IngestionOutcome> {
  const startTime = Date.now();
  const logger = deps.logger.child({
    component: "ingestion",
    runId: deps.runId ?? randomUUID(),
    collection: input.collectionName,
  });
  const machine = new IngestionStateMachine(logger, deps.onStateChange);
  const elapsed = () => Date.now() - startTime;

  let stage: IngestionStage = "loading";

  try {
    // Stage 1: Load
    machine.transition("LOADING");
    const documents = await loadAll(input.sourceDirs, deps, logger);
    if (documents.length === 0) {
      logger.warn({ sourceDirs: input.sourceDirs }, "No documents found, nothing to ingest");
      machine.transition("DONE");
      return { status: "empty", reason: "no-documents", documentCount: 0, durationMs: elapsed() };
    }

    // Stage 2: Chunk
    stage = "chunking";
    machine.transition("CHUNKING");
    const chunker = deps.chunker ?? createChunker(input.chunkStrategy);
    const chunks = chunkDocuments(documents, chunker, input.chunking);
    logger.info(
      { documents: documents.length, chunks: chunks.length, strategy: chunker.strategy },
      "Chunked documents",
    );
    if (chunks.length === 0) {
      machine.transition("DONE");
      return {
        status: "empty",
        reason: "no-chunks",
        documentCount: documents.length,
        durationMs: elapsed(),
      };
    }

    // Stage 3: Embed
    stage = "embedding";
    machine.transition("EMBEDDING");
    const texts = chunks.map((c) => c.text);
    const vectors = await withStageRetry(() => deps.embeddings.embedAll(texts), deps, logger, stage);
    const vectorSize = vectors[0]?.length ?? 0;

    // Stage 4: Store
    stage = "storing";
    machine.transition("STORING");
    const points = buildIndexedPoints(chunks, vectors);
    const { descriptor, created } = await withStageRetry(
      () => deps.vectorStore.ensureCollection(input.collectionName, vectorSize, input.distance),
      deps,
      logger,
      stage,
    );
    await withStageRetry(
      () => deps.vectorStore.upsertPoints(descriptor.name, points),
      deps,
      logger,
      stage,
    );

    machine.transition("DONE");
    const durationMs = elapsed();
    logger.info({ points: points.length, durationMs }, "Ingestion complete");

    return {
      status: "success",
      pointCount: points.length,
      documentCount: documents.length,
      chunkCount: chunks.length,
      collection: descriptor.name,
      vectorSize,
      collectionCreated: created,
      durationMs,
    };
  } catch (err) {
    const error = new PipelineStageError(stage, err);
    if (!machine.isTerminal) machine.transition("FAILED");
    logger.error({ stage, code: error.details?.["causeCode"], err: error.message }, "Ingestion failed");
    return { status: "failed", stage, error, durationMs: elapsed() };
  }
}

/** Directories load concurrently; results keep the configured order. */
async function loadAll(
  sourceDirs: string[],
  deps: IngestionDependencies,
  logger: Logger,
): Promise<RawDocument[]> {
  const perDir = await Promise.all(
    sourceDirs.map((dir) =>
      loadDirectory(dir, {
        registry: deps.registry,
        logger,
        concurrency: deps.loadConcurrency,
      }),
    ),
  );
  return perDir.flat();
}

function withStageRetry<T>(
  fn: () => Promise<T>,
  deps: IngestionDependencies,
  logger: Logger,
  stage: IngestionStage,
): Promise<T> {
  if (!deps.retry) return fn();

  return withRetry(fn, {
    ...deps.retry,
    onRetry: ({ attempt, maxRetries, delayMs, error }) => {
      logger.warn(
        { stage, attempt, maxRetries, delayMs, err: errorMessage(error) },
        `Retrying ${stage} stage`,
      );
    },
  });
}
