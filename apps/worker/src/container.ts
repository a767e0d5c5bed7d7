import path from "node:path";
import { ZodError } from "zod";
import type { AppConfig, IngestionInput } from "@profile-rag/types";
import { parseEnv } from "@profile-rag/config";
import { ConfigurationError, type RetryOptions } from "@profile-rag/errors";
import type { Logger } from "@profile-rag/logger";
import { createDefaultRegistry, type ExtractorRegistry } from "@profile-rag/loader";
import {
  EmbeddingClient,
  createEmbeddingProvider,
  type IEmbeddingProvider,
} from "@profile-rag/embeddings";
import { VectorStoreManager, createVectorStore, type IVectorStore } from "@profile-rag/vector-store";
import { createLlmProvider, type ILlmProvider } from "@profile-rag/llm";
import { ingest, type IngestionOutcome } from "@profile-rag/core";

export interface Container {
  config: AppConfig;
  logger: Logger;
  registry: ExtractorRegistry;
  embeddingProvider: IEmbeddingProvider;
  embeddings: EmbeddingClient;
  vectorStore: IVectorStore;
  vectorStoreManager: VectorStoreManager;
  /** Created on first use so ingestion runs need no LLM credentials. */
  llm(): ILlmProvider;
}

export interface ContainerOverrides {
  embeddingProvider?: IEmbeddingProvider;
  vectorStore?: IVectorStore;
  llm?: ILlmProvider;
}

/** parseEnv with schema failures turned into a single ConfigurationError. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  try {
    return parseEnv(env);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, {
        details: { issues },
        cause: err,
      });
    }
    throw err;
  }
}

export function createContainer(
  config: AppConfig,
  logger: Logger,
  overrides: ContainerOverrides = {},
): Container {
  const embeddingProvider = overrides.embeddingProvider ?? createEmbeddingProvider(config.embeddings);
  const vectorStore = overrides.vectorStore ?? createVectorStore(config.vectorStore);
  let llm = overrides.llm;

  return {
    config,
    logger,
    registry: createDefaultRegistry(),
    embeddingProvider,
    embeddings: new EmbeddingClient(embeddingProvider, {
      batchSize: config.embeddings.batchSize,
      logger: logger.child({ component: "embeddings" }),
    }),
    vectorStore,
    vectorStoreManager: new VectorStoreManager(vectorStore, {
      strictDimensions: config.ingestion.strictCollectionDimensions,
      logger: logger.child({ component: "vector-store" }),
    }),
    llm() {
      llm ??= createLlmProvider(config.llm);
      return llm;
    },
  };
}

export interface IngestionOverrides {
  /** Absolute, or relative to DATA_DIR. */
  sourceDirs?: string[];
  collectionName?: string;
}

export function ingestionInput(config: AppConfig, overrides: IngestionOverrides = {}): IngestionInput {
  const { ingestion } = config;
  const sourceDirs =
    overrides.sourceDirs && overrides.sourceDirs.length > 0
      ? overrides.sourceDirs.map((dir) => path.resolve(ingestion.dataDir, dir))
      : ingestion.sourceDirs;

  return {
    sourceDirs,
    collectionName: overrides.collectionName ?? ingestion.collectionName,
    distance: ingestion.distance,
    chunkStrategy: ingestion.chunkStrategy,
    chunking: { windowSize: ingestion.chunkSize, overlap: ingestion.chunkOverlap },
  };
}

/** `undefined` when INGEST_MAX_RETRIES is 0, i.e. stages run once. */
export function retryPolicy(config: AppConfig): RetryOptions | undefined {
  return config.ingestion.maxRetries > 0 ? { maxRetries: config.ingestion.maxRetries } : undefined;
}

export function runIngestion(
  container: Container,
  overrides: IngestionOverrides = {},
  runId?: string,
): Promise<IngestionOutcome> {
  return ingest(ingestionInput(container.config, overrides), {
    registry: container.registry,
    embeddings: container.embeddings,
    vectorStore: container.vectorStoreManager,
    logger: container.logger,
    retry: retryPolicy(container.config),
    runId,
  });
}

/** JSON-safe view of an outcome; the failure carries the error's own JSON form. */
export function serializeOutcome(outcome: IngestionOutcome): Record<string, unknown> {
  if (outcome.status !== "failed") return { ...outcome };
  return {
    status: outcome.status,
    stage: outcome.stage,
    durationMs: outcome.durationMs,
    error: outcome.error.toJSON(),
  };
}
