export type { DocumentMetadata, ExtractedUnit, RawDocument } from "./document.js";
export type { Chunk, ChunkResult, ChunkStrategy, ChunkingConfig } from "./chunk.js";
export { DISTANCE_METRICS } from "./pipeline.js";
export type {
  CollectionDescriptor,
  DistanceMetric,
  EmbeddingResult,
  EmbeddingVector,
  IndexedPoint,
  IngestionInput,
  IngestionStage,
  IngestionState,
  PointPayload,
} from "./pipeline.js";
export type {
  AnswerResult,
  AnswerSource,
  ContextFormat,
  QueryRequest,
  RetrievalResult,
  ScoredChunk,
} from "./query.js";
export type { AnyJobData, IngestJobData, JobData, JobResult, JobType } from "./job.js";
export type {
  AppConfig,
  EmbeddingProviderType,
  EmbeddingSettings,
  IngestionConfig,
  LlmProviderType,
  LlmSettings,
  LogLevel,
  NodeEnv,
  RedisConfig,
  RetrievalConfig,
  VectorStoreSettings,
  VectorStoreType,
} from "./config.js";
