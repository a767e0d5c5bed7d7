import type { DocumentMetadata } from "./document.js";

export type ContextFormat = "plain" | "xml" | "markdown";

export interface QueryRequest {
  question: string;
  topK?: number;
  scoreThreshold?: number;
  contextFormat?: ContextFormat;
}

export interface ScoredChunk {
  id: string;
  content: string;
  score: number;
  metadata: DocumentMetadata;
}

export interface RetrievalResult {
  chunks: ScoredChunk[];
  retrievalTimeMs: number;
}

export interface AnswerSource {
  content: string;
  metadata: DocumentMetadata;
}

export interface AnswerResult {
  answer: string;
  sources: AnswerSource[];
  model: string;
  provider: string;
}
