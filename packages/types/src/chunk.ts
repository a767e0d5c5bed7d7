import type { DocumentMetadata } from "./document.js";

export type ChunkStrategy = "window" | "recursive";

export interface Chunk {
  readonly text: string;
  readonly metadata: DocumentMetadata;
  /** Window position within the parent document, starting at 0. */
  readonly sequenceIndex: number;
}

export interface ChunkingConfig {
  /** Maximum characters per chunk. */
  windowSize: number;
  /** Characters shared by consecutive chunks of one document. Must be < windowSize. */
  overlap: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  startChar: number;
  endChar: number;
}
