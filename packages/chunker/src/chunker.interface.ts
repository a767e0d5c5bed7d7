import type { ChunkResult, ChunkStrategy, ChunkingConfig } from "@profile-rag/types";
import { ValidationError } from "@profile-rag/errors";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}

export function validateChunkingConfig(config: ChunkingConfig): void {
  const { windowSize, overlap } = config;
  const fields: Record<string, string> = {};

  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    fields["windowSize"] = "must be a positive integer";
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    fields["overlap"] = "must be a non-negative integer";
  } else if (overlap >= windowSize) {
    fields["overlap"] = "must be smaller than windowSize";
  }

  if (Object.keys(fields).length > 0) {
    throw new ValidationError(
      `Invalid chunking config (windowSize=${String(windowSize)}, overlap=${String(overlap)})`,
      fields,
    );
  }
}
