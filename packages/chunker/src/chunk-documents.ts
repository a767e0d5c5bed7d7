import type { Chunk, ChunkingConfig, RawDocument } from "@profile-rag/types";
import type { IChunker } from "./chunker.interface.js";

/**
 * Chunk every document in order. Chunks inherit their parent's metadata as-is;
 * whitespace-only chunks are dropped without renumbering the survivors.
 */
export function chunkDocuments(
  documents: readonly RawDocument[],
  chunker: IChunker,
  config: ChunkingConfig,
): Chunk[] {
  const chunks: Chunk[] = [];

  for (const doc of documents) {
    for (const result of chunker.chunk(doc.text, config)) {
      if (result.content.trim().length === 0) continue;
      chunks.push({
        text: result.content,
        metadata: doc.metadata,
        sequenceIndex: result.index,
      });
    }
  }

  return chunks;
}
