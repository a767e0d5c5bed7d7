import type { ChunkStrategy } from "@profile-rag/types";
import type { IChunker } from "./chunker.interface.js";
import { RecursiveChunker } from "./recursive-chunker.js";
import { WindowChunker } from "./window-chunker.js";

export function createChunker(strategy: ChunkStrategy = "window"): IChunker {
  switch (strategy) {
    case "window":
      return new WindowChunker();
    case "recursive":
      return new RecursiveChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
