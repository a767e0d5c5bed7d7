import type { ChunkResult, ChunkingConfig } from "@profile-rag/types";
import { validateChunkingConfig, type IChunker } from "./chunker.interface.js";

/**
 * Fixed character windows.
 *
 * Window `k` covers `[k * (windowSize - overlap), k * (windowSize - overlap) + windowSize)`.
 * The walk stops after the first window that reaches the end of the text, so the
 * last window may be shorter. Windows are not trimmed; whitespace-only windows are
 * left for the caller to drop so that `index` stays the window position.
 *
 * Boundaries never fall between the two halves of a surrogate pair: an end that
 * would split one moves back a unit, and so does a start where that still advances.
 */
export class WindowChunker implements IChunker {
  readonly strategy = "window";

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    validateChunkingConfig(config);
    const { windowSize, overlap } = config;
    const step = windowSize - overlap;
    const results: ChunkResult[] = [];

    let startChar = 0;
    let index = 0;

    while (startChar < content.length) {
      let endChar = Math.min(startChar + windowSize, content.length);
      if (splitsPair(content, endChar)) {
        // a one-unit window still has to advance, so it takes the whole pair
        endChar = endChar - 1 > startChar ? endChar - 1 : endChar + 1;
      }
      results.push({
        content: content.slice(startChar, endChar),
        index,
        startChar,
        endChar,
      });
      index++;

      if (endChar === content.length) break;
      const nextStart = startChar + step;
      if (!splitsPair(content, nextStart)) {
        startChar = nextStart;
      } else {
        // back onto the high half when that still advances, else past the pair
        startChar = nextStart - 1 > startChar ? nextStart - 1 : nextStart + 1;
      }
    }

    return results;
  }
}

/** True when `offset` sits between a high and a low surrogate. */
function splitsPair(content: string, offset: number): boolean {
  if (offset <= 0 || offset >= content.length) return false;
  const before = content.charCodeAt(offset - 1);
  const after = content.charCodeAt(offset);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}
