import type { ChunkResult, ChunkingConfig } from "@profile-rag/types";
import { validateChunkingConfig, type IChunker } from "./chunker.interface.js";

const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

/**
 * Recursive splitting with separator hierarchy.
 * Tries larger separators first, falling back to smaller ones, then merges the
 * pieces back up to `windowSize` characters carrying at most `overlap`
 * characters of the previous chunk.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    validateChunkingConfig(config);
    const pieces = this.splitRecursive(content, this.separators, config);
    const results: ChunkResult[] = [];

    let searchFrom = 0;
    for (let i = 0; i < pieces.length; i++) {
      const piece = pieces[i] ?? "";
      const found = content.indexOf(piece, searchFrom);
      const startChar = found >= 0 ? found : searchFrom;

      results.push({
        content: piece,
        index: i,
        startChar,
        endChar: startChar + piece.length,
      });

      searchFrom = startChar + 1;
    }

    return results;
  }

  private splitRecursive(text: string, separators: string[], config: ChunkingConfig): string[] {
    let separator = separators[separators.length - 1] ?? "";
    let remaining: string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i] ?? "";
      if (candidate === "" || text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const splits = separator === "" ? [...text] : text.split(separator);
    const results: string[] = [];
    let pending: string[] = [];

    for (const split of splits) {
      if (split.length < config.windowSize) {
        pending.push(split);
        continue;
      }
      if (pending.length > 0) {
        results.push(...this.merge(pending, separator, config));
        pending = [];
      }
      if (remaining.length === 0) {
        results.push(split);
      } else {
        results.push(...this.splitRecursive(split, remaining, config));
      }
    }

    if (pending.length > 0) {
      results.push(...this.merge(pending, separator, config));
    }

    return results;
  }

  private merge(splits: string[], separator: string, config: ChunkingConfig): string[] {
    const { windowSize, overlap } = config;
    const merged: string[] = [];
    const current: string[] = [];
    let total = 0;

    const joinedLength = (extra: number): number =>
      total + extra + (current.length > 0 ? separator.length : 0);

    for (const split of splits) {
      if (joinedLength(split.length) > windowSize && current.length > 0) {
        const text = current.join(separator).trim();
        if (text.length > 0) merged.push(text);

        // Drop from the front until what is left fits as overlap and leaves room.
        while (total > overlap || (joinedLength(split.length) > windowSize && total > 0)) {
          const head = current.shift();
          if (head === undefined) break;
          total -= head.length + (current.length > 0 ? separator.length : 0);
        }
      }
      current.push(split);
      total += split.length + (current.length > 1 ? separator.length : 0);
    }

    const text = current.join(separator).trim();
    if (text.length > 0) merged.push(text);

    return merged;
  }
}
