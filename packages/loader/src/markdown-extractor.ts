import fs from "node:fs/promises";
import type { ExtractedUnit } from "@profile-rag/types";
import type { IExtractor } from "./extractor.interface.js";
import { decodeUtf8 } from "./text-extractor.js";

/**
 * Markdown to flat prose. Link and image text survive, markup does not.
 */
export class MarkdownExtractor implements IExtractor {
  readonly name = "markdown";
  readonly extensions = [".md", ".markdown"] as const;

  async extract(filePath: string): Promise<ExtractedUnit[]> {
    const raw = decodeUtf8(await fs.readFile(filePath), filePath);
    return [{ text: stripMarkdown(raw), metadata: {} }];
  }
}

export function stripMarkdown(markdown: string): string {
  return (
    markdown
      .replace(/\r\n/g, "\n")
      // Front matter
      .replace(/^---\n[\s\S]*?\n---\n/, "")
      // Code fence markers (the code itself is kept)
      .replace(/^[ \t]*(```|~~~).*$/gm, "")
      .replace(/<!--[\s\S]*?-->/g, "")
      .replace(/<[^>]+>/g, "")
      .replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1")
      .replace(/\[([^\]]+)\]\([^)]*\)/g, "$1")
      // Reference-style link definitions
      .replace(/^[ \t]*\[[^\]]+\]:[ \t]+\S+.*$/gm, "")
      .replace(/^[ \t]{0,3}#{1,6}[ \t]+/gm, "")
      .replace(/^[ \t]*([-*_])(?:[ \t]*\1){2,}[ \t]*$/gm, "")
      .replace(/^[ \t]*>[ \t]?/gm, "")
      .replace(/^([ \t]*)(?:[-*+]|\d+\.)[ \t]+/gm, "$1")
      .replace(/\*\*(.+?)\*\*/g, "$1")
      .replace(/__(.+?)__/g, "$1")
      .replace(/\*(.+?)\*/g, "$1")
      .replace(/(^|[ \t])_(.+?)_(?=[ \t]|$|[.,;:!?])/gm, "$1$2")
      .replace(/~~(.+?)~~/g, "$1")
      .replace(/`([^`]+)`/g, "$1")
      .replace(/[ \t]+$/gm, "")
      .replace(/\n{3,}/g, "\n\n")
      .trim()
  );
}
