import fs from "node:fs/promises";
import type { ExtractedUnit } from "@profile-rag/types";
import { ExtractionError } from "@profile-rag/errors";
import type { IExtractor } from "./extractor.interface.js";

const TEXT_EXTENSIONS = [
  ".txt",
  ".py",
  ".js",
  ".ts",
  ".html",
  ".css",
  ".ipynb",
  ".json",
  ".yaml",
  ".yml",
  ".csv",
];

/**
 * UTF-8 passthrough for plain text and source files.
 * Files with NUL bytes or invalid UTF-8 are rejected rather than indexed as noise.
 */
export class TextExtractor implements IExtractor {
  readonly name = "text";
  readonly extensions: readonly string[];

  constructor(extensions: readonly string[] = TEXT_EXTENSIONS) {
    this.extensions = extensions;
  }

  async extract(filePath: string): Promise<ExtractedUnit[]> {
    const buffer = await fs.readFile(filePath);
    return [{ text: decodeUtf8(buffer, filePath), metadata: {} }];
  }
}

export function decodeUtf8(buffer: Uint8Array, filePath: string): string {
  if (buffer.includes(0)) {
    throw new ExtractionError(filePath, "File looks binary (contains NUL bytes)");
  }
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(buffer);
  } catch (err) {
    throw new ExtractionError(filePath, "File is not valid UTF-8", { cause: err });
  }
}
