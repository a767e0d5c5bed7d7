import type { ExtractedUnit } from "@profile-rag/types";

/**
 * Turns one file into text. Implementations are stateless and registered by
 * extension, so the directory loader never needs to know the format.
 */
export interface IExtractor {
  readonly name: string;
  /** Lower-case, with the leading dot. */
  readonly extensions: readonly string[];
  extract(filePath: string): Promise<ExtractedUnit[]>;
}
