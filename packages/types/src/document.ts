/**
 * Flat string metadata attached to every extracted unit and inherited by its chunks.
 * `source` (file path) and `extension` are always present; extractors may add more
 * (e.g. `page` and `totalPages` for PDFs).
 */
export type DocumentMetadata = Readonly<Record<string, string>>;

/** One unit of text produced by an extractor for a single file. */
export interface ExtractedUnit {
  text: string;
  metadata: Record<string, string>;
}

export interface RawDocument {
  readonly text: string;
  readonly metadata: DocumentMetadata;
  readonly originPath: string;
}
