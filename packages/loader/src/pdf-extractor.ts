import fs from "node:fs/promises";
import { PDFParse } from "pdf-parse";
import type { ExtractedUnit } from "@profile-rag/types";
import { ExtractionError, errorMessage } from "@profile-rag/errors";
import type { IExtractor } from "./extractor.interface.js";

/**
 * One unit per page, numbered from 1. Blank pages are emitted too; the chunker
 * drops whitespace-only chunks.
 */
export class PdfExtractor implements IExtractor {
  readonly name = "pdf";
  readonly extensions = [".pdf"] as const;

  async extract(filePath: string): Promise<ExtractedUnit[]> {
    const buffer = await fs.readFile(filePath);
    // pdf.js refuses Node Buffers
    const parser = new PDFParse({ data: new Uint8Array(buffer) });

    try {
      const result = await parser.getText();
      const totalPages = String(result.pages.length);
      return result.pages.map((page) => ({
        text: page.text,
        metadata: { page: String(page.num), totalPages },
      }));
    } catch (err) {
      throw new ExtractionError(filePath, `Unreadable PDF: ${errorMessage(err)}`, { cause: err });
    } finally {
      await parser.destroy();
    }
  }
}
