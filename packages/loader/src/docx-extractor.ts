import mammoth from "mammoth";
import type { ExtractedUnit } from "@profile-rag/types";
import { ExtractionError, errorMessage } from "@profile-rag/errors";
import type { IExtractor } from "./extractor.interface.js";

export class DocxExtractor implements IExtractor {
  readonly name = "docx";
  readonly extensions = [".docx"] as const;

  async extract(filePath: string): Promise<ExtractedUnit[]> {
    let raw: string;
    try {
      const result = await mammoth.extractRawText({ path: filePath });
      raw = result.value;
    } catch (err) {
      throw new ExtractionError(filePath, `Unreadable Word document: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const text = raw
      .replace(/\r\n/g, "\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
    return [{ text, metadata: {} }];
  }
}
