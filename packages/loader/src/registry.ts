import { ConflictError } from "@profile-rag/errors";
import type { IExtractor } from "./extractor.interface.js";
import { TextExtractor } from "./text-extractor.js";
import { MarkdownExtractor } from "./markdown-extractor.js";
import { PdfExtractor } from "./pdf-extractor.js";
import { DocxExtractor } from "./docx-extractor.js";

/**
 * Static extension → extractor mapping. Extensions are matched lower-case,
 * with the leading dot.
 */
export class ExtractorRegistry {
  private readonly byExtension = new Map<string, IExtractor>();

  constructor(extractors: IExtractor[] = []) {
    for (const extractor of extractors) this.register(extractor);
  }

  register(extractor: IExtractor): this {
    for (const raw of extractor.extensions) {
      const ext = normalizeExtension(raw);
      const existing = this.byExtension.get(ext);
      if (existing) {
        throw new ConflictError(
          `Extension ${ext} is already handled by the ${existing.name} extractor`,
          "EXTRACTOR_CONFLICT",
        );
      }
      this.byExtension.set(ext, extractor);
    }
    return this;
  }

  get(extension: string): IExtractor | undefined {
    return this.byExtension.get(normalizeExtension(extension));
  }

  extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry([
    new PdfExtractor(),
    new MarkdownExtractor(),
    new DocxExtractor(),
    new TextExtractor(),
  ]);
}
