export type { IExtractor } from "./extractor.interface.js";
export { TextExtractor } from "./text-extractor.js";
export { MarkdownExtractor, stripMarkdown } from "./markdown-extractor.js";
export { PdfExtractor } from "./pdf-extractor.js";
export { DocxExtractor } from "./docx-extractor.js";
export { ExtractorRegistry, createDefaultRegistry } from "./registry.js";
export { loadDirectory } from "./directory-loader.js";
export type { LoadDirectoryOptions } from "./directory-loader.js";
