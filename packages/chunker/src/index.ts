export type { IChunker } from "./chunker.interface.js";
export { validateChunkingConfig } from "./chunker.interface.js";
export { WindowChunker } from "./window-chunker.js";
export { RecursiveChunker } from "./recursive-chunker.js";
export { chunkDocuments } from "./chunk-documents.js";
export { createChunker } from "./factory.js";
