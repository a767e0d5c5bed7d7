import type { ContextFormat, ScoredChunk } from "@profile-rag/types";

/**
 * Formats retrieved chunks into the `{context}` block of the prompt.
 *
 * - Plain: numbered sections with their source
 * - XML: one `<document>` element per chunk
 * - Markdown: one heading per chunk, separated by rules
 */
export function assembleContext(chunks: ScoredChunk[], format: ContextFormat = "plain"): string {
  if (chunks.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(chunks);
    case "markdown":
      return assembleMarkdown(chunks);
    case "plain":
    default:
      return assemblePlain(chunks);
  }
}

function sourceLabel(chunk: ScoredChunk): string {
  const source = chunk.metadata["source"] ?? chunk.id;
  const page = chunk.metadata["page"];
  return page ? `${source}, page ${page}` : source;
}

function assembleXml(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) =>
      `<document index="${String(i + 1)}" source="${escapeAttribute(sourceLabel(chunk))}">\n${chunk.content}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) => `### Source ${String(i + 1)} (${sourceLabel(chunk)})\n\n${chunk.content}`,
  );

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) => `[${String(i + 1)}] (Source: ${sourceLabel(chunk)})\n${chunk.content}`,
  );

  return parts.join("\n\n");
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}
