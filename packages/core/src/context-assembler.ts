import type { ContextFormat, ScoredChunk } from "@logrecall/types";

/**
 * Formats retrieved chunks for the generation prompt. Every format numbers
 * the chunks in order and names the log file each came from.
 *
 * - xml: `<document>` elements inside `<context>`
 * - markdown: one `###` section per chunk
 * - plain: `[n]` numbered sections
 */
export function assembleContext(chunks: ScoredChunk[], format: ContextFormat): string {
  if (chunks.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(chunks);
    case "markdown":
      return assembleMarkdown(chunks);
    case "plain":
      return assemblePlain(chunks);
  }
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");
}

function assembleXml(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) =>
      `<document index="${String(i + 1)}" source="${escapeAttribute(chunk.source)}">\n${chunk.content}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(chunks: ScoredChunk[]): string {
  const parts = chunks.map((chunk, i) => `### Source ${String(i + 1)} (${chunk.source})\n\n${chunk.content}`);

  return `## Retrieved Log Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(chunks: ScoredChunk[]): string {
  const parts = chunks.map((chunk, i) => `[${String(i + 1)}] (Source: ${chunk.source})\n${chunk.content}`);

  return parts.join("\n\n");
}
