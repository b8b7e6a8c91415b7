import type { Chunk, ChunkingConfig, LogDocument, LogRecord } from "@logrecall/types";
import type { IChunker } from "./chunker.interface.js";
import { chunkId } from "./chunk-id.js";

/** Pretty, order-preserving rendering of one record. */
export function renderRecord(record: LogRecord): string {
  return JSON.stringify(record, null, 2);
}

/**
 * Group consecutive records, at most `groupSize` per document.
 * No records, no documents.
 */
export function buildDocuments(source: string, records: LogRecord[], groupSize: number): LogDocument[] {
  if (!Number.isInteger(groupSize) || groupSize < 1) {
    throw new Error(`groupSize must be a positive integer, got ${String(groupSize)}`);
  }

  const documents: LogDocument[] = [];
  for (let start = 0; start < records.length; start += groupSize) {
    const group = records.slice(start, start + groupSize);
    documents.push({
      source,
      index: documents.length,
      text: group.map(renderRecord).join("\n"),
      recordCount: group.length,
    });
  }
  return documents;
}

export function chunkDocuments(documents: LogDocument[], chunker: IChunker, config: ChunkingConfig): Chunk[] {
  const chunks: Chunk[] = [];

  for (const document of documents) {
    for (const slice of chunker.chunk(document.text, config)) {
      chunks.push({
        id: chunkId(document.source, document.index, slice.index, slice.content),
        content: slice.content,
        index: slice.index,
        tokenCount: Math.ceil(slice.content.length / 4),
        metadata: {
          source: document.source,
          documentIndex: document.index,
          startChar: slice.startChar,
          endChar: slice.endChar,
          overlap: slice.overlap,
        },
      });
    }
  }

  return chunks;
}
