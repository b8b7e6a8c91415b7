export interface Chunk {
  /** Deterministic UUID-formatted id; the vector store overwrites on re-upsert. */
  id: string;
  content: string;
  index: number;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  source: string;
  documentIndex: number;
  startChar: number;
  endChar: number;
  /** Leading characters shared with the previous chunk of the same document. */
  overlap: number;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

/** Chunk before provenance is attached. */
export interface TextSlice {
  content: string;
  index: number;
  startChar: number;
  endChar: number;
  overlap: number;
}
