export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorPayload {
  content: string;
  source: string;
  documentIndex: number;
  chunkIndex: number;
  startChar: number;
  endChar: number;
  [key: string]: unknown;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  payload: VectorPayload;
}

export interface BatchWriteConfig {
  batchSize: number;
  pacingDelayMs: number;
}

export type SourceStatus = "skipped" | "ingested" | "parse_failed" | "empty" | "write_failed";

export interface SourceOutcome {
  source: string;
  status: SourceStatus;
  documentCount: number;
  chunkCount: number;
  chunksWritten: number;
  error?: string;
}

export interface IngestionRunResult {
  collectionName: string;
  outcomes: SourceOutcome[];
  chunksWritten: number;
  cancelled: boolean;
}
