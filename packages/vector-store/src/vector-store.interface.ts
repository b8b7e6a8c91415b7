import type { VectorRecord } from "@logrecall/types";

export interface VectorSearchParams {
  vector: number[];
  topK: number;
  filter?: VectorFilter;
}

export interface VectorFilter {
  /** Restrict hits to points whose payload `source` is one of these. */
  sources?: string[];
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface IVectorStore {
  /** Create the collection (cosine distance) unless it exists. Resolves to true when it was created. */
  ensureCollection(collectionName: string, dimensions: number): Promise<boolean>;
  collectionExists(collectionName: string): Promise<boolean>;
  /** Insert or overwrite points by id. */
  upsert(collectionName: string, records: VectorRecord[]): Promise<void>;
  /** Nearest neighbours, best first. */
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  count(collectionName: string): Promise<number>;
  healthCheck(): Promise<boolean>;
}
