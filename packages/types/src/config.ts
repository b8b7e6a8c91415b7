import type { ContextFormat } from "./query.js";

export type VectorStoreType = "qdrant" | "memory";
export type EmbeddingProviderType = "openai" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  collectionName: string;
  sources: SourcesConfig;
  vectorStore: VectorStoreSettings;
  embedding: EmbeddingSettings;
  generation: GenerationSettings;
  ingestion: IngestionSettings;
  retrieval: RetrievalSettings;
}

export interface SourcesConfig {
  pattern: string;
  trackerFile: string;
}

export interface VectorStoreSettings {
  type: VectorStoreType;
  qdrantUrl: string;
  qdrantApiKey?: string;
}

export interface EmbeddingSettings {
  provider: EmbeddingProviderType;
  openaiApiKey: string;
  openaiModel: string;
  cohereApiKey: string;
  cohereModel: string;
  dimensions: number;
  timeoutMs: number;
}

export interface GenerationSettings {
  openaiApiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface IngestionSettings {
  chunkSize: number;
  chunkOverlap: number;
  groupSize: number;
  batchSize: number;
  pacingDelayMs: number;
}

export interface RetrievalSettings {
  k: number;
  threshold: number;
  maxHistoryTurns: number;
  contextFormat: ContextFormat;
}
