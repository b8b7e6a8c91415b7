export type { LogRecord, SourceFormat } from "./log.js";
export type { LogDocument } from "./document.js";
export type { Chunk, ChunkMetadata, ChunkingConfig, TextSlice } from "./chunk.js";
export type {
  EmbeddingResult,
  VectorPayload,
  VectorRecord,
  BatchWriteConfig,
  SourceStatus,
  SourceOutcome,
  IngestionRunResult,
} from "./pipeline.js";
export type {
  ContextFormat,
  QueryFilter,
  RetrievalOptions,
  ScoredChunk,
  RetrievalResult,
  ChatRole,
  ChatMessage,
  AnswerRequest,
  Answer,
} from "./query.js";
export { QUERY_FILTER_ALLOWLIST, REFUSAL_TEXT } from "./query.js";
export type {
  AppConfig,
  VectorStoreType,
  EmbeddingProviderType,
  SourcesConfig,
  VectorStoreSettings,
  EmbeddingSettings,
  GenerationSettings,
  IngestionSettings,
  RetrievalSettings,
} from "./config.js";
