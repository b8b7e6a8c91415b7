import type { VectorStoreType } from "@logrecall/types";
import type { Logger } from "@logrecall/logger";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./in-memory-store.js";

export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
  VectorFilter,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export type { QdrantStoreOptions } from "./qdrant-adapter.js";
export { InMemoryVectorStore, cosineSimilarity } from "./in-memory-store.js";

export interface VectorStoreConfig {
  type: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new Error("qdrantUrl is required for Qdrant vector store");
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey, {
        timeoutMs: config.timeoutMs,
        logger: config.logger,
      });
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
