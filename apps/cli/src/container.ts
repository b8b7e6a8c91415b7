import type { AppConfig } from "@logrecall/types";
import { ValidationError } from "@logrecall/errors";
import { FileSystemSourceCatalog } from "@logrecall/parser";
import { InMemoryIngestionTracker, JsonFileIngestionTracker, type IIngestionTracker } from "@logrecall/tracker";
import { RecursiveChunker } from "@logrecall/chunker";
import { createEmbeddingProvider, type IEmbeddingProvider } from "@logrecall/embeddings";
import { createVectorStore, type IVectorStore } from "@logrecall/vector-store";
import { createTextGenerator, type ITextGenerator } from "@logrecall/llm";
import type { Logger } from "@logrecall/logger";

export function buildEmbeddingProvider(config: AppConfig, logger?: Logger): IEmbeddingProvider {
  const { embedding } = config;

  switch (embedding.provider) {
    case "openai":
      if (!embedding.openaiApiKey) {
        throw new ValidationError("OPENAI_API_KEY is required when EMBEDDING_PROVIDER is openai", {
          OPENAI_API_KEY: "missing",
        });
      }
      return createEmbeddingProvider({
        provider: "openai",
        openai: {
          apiKey: embedding.openaiApiKey,
          model: embedding.openaiModel,
          dimensions: embedding.dimensions,
          timeoutMs: embedding.timeoutMs,
          logger,
        },
      });
    case "cohere":
      if (!embedding.cohereApiKey) {
        throw new ValidationError("COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere", {
          COHERE_API_KEY: "missing",
        });
      }
      return createEmbeddingProvider({
        provider: "cohere",
        cohere: {
          apiKey: embedding.cohereApiKey,
          model: embedding.cohereModel,
          dimensions: embedding.dimensions,
          timeoutMs: embedding.timeoutMs,
          logger,
        },
      });
  }
}

export function buildVectorStore(config: AppConfig, logger?: Logger): IVectorStore {
  return createVectorStore({
    type: config.vectorStore.type,
    qdrantUrl: config.vectorStore.qdrantUrl,
    qdrantApiKey: config.vectorStore.qdrantApiKey,
    timeoutMs: config.embedding.timeoutMs,
    logger,
  });
}

export interface IngestionServices {
  catalog: FileSystemSourceCatalog;
  tracker: IIngestionTracker;
  chunker: RecursiveChunker;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
}

/**
 * The tracker lives as long as the store: an in-memory store gets an
 * in-memory tracker, so no file is recorded as ingested once its points are gone.
 */
export function buildTracker(config: AppConfig): IIngestionTracker {
  if (config.vectorStore.type === "memory") {
    return new InMemoryIngestionTracker();
  }
  return new JsonFileIngestionTracker(config.sources.trackerFile);
}

export function createIngestionServices(config: AppConfig, logger?: Logger): IngestionServices {
  return {
    catalog: new FileSystemSourceCatalog(config.sources.pattern),
    tracker: buildTracker(config),
    chunker: new RecursiveChunker(),
    embeddingProvider: buildEmbeddingProvider(config, logger),
    vectorStore: buildVectorStore(config, logger),
  };
}

export interface QueryServices {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  generator: ITextGenerator;
}

export function createQueryServices(config: AppConfig, logger?: Logger): QueryServices {
  return {
    embeddingProvider: buildEmbeddingProvider(config, logger),
    vectorStore: buildVectorStore(config, logger),
    generator: createTextGenerator(config.generation, logger),
  };
}
