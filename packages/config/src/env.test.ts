import { describe, it, expect } from "vitest";
import { ValidationError } from "@logrecall/errors";
import { parseEnv } from "./env.js";
import { loadConfig } from "./load.js";

function makeEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "debug",
    COLLECTION_NAME: "cluster_logs",
    LOGS_PATH: "fixtures/*.json",
    INGESTION_TRACKER_FILE: "state/ingested.json",
    VECTOR_STORE: "memory",
    QDRANT_URL: "http://qdrant:6333",
    QDRANT_API_KEY: "test-qdrant-key",
    EMBEDDING_PROVIDER: "cohere",
    OPENAI_API_KEY: "test-openai-key",
    COHERE_API_KEY: "test-cohere-key",
    VECTOR_SIZE: "1024",
    CHUNK_SIZE: "500",
    CHUNK_OVERLAP: "50",
    LOG_BATCH: "5",
    BATCH_SIZE: "4",
    BATCH_SLEEP_MS: "0",
    DEFAULT_K: "8",
    SCORE_THRESHOLD: "0.5",
    MAX_HISTORY_TURNS: "4",
    CONTEXT_FORMAT: "xml",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("maps every variable onto AppConfig", () => {
    const config = parseEnv(makeEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.logLevel).toBe("debug");
    expect(config.collectionName).toBe("cluster_logs");
    expect(config.sources).toEqual({
      pattern: "fixtures/*.json",
      trackerFile: "state/ingested.json",
    });
    expect(config.vectorStore).toEqual({
      type: "memory",
      qdrantUrl: "http://qdrant:6333",
      qdrantApiKey: "test-qdrant-key",
    });
    expect(config.embedding.provider).toBe("cohere");
    expect(config.embedding.cohereApiKey).toBe("test-cohere-key");
    expect(config.embedding.dimensions).toBe(1024);
    expect(config.generation.openaiApiKey).toBe("test-openai-key");
    expect(config.ingestion).toEqual({
      chunkSize: 500,
      chunkOverlap: 50,
      groupSize: 5,
      batchSize: 4,
      pacingDelayMs: 0,
    });
    expect(config.retrieval).toEqual({
      k: 8,
      threshold: 0.5,
      maxHistoryTurns: 4,
      contextFormat: "xml",
    });
  });

  it("fills in defaults for an empty environment", () => {
    const config = parseEnv({});

    expect(config.nodeEnv).toBe("production");
    expect(config.collectionName).toBe("aks_logs");
    expect(config.sources.pattern).toBe("input-logs/*.json");
    expect(config.sources.trackerFile).toBe("ingestracker/ingested_files.json");
    expect(config.vectorStore.type).toBe("qdrant");
    expect(config.vectorStore.qdrantUrl).toBe("http://localhost:6333");
    expect(config.embedding.provider).toBe("openai");
    expect(config.embedding.openaiModel).toBe("text-embedding-3-small");
    expect(config.embedding.dimensions).toBe(1536);
    expect(config.embedding.openaiApiKey).toBe("");
    expect(config.generation.model).toBe("gpt-4.1-nano");
    expect(config.generation.temperature).toBe(0);
    expect(config.generation.timeoutMs).toBe(30000);
    expect(config.ingestion).toEqual({
      chunkSize: 2000,
      chunkOverlap: 100,
      groupSize: 20,
      batchSize: 10,
      pacingDelayMs: 2000,
    });
    expect(config.retrieval.k).toBe(5);
    expect(config.retrieval.threshold).toBe(0.35);
    expect(config.retrieval.contextFormat).toBe("markdown");
  });

  it("treats blank API keys as unset", () => {
    const config = parseEnv({ QDRANT_API_KEY: "", OPENAI_API_KEY: "", COHERE_API_KEY: "" });

    expect(config.vectorStore.qdrantApiKey).toBeUndefined();
    expect(config.embedding.openaiApiKey).toBe("");
    expect(config.embedding.cohereApiKey).toBe("");
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => parseEnv(makeEnv({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" }))).toThrow(
      /CHUNK_OVERLAP must be smaller than CHUNK_SIZE/,
    );
  });

  it("rejects a threshold outside the cosine range", () => {
    expect(() => parseEnv(makeEnv({ SCORE_THRESHOLD: "1.5" }))).toThrow();
  });

  it("rejects a zero batch size", () => {
    expect(() => parseEnv(makeEnv({ BATCH_SIZE: "0" }))).toThrow();
  });

  it("rejects non-numeric numbers", () => {
    expect(() => parseEnv(makeEnv({ DEFAULT_K: "five" }))).toThrow();
  });

  it("rejects unknown vector stores and embedding providers", () => {
    expect(() => parseEnv(makeEnv({ VECTOR_STORE: "pinecone" }))).toThrow();
    expect(() => parseEnv(makeEnv({ EMBEDDING_PROVIDER: "voyage" }))).toThrow();
  });

  it("rejects an invalid QDRANT_URL", () => {
    expect(() => parseEnv(makeEnv({ QDRANT_URL: "not a url" }))).toThrow();
  });
});

describe("loadConfig", () => {
  it("returns the parsed config", () => {
    expect(loadConfig(makeEnv()).collectionName).toBe("cluster_logs");
  });

  it("reports schema failures as a ValidationError naming the variable", () => {
    let caught: unknown;
    try {
      loadConfig(makeEnv({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" }));
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: "Invalid configuration: CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      fields: { CHUNK_OVERLAP: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE" },
    });
  });
});
