import { describe, it, expect } from "vitest";
import { parseEnv } from "@logrecall/config";
import { ValidationError } from "@logrecall/errors";
import { CohereEmbeddingProvider, OpenAIEmbeddingProvider } from "@logrecall/embeddings";
import { InMemoryVectorStore, QdrantVectorStore } from "@logrecall/vector-store";
import { OpenAIChatGenerator } from "@logrecall/llm";
import { InMemoryIngestionTracker, JsonFileIngestionTracker } from "@logrecall/tracker";
import { buildEmbeddingProvider, createIngestionServices, createQueryServices } from "./container.js";

describe("container", () => {
  it("wires OpenAI embeddings and the in-memory store", () => {
    const config = parseEnv({ OPENAI_API_KEY: "test-openai-key", VECTOR_STORE: "memory" });

    const services = createIngestionServices(config);

    expect(services.embeddingProvider).toBeInstanceOf(OpenAIEmbeddingProvider);
    expect(services.embeddingProvider.dimensions).toBe(1536);
    expect(services.vectorStore).toBeInstanceOf(InMemoryVectorStore);
  });

  it("keeps the tracker in memory when the store is in memory", async () => {
    const config = parseEnv({
      OPENAI_API_KEY: "test-openai-key",
      VECTOR_STORE: "memory",
      INGESTION_TRACKER_FILE: "/nonexistent/tracker.json",
    });

    const first = createIngestionServices(config);
    await first.tracker.mark("input-logs/day1.json");
    const second = createIngestionServices(config);

    expect(first.tracker).toBeInstanceOf(InMemoryIngestionTracker);
    expect(await second.tracker.has("input-logs/day1.json")).toBe(false);
  });

  it("tracks ingested files on disk for Qdrant", () => {
    const config = parseEnv({ OPENAI_API_KEY: "test-openai-key" });

    expect(createIngestionServices(config).tracker).toBeInstanceOf(JsonFileIngestionTracker);
  });

  it("wires Cohere embeddings with the configured vector size", () => {
    const config = parseEnv({ EMBEDDING_PROVIDER: "cohere", COHERE_API_KEY: "test-cohere-key", VECTOR_SIZE: "1024" });

    const provider = buildEmbeddingProvider(config);

    expect(provider).toBeInstanceOf(CohereEmbeddingProvider);
    expect(provider.dimensions).toBe(1024);
  });

  it("requires the key of the chosen embedding provider", () => {
    expect(() => buildEmbeddingProvider(parseEnv({}))).toThrow(ValidationError);
    expect(() => buildEmbeddingProvider(parseEnv({ EMBEDDING_PROVIDER: "cohere" }))).toThrow(
      "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
    );
  });

  it("wires Qdrant and the chat generator for queries", () => {
    const config = parseEnv({ OPENAI_API_KEY: "test-openai-key", RETRIEVAL_MODEL: "gpt-4.1-mini" });

    const services = createQueryServices(config);

    expect(services.vectorStore).toBeInstanceOf(QdrantVectorStore);
    expect(services.generator).toBeInstanceOf(OpenAIChatGenerator);
    expect(services.generator.model).toBe("gpt-4.1-mini");
  });
});
