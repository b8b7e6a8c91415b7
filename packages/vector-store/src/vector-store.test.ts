import { describe, it, expect, vi, beforeEach } from "vitest";
import { AppError, ExternalServiceError, NotFoundError, ValidationError } from "@logrecall/errors";
import { createSilentLogger } from "@logrecall/logger";
import type { VectorRecord } from "@logrecall/types";
import { createVectorStore, InMemoryVectorStore, QdrantVectorStore, cosineSimilarity } from "./index.js";

const qdrant = vi.hoisted(() => ({
  getCollections: vi.fn(),
  createCollection: vi.fn(),
  createPayloadIndex: vi.fn(),
  upsert: vi.fn(),
  search: vi.fn(),
  count: vi.fn(),
}));

vi.mock("@qdrant/js-client-rest", () => ({
  QdrantClient: class {
    getCollections = qdrant.getCollections;
    createCollection = qdrant.createCollection;
    createPayloadIndex = qdrant.createPayloadIndex;
    upsert = qdrant.upsert;
    search = qdrant.search;
    count = qdrant.count;
  },
}));

function record(id: string, vector: number[], source = "input-logs/day1.json"): VectorRecord {
  return {
    id,
    vector,
    payload: { content: `chunk ${id}`, source, documentIndex: 0, chunkIndex: 0, startChar: 0, endChar: 7 },
  };
}

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

describe("Vector Store", () => {
  describe("createVectorStore factory", () => {
    it("creates QdrantVectorStore for type 'qdrant'", () => {
      const store = createVectorStore({ type: "qdrant", qdrantUrl: "http://localhost:6333" });
      expect(store).toBeInstanceOf(QdrantVectorStore);
    });

    it("creates InMemoryVectorStore for type 'memory'", () => {
      expect(createVectorStore({ type: "memory" })).toBeInstanceOf(InMemoryVectorStore);
    });

    it("throws for missing qdrantUrl", () => {
      expect(() => createVectorStore({ type: "qdrant" })).toThrow("qdrantUrl is required");
    });

    it("throws for unknown type", () => {
      expect(() => createVectorStore({ type: "unknown" as "qdrant" })).toThrow("Unknown vector store type");
    });
  });

  describe("QdrantVectorStore", () => {
    const logger = createSilentLogger();
    const store = new QdrantVectorStore("http://localhost:6333", undefined, {
      retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 },
      logger,
    });

    beforeEach(() => {
      vi.spyOn(logger, "warn");
    });

    it("creates a cosine collection with a source index when absent", async () => {
      qdrant.getCollections.mockResolvedValue({ collections: [{ name: "other" }] });

      await expect(store.ensureCollection("aks_logs", 1536)).resolves.toBe(true);

      expect(qdrant.createCollection).toHaveBeenCalledWith("aks_logs", {
        vectors: { size: 1536, distance: "Cosine" },
      });
      expect(qdrant.createPayloadIndex).toHaveBeenCalledWith("aks_logs", {
        field_name: "source",
        field_schema: "keyword",
      });
    });

    it("leaves an existing collection alone", async () => {
      qdrant.getCollections.mockResolvedValue({ collections: [{ name: "aks_logs" }] });

      await expect(store.ensureCollection("aks_logs", 1536)).resolves.toBe(false);
      expect(qdrant.createCollection).not.toHaveBeenCalled();
    });

    it("upserts in batches of 100 and waits for each", async () => {
      qdrant.upsert.mockResolvedValue({ status: "completed" });
      const records = Array.from({ length: 150 }, (_, i) => record(`p${String(i)}`, [1, 0]));

      await store.upsert("aks_logs", records);

      expect(qdrant.upsert).toHaveBeenCalledTimes(2);
      expect(qdrant.upsert.mock.calls[0]?.[1]).toMatchObject({ wait: true });
      expect(qdrant.upsert.mock.calls[1]?.[1].points).toHaveLength(50);
    });

    it("maps search hits and applies the source filter", async () => {
      qdrant.search.mockResolvedValue([
        { id: "a", score: 0.9, payload: { content: "x", source: "input-logs/day1.json" } },
        { id: 7, score: 0.5, payload: null },
      ]);

      const results = await store.search("aks_logs", {
        vector: [1, 0],
        topK: 3,
        filter: { sources: ["input-logs/day1.json"] },
      });

      expect(results).toEqual([
        { id: "a", score: 0.9, payload: { content: "x", source: "input-logs/day1.json" } },
        { id: "7", score: 0.5, payload: {} },
      ]);
      expect(qdrant.search).toHaveBeenCalledWith("aks_logs", {
        vector: [1, 0],
        limit: 3,
        with_payload: true,
        filter: { must: [{ key: "source", match: { any: ["input-logs/day1.json"] } }] },
      });
    });

    it("omits the filter when no sources are given", async () => {
      qdrant.search.mockResolvedValue([]);

      await store.search("aks_logs", { vector: [1, 0], topK: 5, filter: { sources: [] } });

      expect(qdrant.search).toHaveBeenCalledWith("aks_logs", { vector: [1, 0], limit: 5, with_payload: true });
    });

    it("retries transient failures", async () => {
      qdrant.count.mockRejectedValueOnce(new Error("socket hang up")).mockResolvedValueOnce({ count: 42 });

      await expect(store.count("aks_logs")).resolves.toBe(42);
      expect(qdrant.count).toHaveBeenCalledTimes(2);
      expect(qdrant.count).toHaveBeenCalledWith("aks_logs", { exact: true });
    });

    it("logs each retry through the configured logger", async () => {
      qdrant.count.mockRejectedValueOnce(new Error("socket hang up")).mockResolvedValueOnce({ count: 1 });

      await store.count("aks_logs");

      expect(logger.warn).toHaveBeenCalledOnce();
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ operation: "count", attempt: 1, err: "socket hang up" }),
        "Qdrant call failed; retrying",
      );
    });

    it("does not log a non-retryable failure as a retry", async () => {
      qdrant.count.mockRejectedValue(httpError(404, "Not Found"));

      await expect(store.count("missing")).rejects.toBeInstanceOf(NotFoundError);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("does not retry a missing collection", async () => {
      qdrant.count.mockRejectedValue(httpError(404, "Not Found"));

      await expect(store.count("missing")).rejects.toBeInstanceOf(NotFoundError);
      expect(qdrant.count).toHaveBeenCalledTimes(1);
    });

    it("does not retry a rejected request", async () => {
      qdrant.upsert.mockRejectedValue(httpError(400, "Bad Request"));

      const result = store.upsert("aks_logs", [record("p1", [1, 0])]);

      await expect(result).rejects.toBeInstanceOf(AppError);
      await expect(result).rejects.toThrow("Qdrant rejected upsert: Bad Request");
      expect(qdrant.upsert).toHaveBeenCalledTimes(1);
    });

    it("wraps persistent failures in ExternalServiceError", async () => {
      qdrant.count.mockRejectedValue(new Error("connection refused"));

      const result = store.count("aks_logs");

      await expect(result).rejects.toBeInstanceOf(ExternalServiceError);
      await expect(result).rejects.toThrow("Qdrant count failed: connection refused");
      expect(qdrant.count).toHaveBeenCalledTimes(3);
    });

    it("reports health from the collection listing", async () => {
      qdrant.getCollections.mockRejectedValueOnce(new Error("down"));
      await expect(store.healthCheck()).resolves.toBe(false);

      qdrant.getCollections.mockResolvedValueOnce({ collections: [] });
      await expect(store.healthCheck()).resolves.toBe(true);
    });
  });

  describe("InMemoryVectorStore", () => {
    it("creates a collection once", async () => {
      const store = new InMemoryVectorStore();

      await expect(store.ensureCollection("aks_logs", 2)).resolves.toBe(true);
      await expect(store.ensureCollection("aks_logs", 2)).resolves.toBe(false);
      await expect(store.collectionExists("aks_logs")).resolves.toBe(true);
      await expect(store.collectionExists("other")).resolves.toBe(false);
    });

    it("overwrites points with the same id", async () => {
      const store = new InMemoryVectorStore();
      await store.ensureCollection("aks_logs", 2);

      await store.upsert("aks_logs", [record("p1", [1, 0]), record("p2", [0, 1])]);
      await store.upsert("aks_logs", [record("p1", [1, 1])]);

      await expect(store.count("aks_logs")).resolves.toBe(2);
    });

    it("returns the nearest points first, up to topK", async () => {
      const store = new InMemoryVectorStore();
      await store.ensureCollection("aks_logs", 2);
      await store.upsert("aks_logs", [record("far", [0, 1]), record("near", [1, 0]), record("mid", [1, 1])]);

      const results = await store.search("aks_logs", { vector: [1, 0], topK: 2 });

      expect(results.map((r) => r.id)).toEqual(["near", "mid"]);
      expect(results[0]?.score).toBeCloseTo(1);
      expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2);
      expect(results[0]?.payload["source"]).toBe("input-logs/day1.json");
    });

    it("filters by source", async () => {
      const store = new InMemoryVectorStore();
      await store.ensureCollection("aks_logs", 2);
      await store.upsert("aks_logs", [
        record("a", [1, 0], "input-logs/day1.json"),
        record("b", [1, 0], "input-logs/day2.json"),
      ]);

      const results = await store.search("aks_logs", {
        vector: [1, 0],
        topK: 5,
        filter: { sources: ["input-logs/day2.json"] },
      });

      expect(results.map((r) => r.id)).toEqual(["b"]);
    });

    it("rejects vectors of the wrong size", async () => {
      const store = new InMemoryVectorStore();
      await store.ensureCollection("aks_logs", 3);

      await expect(store.upsert("aks_logs", [record("p1", [1, 0])])).rejects.toBeInstanceOf(ValidationError);
      await expect(store.count("aks_logs")).resolves.toBe(0);
    });

    it("throws NotFoundError for a missing collection", async () => {
      const store = new InMemoryVectorStore();

      await expect(store.search("missing", { vector: [1], topK: 1 })).rejects.toThrow(
        "Collection missing not found",
      );
    });
  });

  describe("cosineSimilarity", () => {
    it("is 0 for a zero vector", () => {
      expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    });

    it("is -1 for opposite vectors", () => {
      expect(cosineSimilarity([1, 0], [-2, 0])).toBeCloseTo(-1);
    });
  });
});
