import { NotFoundError, ValidationError } from "@logrecall/errors";
import type { VectorRecord } from "@logrecall/types";
import type { IVectorStore, VectorSearchParams, VectorSearchResult } from "./vector-store.interface.js";

interface Collection {
  dimensions: number;
  points: Map<string, VectorRecord>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Process-local store with Qdrant's collection semantics (cosine distance,
 * overwrite by id). Used for tests and for running without a Qdrant server.
 */
export class InMemoryVectorStore implements IVectorStore {
  private collections = new Map<string, Collection>();

  async ensureCollection(collectionName: string, dimensions: number): Promise<boolean> {
    if (this.collections.has(collectionName)) {
      return false;
    }
    this.collections.set(collectionName, { dimensions, points: new Map() });
    return true;
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    return this.collections.has(collectionName);
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    const collection = this.get(collectionName);

    for (const record of records) {
      if (record.vector.length !== collection.dimensions) {
        throw new ValidationError(
          `Vector for point ${record.id} has ${String(record.vector.length)} dimensions, collection ${collectionName} expects ${String(collection.dimensions)}`,
        );
      }
    }

    for (const record of records) {
      collection.points.set(record.id, record);
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const collection = this.get(collectionName);
    const sources = params.filter?.sources;
    const allowed = sources && sources.length > 0 ? new Set(sources) : undefined;

    const scored: VectorSearchResult[] = [];
    for (const point of collection.points.values()) {
      if (allowed && !allowed.has(point.payload.source)) continue;
      scored.push({
        id: point.id,
        score: cosineSimilarity(params.vector, point.vector),
        payload: { ...point.payload },
      });
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, params.topK);
  }

  async count(collectionName: string): Promise<number> {
    return this.get(collectionName).points.size;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private get(collectionName: string): Collection {
    const collection = this.collections.get(collectionName);
    if (!collection) {
      throw new NotFoundError(`Collection ${collectionName} not found`);
    }
    return collection;
  }
}
