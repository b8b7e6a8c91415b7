import { QdrantClient } from "@qdrant/js-client-rest";
import {
  AppError,
  ExternalServiceError,
  NotFoundError,
  errorMessage,
  withRetry,
  type RetryOptions,
} from "@logrecall/errors";
import { createSilentLogger, type Logger } from "@logrecall/logger";
import type { VectorRecord } from "@logrecall/types";
import type { IVectorStore, VectorSearchParams, VectorSearchResult } from "./vector-store.interface.js";

const BATCH_SIZE = 100;
const DEFAULT_TIMEOUT_MS = 30_000;

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 5_000,
};

export interface QdrantStoreOptions {
  timeoutMs?: number;
  retry?: Omit<RetryOptions, "onRetry">;
  /** Receives a warning for every retried call. */
  logger?: Logger;
}

function httpStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * 4xx responses become non-retryable AppErrors; everything else is left for
 * withRetry to try again.
 */
function classify(error: unknown, operation: string): unknown {
  const status = httpStatus(error);
  if (status === 404) {
    return new NotFoundError(`Qdrant ${operation}: collection not found`, { cause: error });
  }
  if (status !== undefined && status >= 400 && status < 500) {
    return new AppError({
      message: `Qdrant rejected ${operation}: ${errorMessage(error)}`,
      statusCode: status,
      code: "QDRANT_REQUEST_REJECTED",
      cause: error,
    });
  }
  return error;
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;
  private retry: RetryOptions;
  private logger: Logger;

  constructor(url: string, apiKey?: string, options?: QdrantStoreOptions) {
    this.client = new QdrantClient({
      url,
      apiKey,
      timeout: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      checkCompatibility: false,
    });
    this.retry = { ...DEFAULT_RETRY, ...options?.retry };
    this.logger = options?.logger ?? createSilentLogger();
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<boolean> {
    if (await this.collectionExists(collectionName)) {
      return false;
    }

    await this.call("create collection", () =>
      this.client.createCollection(collectionName, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
      }),
    );

    // Source filter index
    await this.call("create payload index", () =>
      this.client.createPayloadIndex(collectionName, {
        field_name: "source",
        field_schema: "keyword",
      }),
    );

    return true;
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    const collections = await this.call("list collections", () => this.client.getCollections());
    return collections.collections.some((c) => c.name === collectionName);
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.call("upsert", () =>
        this.client.upsert(collectionName, {
          wait: true,
          points: batch.map((r) => ({
            id: r.id,
            vector: r.vector,
            payload: r.payload,
          })),
        }),
      );
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const sources = params.filter?.sources;

    const results = await this.call("search", () =>
      this.client.search(collectionName, {
        vector: params.vector,
        limit: params.topK,
        with_payload: true,
        ...(sources && sources.length > 0
          ? { filter: { must: [{ key: "source", match: { any: sources } }] } }
          : {}),
      }),
    );

    return results.map((r) => ({
      id: typeof r.id === "string" ? r.id : String(r.id),
      score: r.score,
      payload: r.payload ?? {},
    }));
  }

  async count(collectionName: string): Promise<number> {
    const result = await this.call("count", () => this.client.count(collectionName, { exact: true }));
    return result.count;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const retry: RetryOptions = {
      ...this.retry,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn({ operation, attempt, delayMs, err: errorMessage(error) }, "Qdrant call failed; retrying");
      },
    };

    try {
      return await withRetry(async () => {
        try {
          return await fn();
        } catch (error: unknown) {
          throw classify(error, operation);
        }
      }, retry);
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;
      throw new ExternalServiceError(`Qdrant ${operation} failed: ${errorMessage(error)}`, "qdrant", {
        cause: error,
      });
    }
  }
}
