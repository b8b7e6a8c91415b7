import type { RetrievalOptions, RetrievalResult, ScoredChunk } from "@logrecall/types";
import type { IEmbeddingProvider } from "@logrecall/embeddings";
import type { IVectorStore, VectorSearchResult } from "@logrecall/vector-store";
import { ExternalServiceError, ValidationError } from "@logrecall/errors";
import { createSilentLogger, type Logger } from "@logrecall/logger";
import { validateQueryFilter } from "./filter-validator.js";

export interface IRetriever {
  search(query: string, options?: RetrievalOptions): Promise<RetrievalResult>;
}

export interface RetrieverDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  logger?: Logger;
}

export interface RetrieverDefaults {
  k: number;
  threshold: number;
}

function validateK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new ValidationError("k must be an integer of at least 1", { k: String(k) });
  }
}

function validateThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < -1 || threshold > 1) {
    throw new ValidationError("threshold must be a number between -1 and 1", { threshold: String(threshold) });
  }
}

function toScoredChunk(result: VectorSearchResult): ScoredChunk {
  const { content, source, ...metadata } = result.payload;
  return {
    chunkId: result.id,
    source: typeof source === "string" ? source : "",
    content: typeof content === "string" ? content : "",
    score: result.score,
    metadata,
  };
}

/**
 * Retrieval: Validate -> Embed query -> Top-k search -> Drop below threshold
 *
 * The store returns up to k neighbours; only those scoring at least the
 * threshold survive, best first. No survivors is a normal, empty result.
 */
export class ThresholdRetriever implements IRetriever {
  private logger: Logger;

  constructor(
    private deps: RetrieverDependencies,
    private defaults: RetrieverDefaults,
  ) {
    validateK(defaults.k);
    validateThreshold(defaults.threshold);
    this.logger = deps.logger ?? createSilentLogger();
  }

  async search(query: string, options: RetrievalOptions = {}): Promise<RetrievalResult> {
    const startTime = Date.now();

    if (query.trim().length === 0) {
      throw new ValidationError("Query must not be empty", { query: "empty" });
    }

    const k = options.k ?? this.defaults.k;
    const threshold = options.threshold ?? this.defaults.threshold;
    validateK(k);
    validateThreshold(threshold);
    const filter = options.filter === undefined ? undefined : validateQueryFilter(options.filter);

    const embeddingResult = await this.deps.embeddingProvider.embed(query);
    const queryVector = embeddingResult.embeddings[0];

    if (!queryVector) {
      throw new ExternalServiceError(
        "Embedding provider returned no vector for the query",
        this.deps.embeddingProvider.name,
      );
    }

    const candidates = await this.deps.vectorStore.search(this.deps.collectionName, {
      vector: queryVector,
      topK: k,
      filter,
    });

    const chunks = candidates
      .filter((candidate) => candidate.score >= threshold)
      .map(toScoredChunk)
      .sort((a, b) => b.score - a.score);

    const retrievalTimeMs = Date.now() - startTime;

    this.logger.debug(
      { k, threshold, candidates: candidates.length, kept: chunks.length, retrievalTimeMs },
      "Retrieved log chunks",
    );

    return {
      chunks,
      candidateCount: candidates.length,
      k,
      threshold,
      retrievalTimeMs,
    };
  }
}
