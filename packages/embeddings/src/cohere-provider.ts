import { CohereClient } from "cohere-ai";
import type CircuitBreaker from "opossum";
import { AppError, ExternalServiceError, createCircuitBreaker, errorMessage, fireGuarded } from "@logrecall/errors";
import type { Logger } from "@logrecall/logger";
import type { EmbeddingResult } from "@logrecall/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-english-v3.0";
const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_TIMEOUT_MS = 30_000;
const BATCH_SIZE = 96; // Cohere limit

type CohereInputType = "search_document" | "search_query";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;
  private timeoutMs: number;
  private breaker: CircuitBreaker<[string[], CohereInputType], EmbeddingResult>;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.breaker = createCircuitBreaker(
      "cohere-embeddings",
      (texts: string[], inputType: CohereInputType) => this.request(texts, inputType),
      { timeout: this.timeoutMs, logger: config.logger },
    );
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return fireGuarded(this.breaker, "Cohere embeddings", this.timeoutMs, [text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions: this.dimensions };
    }
    return fireGuarded(this.breaker, "Cohere embeddings", this.timeoutMs, texts, "search_document");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async request(texts: string[], inputType: CohereInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    try {
      for (let i = 0; i < texts.length; i += BATCH_SIZE) {
        const batch = texts.slice(i, i + BATCH_SIZE);

        const response = await this.client.v2.embed({
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
        });

        if (response.embeddings.float) {
          allEmbeddings.push(...response.embeddings.float);
        }

        if (response.meta?.billedUnits?.inputTokens) {
          totalTokens += response.meta.billedUnits.inputTokens;
        }
      }
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;
      throw new ExternalServiceError(`Cohere embedding failed: ${errorMessage(error)}`, "cohere", {
        cause: error,
      });
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
