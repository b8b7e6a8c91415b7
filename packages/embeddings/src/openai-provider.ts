import OpenAI from "openai";
import type CircuitBreaker from "opossum";
import { AppError, ExternalServiceError, createCircuitBreaker, errorMessage, fireGuarded } from "@logrecall/errors";
import type { Logger } from "@logrecall/logger";
import type { EmbeddingResult } from "@logrecall/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;
const DEFAULT_TIMEOUT_MS = 30_000;
const BATCH_SIZE = 2048; // OpenAI input limit per request

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly dimensions: number;
  private client: OpenAI;
  private model: string;
  private timeoutMs: number;
  private breaker: CircuitBreaker<[string[]], EmbeddingResult>;

  constructor(config: OpenAIProviderConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.breaker = createCircuitBreaker("openai-embeddings", (texts: string[]) => this.request(texts), {
      timeout: this.timeoutMs,
      logger: config.logger,
    });
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions: this.dimensions };
    }
    return fireGuarded(this.breaker, "OpenAI embeddings", this.timeoutMs, texts);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async request(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    try {
      for (let i = 0; i < texts.length; i += BATCH_SIZE) {
        const batch = texts.slice(i, i + BATCH_SIZE);

        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
          ...(this.model.startsWith("text-embedding-3") ? { dimensions: this.dimensions } : {}),
        });

        // Results carry their input position; order is not guaranteed
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        allEmbeddings.push(...ordered.map((item) => item.embedding));
        totalTokens += response.usage.prompt_tokens;
      }
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;
      throw new ExternalServiceError(`OpenAI embedding failed: ${errorMessage(error)}`, "openai", {
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
