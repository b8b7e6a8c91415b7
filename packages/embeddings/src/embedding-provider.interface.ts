import type { EmbeddingResult } from "@logrecall/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Embed a search query. */
  embed(text: string): Promise<EmbeddingResult>;
  /** Embed stored content, one vector per text, in input order. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
