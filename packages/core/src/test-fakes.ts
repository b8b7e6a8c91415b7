import type { ChatMessage, Chunk, EmbeddingResult } from "@logrecall/types";
import type { IEmbeddingProvider } from "@logrecall/embeddings";
import type { ITextGenerator } from "@logrecall/llm";

const VOCABULARY = ["oomkilled", "timeout", "dns", "disk"];

/**
 * Embeds text as keyword counts over a tiny vocabulary, so cosine scores in
 * tests are exact: texts sharing one keyword score 1, disjoint texts score 0.
 */
export class KeywordEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "keyword";
  readonly dimensions = VOCABULARY.length;
  readonly batchCalls: string[][] = [];
  /** 1-based batchEmbed call numbers that reject. */
  readonly failingCalls = new Set<number>();

  async embed(text: string): Promise<EmbeddingResult> {
    return this.result([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.batchCalls.push(texts);
    if (this.failingCalls.has(this.batchCalls.length)) {
      throw new Error("embedding service unavailable");
    }
    return this.result(texts);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private result(texts: string[]): EmbeddingResult {
    return {
      embeddings: texts.map(vectorize),
      model: "keyword",
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }
}

function vectorize(text: string): number[] {
  const lower = text.toLowerCase();
  return VOCABULARY.map((word) => lower.split(word).length - 1);
}

export class FakeTextGenerator implements ITextGenerator {
  readonly model = "fake-model";
  readonly calls: ChatMessage[][] = [];

  constructor(private reply = "The payments pod was OOMKilled.") {}

  async complete(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages);
    return this.reply;
  }
}

export function makeChunk(
  i: number,
  content = `request ${String(i)} hit a timeout`,
  source = "input-logs/day1.json",
): Chunk {
  return {
    id: `00000000-0000-5000-8000-${String(i).padStart(12, "0")}`,
    content,
    index: i,
    tokenCount: Math.ceil(content.length / 4),
    metadata: { source, documentIndex: 0, startChar: 0, endChar: content.length, overlap: 0 },
  };
}
