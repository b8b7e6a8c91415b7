export type ContextFormat = "xml" | "markdown" | "plain";

export interface QueryFilter {
  sources?: string[];
}

// Allowed filter fields
export const QUERY_FILTER_ALLOWLIST = ["sources"] as const;

export interface RetrievalOptions {
  k?: number;
  threshold?: number;
  filter?: QueryFilter;
}

export interface ScoredChunk {
  chunkId: string;
  source: string;
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface RetrievalResult {
  chunks: ScoredChunk[];
  candidateCount: number;
  k: number;
  threshold: number;
  retrievalTimeMs: number;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface AnswerRequest extends RetrievalOptions {
  query: string;
  history?: ChatMessage[];
}

export interface Answer {
  text: string;
  citations: ScoredChunk[];
  refused: boolean;
}

export const REFUSAL_TEXT = "Sorry, the question is out of my scope";
