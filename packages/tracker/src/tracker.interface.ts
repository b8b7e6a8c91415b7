/**
 * Durable set of source ids whose chunks have all reached the vector store.
 * Single writer; callers mark a source only after its last batch succeeded.
 */
export interface IIngestionTracker {
  has(sourceId: string): Promise<boolean>;
  mark(sourceId: string): Promise<void>;
  list(): Promise<string[]>;
}
