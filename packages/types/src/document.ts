/**
 * Grouped textual rendering of consecutive log records from one source.
 * Built transiently during ingestion and never persisted on its own.
 */
export interface LogDocument {
  source: string;
  index: number;
  text: string;
  recordCount: number;
}
