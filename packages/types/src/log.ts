/**
 * A single structured log entry. Arbitrary JSON object that carries at
 * least a timestamp; key order is kept as read from the source.
 */
export interface LogRecord {
  timestamp: string | number;
  [key: string]: unknown;
}

export type SourceFormat = "json" | "jsonl";
