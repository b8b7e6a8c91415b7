import { z } from "zod";
import type { LogRecord } from "@logrecall/types";

const logRecordSchema = z
  .object({
    timestamp: z.union([z.string().min(1), z.number()]),
  })
  .passthrough();

/**
 * Validates without rebuilding the object, so the record keeps its original
 * key order for rendering.
 */
export function isLogRecord(value: unknown): value is LogRecord {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return logRecordSchema.safeParse(value).success;
}
