import { z } from "zod";
import type { AppConfig } from "@logrecall/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/** A blank assignment such as `QDRANT_API_KEY=` counts as unset. */
const optionalSecret = () =>
  z
    .string()
    .optional()
    .transform((value) => (value === "" ? undefined : value));

/**
 * Environment schema. Validates, transforms and fills in defaults so that
 * the result maps onto a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    COLLECTION_NAME: z.string().min(1, "COLLECTION_NAME must not be empty").default("aks_logs"),

    // ---------- Sources ----------
    LOGS_PATH: z.string().min(1).default("input-logs/*.json"),
    INGESTION_TRACKER_FILE: z.string().min(1).default("ingestracker/ingested_files.json"),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().url("QDRANT_URL must be a URL").default("http://localhost:6333"),
    QDRANT_API_KEY: optionalSecret(),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    OPENAI_API_KEY: optionalSecret(),
    EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    VECTOR_SIZE: positiveInt("1536"),
    COHERE_API_KEY: optionalSecret(),
    COHERE_EMBED_MODEL: z.string().default("embed-english-v3.0"),

    // ---------- Generation ----------
    RETRIEVAL_MODEL: z.string().default("gpt-4.1-nano"),
    GENERATION_TEMPERATURE: z
      .string()
      .default("0")
      .transform(Number)
      .pipe(z.number().min(0).max(2)),
    UPSTREAM_TIMEOUT_MS: positiveInt("30000"),

    // ---------- Ingestion ----------
    CHUNK_SIZE: positiveInt("2000"),
    CHUNK_OVERLAP: nonNegativeInt("100"),
    LOG_BATCH: positiveInt("20"),
    BATCH_SIZE: positiveInt("10"),
    BATCH_SLEEP_MS: nonNegativeInt("2000"),

    // ---------- Retrieval ----------
    DEFAULT_K: positiveInt("5"),
    SCORE_THRESHOLD: z
      .string()
      .default("0.35")
      .transform(Number)
      .pipe(z.number().min(-1).max(1)),
    MAX_HISTORY_TURNS: nonNegativeInt("10"),
    CONTEXT_FORMAT: z.enum(["xml", "markdown", "plain"]).default("markdown"),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    collectionName: parsed.COLLECTION_NAME,

    sources: {
      pattern: parsed.LOGS_PATH,
      trackerFile: parsed.INGESTION_TRACKER_FILE,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      openaiApiKey: parsed.OPENAI_API_KEY ?? "",
      openaiModel: parsed.EMBEDDING_MODEL,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      cohereModel: parsed.COHERE_EMBED_MODEL,
      dimensions: parsed.VECTOR_SIZE,
      timeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
    },

    generation: {
      openaiApiKey: parsed.OPENAI_API_KEY ?? "",
      model: parsed.RETRIEVAL_MODEL,
      temperature: parsed.GENERATION_TEMPERATURE,
      timeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
    },

    ingestion: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
      groupSize: parsed.LOG_BATCH,
      batchSize: parsed.BATCH_SIZE,
      pacingDelayMs: parsed.BATCH_SLEEP_MS,
    },

    retrieval: {
      k: parsed.DEFAULT_K,
      threshold: parsed.SCORE_THRESHOLD,
      maxHistoryTurns: parsed.MAX_HISTORY_TURNS,
      contextFormat: parsed.CONTEXT_FORMAT,
    },
  };
}
