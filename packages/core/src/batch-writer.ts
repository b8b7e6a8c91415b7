import { setTimeout as delay } from "node:timers/promises";
import type { BatchWriteConfig, Chunk, VectorRecord } from "@logrecall/types";
import type { IEmbeddingProvider } from "@logrecall/embeddings";
import type { IVectorStore } from "@logrecall/vector-store";
import { ValidationError, WriteError, errorMessage } from "@logrecall/errors";
import { createSilentLogger, type Logger } from "@logrecall/logger";

export type Sleep = (ms: number) => Promise<void>;

export interface BatchWriterDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  /** Pacing between batches; defaults to a real timer. */
  sleep?: Sleep;
  logger?: Logger;
}

const defaultSleep: Sleep = (ms) => delay(ms);

export function validateBatchConfig(config: BatchWriteConfig): void {
  if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
    throw new ValidationError("batchSize must be a positive integer", { batchSize: String(config.batchSize) });
  }
  if (!Number.isFinite(config.pacingDelayMs) || config.pacingDelayMs < 0) {
    throw new ValidationError("pacingDelayMs must be a non-negative number", {
      pacingDelayMs: String(config.pacingDelayMs),
    });
  }
}

function toVectorRecord(chunk: Chunk, vector: number[]): VectorRecord {
  return {
    id: chunk.id,
    vector,
    payload: {
      content: chunk.content,
      source: chunk.metadata.source,
      documentIndex: chunk.metadata.documentIndex,
      chunkIndex: chunk.index,
      startChar: chunk.metadata.startChar,
      endChar: chunk.metadata.endChar,
      tokenCount: chunk.tokenCount,
    },
  };
}

/**
 * Embed and upsert chunks in consecutive batches, pausing `pacingDelayMs`
 * between batches (never after the last). Stops at the first failing batch;
 * the thrown WriteError carries how many chunks were written before it.
 *
 * @returns number of chunks written
 */
export async function writeInBatches(
  collectionName: string,
  chunks: Chunk[],
  config: BatchWriteConfig,
  deps: BatchWriterDependencies,
): Promise<number> {
  validateBatchConfig(config);

  const sleep = deps.sleep ?? defaultSleep;
  const logger = deps.logger ?? createSilentLogger();
  const totalBatches = Math.ceil(chunks.length / config.batchSize);
  let written = 0;

  for (let start = 0, batchNumber = 1; start < chunks.length; start += config.batchSize, batchNumber++) {
    if (start > 0) {
      await sleep(config.pacingDelayMs);
    }

    const batch = chunks.slice(start, start + config.batchSize);

    try {
      const result = await deps.embeddingProvider.batchEmbed(batch.map((chunk) => chunk.content));

      if (result.embeddings.length !== batch.length) {
        throw new WriteError(
          `Embedding provider returned ${String(result.embeddings.length)} vectors for ${String(batch.length)} chunks`,
          written,
        );
      }

      const records: VectorRecord[] = [];
      for (const [i, chunk] of batch.entries()) {
        const vector = result.embeddings[i];
        if (!vector) {
          throw new WriteError(`Missing embedding for chunk ${chunk.id}`, written);
        }
        records.push(toVectorRecord(chunk, vector));
      }

      await deps.vectorStore.upsert(collectionName, records);
    } catch (error: unknown) {
      if (error instanceof WriteError) throw error;
      throw new WriteError(
        `Batch ${String(batchNumber)}/${String(totalBatches)} failed after ${String(written)} chunks: ${errorMessage(error)}`,
        written,
        { cause: error },
      );
    }

    written += batch.length;
    logger.debug({ collection: collectionName, batch: batchNumber, totalBatches, written }, "Batch written");
  }

  return written;
}
