import type {
  BatchWriteConfig,
  Chunk,
  ChunkingConfig,
  IngestionRunResult,
  SourceOutcome,
  SourceStatus,
} from "@logrecall/types";
import type { ILogParser, ISourceCatalog } from "@logrecall/parser";
import { getLogParser } from "@logrecall/parser";
import type { IChunker } from "@logrecall/chunker";
import { buildDocuments, chunkDocuments } from "@logrecall/chunker";
import type { IEmbeddingProvider } from "@logrecall/embeddings";
import type { IVectorStore } from "@logrecall/vector-store";
import type { IIngestionTracker } from "@logrecall/tracker";
import { CollectionSetupError, ValidationError, WriteError, errorMessage } from "@logrecall/errors";
import { createSilentLogger, type Logger } from "@logrecall/logger";
import { validateBatchConfig, writeInBatches, type Sleep } from "./batch-writer.js";

export interface IngestionDependencies {
  catalog: ISourceCatalog;
  tracker: IIngestionTracker;
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  /** Parser selection per source id; defaults to choosing by file extension. */
  parserFor?: (sourceId: string) => ILogParser;
  sleep?: Sleep;
  logger?: Logger;
}

export interface IngestionOptions {
  chunking: ChunkingConfig;
  /** Records per document. */
  groupSize: number;
  batch: BatchWriteConfig;
  /** Checked between files; the file in progress always finishes. */
  signal?: AbortSignal;
  onProgress?: (outcome: SourceOutcome, position: number, total: number) => void;
}

function validateOptions(options: IngestionOptions): void {
  const { chunkSize, chunkOverlap } = options.chunking;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError("chunkSize must be a positive integer", { chunkSize: String(chunkSize) });
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ValidationError("chunkOverlap must be a non-negative integer smaller than chunkSize", {
      chunkOverlap: String(chunkOverlap),
    });
  }
  if (!Number.isInteger(options.groupSize) || options.groupSize < 1) {
    throw new ValidationError("groupSize must be a positive integer", { groupSize: String(options.groupSize) });
  }
  validateBatchConfig(options.batch);
}

function outcome(source: string, status: SourceStatus, fields?: Partial<SourceOutcome>): SourceOutcome {
  return { source, status, documentCount: 0, chunkCount: 0, chunksWritten: 0, ...fields };
}

/**
 * Ingestion pipeline: Ensure collection -> List sources -> per source:
 * Skip tracked -> Parse -> Group -> Chunk -> Write in batches -> Track
 *
 * The failure unit is the source file. A file that fails to parse or write is
 * left untracked so a later run retries it from the start; chunk ids are
 * deterministic, so the retry overwrites whatever the failed attempt wrote.
 * Tracker failures are not caught and stop the run.
 */
export async function ingestLogs(
  collectionName: string,
  deps: IngestionDependencies,
  options: IngestionOptions,
): Promise<IngestionRunResult> {
  validateOptions(options);

  const logger = deps.logger ?? createSilentLogger();
  const parserFor = deps.parserFor ?? getLogParser;

  try {
    const created = await deps.vectorStore.ensureCollection(collectionName, deps.embeddingProvider.dimensions);
    if (created) {
      logger.info(
        { collection: collectionName, dimensions: deps.embeddingProvider.dimensions },
        "Created vector collection",
      );
    }
  } catch (error: unknown) {
    throw new CollectionSetupError(
      `Could not prepare collection ${collectionName}: ${errorMessage(error)}`,
      collectionName,
      { cause: error },
    );
  }

  const sources = await deps.catalog.list();
  const outcomes: SourceOutcome[] = [];

  if (sources.length === 0) {
    logger.warn({ collection: collectionName }, "No log sources found");
    return { collectionName, outcomes, chunksWritten: 0, cancelled: false };
  }

  let cancelled = false;

  for (const [i, source] of sources.entries()) {
    if (options.signal?.aborted) {
      cancelled = true;
      logger.warn({ remaining: sources.length - i }, "Ingestion cancelled before all sources were processed");
      break;
    }

    const result = await ingestSource(source, collectionName, deps, options, parserFor, logger);
    outcomes.push(result);

    logger.info(
      {
        source,
        status: result.status,
        chunks: result.chunkCount,
        chunksWritten: result.chunksWritten,
        position: i + 1,
        total: sources.length,
      },
      "Source processed",
    );
    options.onProgress?.(result, i + 1, sources.length);
  }

  const chunksWritten = outcomes.reduce((sum, o) => sum + o.chunksWritten, 0);
  const counts: Record<SourceStatus, number> = {
    skipped: 0,
    ingested: 0,
    parse_failed: 0,
    empty: 0,
    write_failed: 0,
  };
  for (const o of outcomes) {
    counts[o.status] += 1;
  }

  logger.info({ collection: collectionName, ...counts, chunksWritten, cancelled }, "Ingestion run finished");

  return { collectionName, outcomes, chunksWritten, cancelled };
}

async function ingestSource(
  source: string,
  collectionName: string,
  deps: IngestionDependencies,
  options: IngestionOptions,
  parserFor: (sourceId: string) => ILogParser,
  logger: Logger,
): Promise<SourceOutcome> {
  if (await deps.tracker.has(source)) {
    logger.debug({ source }, "Source already ingested, skipping");
    return outcome(source, "skipped");
  }

  let documentCount: number;
  let chunks: Chunk[];
  try {
    const content = await deps.catalog.read(source);
    const records = parserFor(source).parse(content, source);
    const documents = buildDocuments(source, records, options.groupSize);
    documentCount = documents.length;
    chunks = chunkDocuments(documents, deps.chunker, options.chunking);
  } catch (error: unknown) {
    logger.error({ err: error, source }, "Failed to parse log source");
    return outcome(source, "parse_failed", { error: errorMessage(error) });
  }

  if (chunks.length === 0) {
    logger.warn({ source }, "Log source has no records; leaving it untracked");
    return outcome(source, "empty");
  }

  let chunksWritten: number;
  try {
    chunksWritten = await writeInBatches(collectionName, chunks, options.batch, {
      embeddingProvider: deps.embeddingProvider,
      vectorStore: deps.vectorStore,
      sleep: deps.sleep,
      logger,
    });
  } catch (error: unknown) {
    logger.error({ err: error, source }, "Failed to write log source");
    return outcome(source, "write_failed", {
      documentCount,
      chunkCount: chunks.length,
      chunksWritten: error instanceof WriteError ? error.chunksWritten : 0,
      error: errorMessage(error),
    });
  }

  await deps.tracker.mark(source);

  return outcome(source, "ingested", { documentCount, chunkCount: chunks.length, chunksWritten });
}
