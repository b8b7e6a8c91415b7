import type { AppConfig, IngestionRunResult } from "@logrecall/types";
import { ingestLogs } from "@logrecall/core";
import type { Logger } from "@logrecall/logger";
import { createIngestionServices } from "../container.js";
import { formatIngestionSummary } from "../format.js";

export interface IngestCommandOptions {
  collection?: string;
}

/**
 * Ingest every matching log file not yet tracked. SIGINT stops the run after
 * the file in progress.
 */
export async function ingestCommand(
  config: AppConfig,
  options: IngestCommandOptions,
  logger: Logger,
): Promise<IngestionRunResult> {
  const collectionName = options.collection ?? config.collectionName;
  const services = createIngestionServices(config, logger);
  const controller = new AbortController();

  const onSigint = (): void => {
    logger.warn("Interrupt received; stopping after the current file");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  logger.info(
    {
      collection: collectionName,
      pattern: config.sources.pattern,
      tracker: config.vectorStore.type === "memory" ? "memory" : config.sources.trackerFile,
    },
    "Starting log ingestion",
  );

  try {
    const result = await ingestLogs(
      collectionName,
      { ...services, logger },
      {
        chunking: { chunkSize: config.ingestion.chunkSize, chunkOverlap: config.ingestion.chunkOverlap },
        groupSize: config.ingestion.groupSize,
        batch: { batchSize: config.ingestion.batchSize, pacingDelayMs: config.ingestion.pacingDelayMs },
        signal: controller.signal,
        onProgress: (outcome, position, total) => {
          console.log(`[${String(position)}/${String(total)}] ${outcome.source}: ${outcome.status}`);
        },
      },
    );

    console.log(formatIngestionSummary(result));
    return result;
  } finally {
    process.off("SIGINT", onSigint);
  }
}
