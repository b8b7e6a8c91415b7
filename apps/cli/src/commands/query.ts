import { createInterface } from "node:readline/promises";
import type { AppConfig, ChatMessage } from "@logrecall/types";
import { ThresholdRetriever, answerQuestion } from "@logrecall/core";
import { NotFoundError, errorMessage } from "@logrecall/errors";
import type { Logger } from "@logrecall/logger";
import { createQueryServices } from "../container.js";
import { formatAnswer } from "../format.js";
import { parseQueryCommand } from "../query-command.js";

export interface QueryCommandOptions {
  collection?: string;
  k?: number;
  threshold?: number;
}

/**
 * Interactive question loop over an ingested collection.
 */
export async function queryCommand(config: AppConfig, options: QueryCommandOptions, logger: Logger): Promise<void> {
  const collectionName = options.collection ?? config.collectionName;
  const services = createQueryServices(config, logger);

  if (!(await services.vectorStore.collectionExists(collectionName))) {
    throw new NotFoundError(`Collection ${collectionName} does not exist. Run ingestion first`);
  }
  const points = await services.vectorStore.count(collectionName);
  if (points === 0) {
    throw new NotFoundError(`Collection ${collectionName} is empty. Run ingestion first`);
  }
  logger.info({ collection: collectionName, points }, "Collection ready");

  const settings = {
    k: options.k ?? config.retrieval.k,
    threshold: options.threshold ?? config.retrieval.threshold,
  };
  const retriever = new ThresholdRetriever(
    { embeddingProvider: services.embeddingProvider, vectorStore: services.vectorStore, collectionName, logger },
    settings,
  );
  const history: ChatMessage[] = [];

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("Enter your query (or 'exit' to quit): ");
  rl.prompt();

  try {
    for await (const line of rl) {
      const command = parseQueryCommand(line);

      switch (command.kind) {
        case "exit":
          return;
        case "empty":
          break;
        case "invalid":
          console.log(command.message);
          break;
        case "set-k":
          settings.k = command.k;
          console.log(`k = ${String(settings.k)}`);
          break;
        case "set-threshold":
          settings.threshold = command.threshold;
          console.log(`threshold = ${String(settings.threshold)}`);
          break;
        case "question":
          try {
            const answer = await answerQuestion(
              { query: command.text, k: settings.k, threshold: settings.threshold, history },
              {
                retriever,
                generator: services.generator,
                contextFormat: config.retrieval.contextFormat,
                maxHistoryTurns: config.retrieval.maxHistoryTurns,
                logger,
              },
            );
            console.log(`\n${formatAnswer(answer)}\n`);
            history.push({ role: "user", content: command.text }, { role: "assistant", content: answer.text });
            history.splice(0, Math.max(0, history.length - config.retrieval.maxHistoryTurns));
          } catch (error: unknown) {
            logger.error({ err: error }, "Query failed");
            console.log(`Error: ${errorMessage(error)}`);
          }
          break;
      }

      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
