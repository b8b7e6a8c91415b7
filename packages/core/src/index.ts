export { ingestLogs } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionOptions } from "./ingestion-pipeline.js";

export { writeInBatches, validateBatchConfig } from "./batch-writer.js";
export type { BatchWriterDependencies, Sleep } from "./batch-writer.js";

export { ThresholdRetriever } from "./threshold-retriever.js";
export type { IRetriever, RetrieverDependencies, RetrieverDefaults } from "./threshold-retriever.js";

export { answerQuestion, buildMessages, SYSTEM_PROMPT } from "./answer-composer.js";
export type { AnswerDependencies } from "./answer-composer.js";

export { assembleContext } from "./context-assembler.js";
export { validateQueryFilter } from "./filter-validator.js";
