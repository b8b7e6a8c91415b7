import type { Answer, AnswerRequest, ChatMessage, ContextFormat } from "@logrecall/types";
import { REFUSAL_TEXT } from "@logrecall/types";
import type { ITextGenerator } from "@logrecall/llm";
import { createSilentLogger, type Logger } from "@logrecall/logger";
import type { IRetriever } from "./threshold-retriever.js";
import { assembleContext } from "./context-assembler.js";

export interface AnswerDependencies {
  retriever: IRetriever;
  generator: ITextGenerator;
  contextFormat?: ContextFormat;
  /** Most recent history messages passed to the generator. Default: 10 */
  maxHistoryTurns?: number;
  logger?: Logger;
}

const DEFAULT_MAX_HISTORY_TURNS = 10;

export const SYSTEM_PROMPT = [
  "You answer questions about operational logs.",
  "Use only the log excerpts supplied in the user's message.",
  "If the excerpts do not contain the answer, say that the logs do not show it.",
  "Mention the source file when you rely on a specific excerpt.",
].join(" ");

export function buildMessages(
  query: string,
  context: string,
  history: ChatMessage[],
  maxHistoryTurns: number,
): ChatMessage[] {
  const recent = maxHistoryTurns > 0 ? history.slice(-maxHistoryTurns) : [];

  return [
    { role: "system", content: SYSTEM_PROMPT },
    ...recent,
    { role: "user", content: `${context}\n\nQuestion: ${query}` },
  ];
}

/**
 * Answer: Retrieve -> (no chunks: refuse) -> Assemble context -> Generate
 *
 * The generator is only reached when at least one chunk cleared the
 * threshold; otherwise the fixed refusal is returned with no citations.
 */
export async function answerQuestion(request: AnswerRequest, deps: AnswerDependencies): Promise<Answer> {
  const logger = deps.logger ?? createSilentLogger();

  const retrieval = await deps.retriever.search(request.query, {
    k: request.k,
    threshold: request.threshold,
    filter: request.filter,
  });

  if (retrieval.chunks.length === 0) {
    logger.info(
      { candidates: retrieval.candidateCount, threshold: retrieval.threshold },
      "No log chunks cleared the threshold; refusing",
    );
    return { text: REFUSAL_TEXT, citations: [], refused: true };
  }

  const context = assembleContext(retrieval.chunks, deps.contextFormat ?? "markdown");
  const messages = buildMessages(
    request.query,
    context,
    request.history ?? [],
    deps.maxHistoryTurns ?? DEFAULT_MAX_HISTORY_TURNS,
  );

  const text = (await deps.generator.complete(messages)).trim();

  if (text === REFUSAL_TEXT) {
    logger.info({ candidates: retrieval.chunks.length }, "Model declined to answer from the retrieved context");
    return { text: REFUSAL_TEXT, citations: [], refused: true };
  }

  logger.info({ citations: retrieval.chunks.length, model: deps.generator.model }, "Generated grounded answer");

  return { text, citations: retrieval.chunks, refused: false };
}
