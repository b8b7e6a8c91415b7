import type { GenerationSettings } from "@logrecall/types";
import type { Logger } from "@logrecall/logger";
import type { ITextGenerator } from "./text-generator.interface.js";
import { OpenAIChatGenerator } from "./openai-chat-generator.js";

export function createTextGenerator(settings: GenerationSettings, logger?: Logger): ITextGenerator {
  if (!settings.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required for answer generation");
  }
  return new OpenAIChatGenerator({
    apiKey: settings.openaiApiKey,
    model: settings.model,
    temperature: settings.temperature,
    timeoutMs: settings.timeoutMs,
    logger,
  });
}
