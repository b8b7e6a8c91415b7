import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type CircuitBreaker from "opossum";
import { AppError, ExternalServiceError, createCircuitBreaker, errorMessage, fireGuarded } from "@logrecall/errors";
import type { Logger } from "@logrecall/logger";
import type { ChatMessage } from "@logrecall/types";
import type { ITextGenerator } from "./text-generator.interface.js";

const DEFAULT_MODEL = "gpt-4.1-nano";
const DEFAULT_TEMPERATURE = 0;
const DEFAULT_TIMEOUT_MS = 30_000;

export interface OpenAIChatConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  logger?: Logger;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

export class OpenAIChatGenerator implements ITextGenerator {
  readonly model: string;
  private client: OpenAI;
  private temperature: number;
  private timeoutMs: number;
  private breaker: CircuitBreaker<[ChatMessage[]], string>;

  constructor(config: OpenAIChatConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.breaker = createCircuitBreaker("openai-chat", (messages: ChatMessage[]) => this.request(messages), {
      timeout: this.timeoutMs,
      logger: config.logger,
    });
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    return fireGuarded(this.breaker, "OpenAI chat", this.timeoutMs, messages);
  }

  private async request(messages: ChatMessage[]): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: messages.map(toMessageParam),
      });
      return response.choices[0]?.message.content ?? "";
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;
      throw new ExternalServiceError(`OpenAI chat completion failed: ${errorMessage(error)}`, "openai", {
        cause: error,
      });
    }
  }
}
