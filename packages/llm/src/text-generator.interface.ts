import type { ChatMessage } from "@logrecall/types";

export interface ITextGenerator {
  readonly model: string;

  /** Single completion for an ordered message list; resolves to the reply text. */
  complete(messages: ChatMessage[]): Promise<string>;
}
