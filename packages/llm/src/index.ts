export type { ITextGenerator } from "./text-generator.interface.js";
export { OpenAIChatGenerator } from "./openai-chat-generator.js";
export type { OpenAIChatConfig } from "./openai-chat-generator.js";
export { createTextGenerator } from "./factory.js";
