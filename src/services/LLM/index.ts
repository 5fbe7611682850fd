export { LLMService, OpenAIChatProvider } from "./core.LLM";
export type * from "./types";
