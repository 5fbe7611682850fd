export { QAService, sourceLabel, distinctSourceLabels } from "./text.qa";
export { assemblePrompt, estimateTokens, renderUserMessage, sourceTag } from "./prompt.qa";
export type * from "./types";
