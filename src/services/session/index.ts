export { ChatSession } from "./chat.session";
export { SessionManager, createSessionManager } from "./sessionManager.session";
export type { SessionManagerOptions, SessionManagerStats } from "./sessionManager.session";
export { createProviderPipeline } from "./pipeline.session";
export type * from "./types";
