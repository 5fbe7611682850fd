export { OpenAIEmbeddingProvider } from "./core.embedding";
export { BatchedEmbeddingService, chunkArray } from "./batched.embedding";
export type * from "./types";
