export { InMemoryVectorIndex } from "./inMemoryVector.search";
export { VectorSearchService, scoreStats } from "./retrieval.search";
export { cosineDistance, euclideanDistance, DISTANCE_FUNCTIONS } from "./distance";
export type * from "./types";
