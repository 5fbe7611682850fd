import type { DistanceMetric } from "../../config/types";
import type { Chunk, RetrievalResult } from "../../types/document.types";

/**
 * Read-only nearest-neighbour store over one document's chunks. A persistent
 * store can stand in for the in-memory one behind this interface.
 */
export interface VectorIndex {
    readonly size: number;
    readonly dimensions: number;
    readonly metric: DistanceMetric;
    readonly released: boolean;
    chunks(): readonly Chunk[];
    query(vector: readonly number[], k: number): RetrievalResult;
    release(): void;
}

export interface SearchScoreStats {
    averageDistance: number;
    minDistance: number;
    maxDistance: number;
}
