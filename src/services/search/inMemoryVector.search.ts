import type { DistanceMetric } from "../../config/types";
import type { Chunk, ChunkDraft, RetrievalResult } from "../../types/document.types";
import { DimensionMismatchError } from "../../utils/PipelineError";
import { DISTANCE_FUNCTIONS } from "./distance";
import type { VectorIndex } from "./types";

/**
 * Exact search: every query is scored against every chunk.
 */
export class InMemoryVectorIndex implements VectorIndex {
    private entries: readonly Chunk[];
    private isReleased = false;

    private constructor(
        entries: readonly Chunk[],
        readonly dimensions: number,
        readonly metric: DistanceMetric
    ) {
        this.entries = entries;
    }

    /**
     * Pairs each chunk with its embedding. Nothing is returned unless every
     * embedding has the same length, so a partial index never exists.
     */
    static build(
        drafts: readonly ChunkDraft[],
        embeddings: readonly (readonly number[])[],
        metric: DistanceMetric = "cosine"
    ): InMemoryVectorIndex {
        if (drafts.length !== embeddings.length) {
            throw new DimensionMismatchError(drafts.length, embeddings.length);
        }

        const dimensions = embeddings[0]?.length ?? 0;
        const entries = drafts.map((draft, position) => {
            const embedding = embeddings[position] ?? [];
            if (embedding.length !== dimensions) {
                throw new DimensionMismatchError(dimensions, embedding.length, position);
            }
            return Object.freeze({
                ...draft,
                embedding: Object.freeze([...embedding]),
            });
        });

        return new InMemoryVectorIndex(Object.freeze(entries), dimensions, metric);
    }

    get size(): number {
        return this.entries.length;
    }

    get released(): boolean {
        return this.isReleased;
    }

    chunks(): readonly Chunk[] {
        return this.entries;
    }

    query(vector: readonly number[], k: number): RetrievalResult {
        if (k <= 0 || this.entries.length === 0) return [];
        if (vector.length !== this.dimensions) {
            throw new DimensionMismatchError(this.dimensions, vector.length);
        }

        const distance = DISTANCE_FUNCTIONS[this.metric];
        return this.entries
            .map((chunk, position) => ({
                chunk,
                distance: distance(vector, chunk.embedding),
                position,
            }))
            .sort((a, b) => a.distance - b.distance || a.position - b.position)
            .slice(0, k)
            .map(({ chunk, distance }) => ({ chunk, distance }));
    }

    release(): void {
        this.entries = [];
        this.isReleased = true;
    }
}
