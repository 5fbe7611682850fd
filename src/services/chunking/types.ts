import type { ChunkingStrategyName } from "../../config/types";

/**
 * A piece of the source text together with where it sits in that text.
 */
export interface TextSpan {
    text: string;
    start: number;
    end: number;
}

export interface SegmentOptions {
    /**
     * How far back from a hard cut to look for a sentence, line or word
     * boundary. 0 keeps hard character cuts.
     */
    boundaryTolerance?: number;
}

export interface ChunkingParams {
    chunkSize: number;
    chunkOverlap: number;
}

export interface ChunkingStrategy {
    readonly name: ChunkingStrategyName;
    split(text: string, filename: string): TextSpan[] | Promise<TextSpan[]>;
}

export interface ChunkingStats {
    totalChunks: number;
    averageChunkSize: number;
    minChunkSize: number;
    maxChunkSize: number;
    strategy: ChunkingStrategyName;
    filename: string;
}
