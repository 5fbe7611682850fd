import type { DistanceMetric } from "../../config/types";
import type { DocumentInfo } from "../../types/document.types";
import type { ChunkingParams } from "../chunking/types";
import type { VectorIndex } from "../search/types";

export interface ProcessingMetrics {
    extractionTime: number;
    chunkingTime: number;
    embeddingTime: number;
    totalTime: number;
    chunksGenerated: number;
}

export interface IngestionRequest {
    bytes: Uint8Array;
    fileName: string;
    chunking: ChunkingParams;
    metric: DistanceMetric;
}

export interface IngestionResult {
    index: VectorIndex;
    document: DocumentInfo;
    chunkCount: number;
    metrics: ProcessingMetrics;
    summary: string;
}
