import type { DistanceMetric, PipelineConfig } from "../../config/types";
import type {
    ConversationTurn,
    DocumentInfo,
    RetrievalResult,
} from "../../types/document.types";
import type { Embedder } from "../embeddings/types";
import type { GenerationSettings } from "../LLM/types";
import type { IngestionRequest, IngestionResult } from "../processing/types";
import type { Answer, AnswerRequest } from "../qa/types";
import type { VectorIndex } from "../search/types";

export type SessionState = "Empty" | "Ingesting" | "Indexed" | "Answering" | "Closed";

export type SessionOperation = "document ingestion" | "query";

export interface DocumentIngestor {
    ingest(request: IngestionRequest): Promise<IngestionResult>;
}

export interface Retriever {
    retrieve(index: VectorIndex, queryVector: readonly number[], k: number): Promise<RetrievalResult>;
}

export interface Answerer {
    answer(request: AnswerRequest): Promise<Answer>;
}

/**
 * Everything one session needs to talk to the outside world.
 */
export interface SessionPipeline {
    processor: DocumentIngestor;
    embedder: Embedder;
    retriever: Retriever;
    answerer: Answerer;
}

export interface SessionSettings {
    pipeline: PipelineConfig;
    generation: GenerationSettings;
    metric: DistanceMetric;
    optimizeQuery: boolean;
    maxUploadBytes: number;
}

export interface SessionCreateOptions {
    model?: string;
    topK?: number;
    chunkSize?: number;
    chunkOverlap?: number;
}

export interface IngestionSummary {
    document: DocumentInfo;
    chunkCount: number;
    message: string;
    processingTime: number;
}

export interface QueryResult {
    turn: ConversationTurn;
    optimizedQuery: string;
    retrievedChunks: number;
    sourceLabels: string[];
    promptTokens: number;
}

export interface ChatStats {
    messages: number;
    turns: number;
    chunkCount: number;
    currentDocument: string | null;
}

export interface SessionSnapshot {
    id: string;
    state: SessionState;
    model: string;
    topK: number;
    chunkSize: number;
    chunkOverlap: number;
    document: DocumentInfo | null;
    history: readonly ConversationTurn[];
    stats: ChatStats;
    createdAt: string;
    lastActivityAt: string;
}

export type PipelineFactory = (config: PipelineConfig, settings: SessionSettings) => SessionPipeline;
