import type {
    ConversationTurn,
    RetrievalResult,
    SourceReference,
} from "../../types/document.types";
import type { GenerationSettings } from "../LLM/types";

export interface PromptBudget {
    budgetTokens: number;
    charsPerToken: number;
    historyWindow: number;
}

export interface PromptChunk {
    id: string;
    text: string;
}

export interface AssembledPrompt {
    systemPrompt: string;
    userMessage: string;
    includedChunkIds: string[];
    includedHistoryTurns: number;
    droppedChunks: number;
    droppedHistoryTurns: number;
    truncatedChunkId: string | null;
    estimatedTokens: number;
}

export interface AnswerRequest {
    query: string;
    retrieval: RetrievalResult;
    history: readonly ConversationTurn[];
    generation: GenerationSettings;
}

export interface Answer {
    text: string;
    sourceChunkIds: string[];
    sources: SourceReference[];
    promptTokens: number;
    droppedChunks: number;
    droppedHistoryTurns: number;
}
