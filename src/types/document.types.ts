export type DocumentFormat = "pdf" | "text";

export interface ExtractedDocument {
    fileName: string;
    format: DocumentFormat;
    fullText: string;
    pageTexts: string[];
    totalPages: number;
    pageOffsets: number[]; // start of each page within fullText
}

export interface DocumentInfo {
    documentId: string;
    fileName: string;
    format: DocumentFormat;
    totalPages: number;
    characterCount: number;
    byteLength: number;
}

/**
 * A chunk before it has been embedded.
 */
export interface ChunkDraft {
    readonly id: string;
    readonly text: string;
    readonly documentId: string;
    readonly fileName: string;
    readonly pageNumber: number;
    readonly offset: number;
}

export interface Chunk extends ChunkDraft {
    readonly embedding: readonly number[];
}

export interface RetrievedChunk {
    chunk: Chunk;
    distance: number;
}

/** Ascending distance, at most K entries, no duplicate chunk ids. */
export type RetrievalResult = readonly RetrievedChunk[];

export interface SourceReference {
    chunkId: string;
    label: string;
    snippet: string;
}

export interface ConversationTurn {
    readonly query: string;
    readonly answer: string;
    readonly sourceChunkIds: readonly string[];
    readonly sources: readonly SourceReference[];
    readonly createdAt: string;
}

export type DocumentSource = AsyncIterable<Uint8Array> | ReadableStream<Uint8Array>;
