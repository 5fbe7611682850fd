import type {
    ConversationTurn,
    DocumentInfo,
    DocumentSource,
    RetrievalResult,
} from "../../types/document.types";
import {
    EmptyContextError,
    SessionBusyError,
    SessionClosedError,
} from "../../utils/PipelineError";
import { QueryCleaningService } from "../cleaning";
import { readDocumentBytes } from "../extraction";
import { loggingService } from "../logging";
import { distinctSourceLabels } from "../qa";
import type { IngestionResult } from "../processing/types";
import type { Answer } from "../qa/types";
import type { VectorIndex } from "../search/types";
import type {
    ChatStats,
    IngestionSummary,
    QueryResult,
    SessionOperation,
    SessionPipeline,
    SessionSettings,
    SessionSnapshot,
    SessionState,
} from "./types";

/**
 * One user's conversation over one document at a time.
 *
 * Operations never overlap: anything submitted while another operation is in
 * flight fails with SessionBusy. A failed operation leaves the index, the
 * document and the history exactly as they were.
 */
export class ChatSession {
    private state: SessionState = "Empty";
    private index: VectorIndex | null = null;
    private document: DocumentInfo | null = null;
    private history: ConversationTurn[] = [];
    private activeOperation: SessionOperation | null = null;
    private lastActivity: number;
    private logger = loggingService.createComponentLogger("ChatSession");

    readonly createdAt: number;

    constructor(
        readonly id: string,
        readonly settings: SessionSettings,
        private pipeline: SessionPipeline,
        private now: () => number = Date.now
    ) {
        this.createdAt = now();
        this.lastActivity = this.createdAt;
    }

    getState(): SessionState {
        return this.state;
    }

    isBusy(): boolean {
        return this.activeOperation !== null;
    }

    isClosed(): boolean {
        return this.state === "Closed";
    }

    getLastActivity(): number {
        return this.lastActivity;
    }

    getHistory(): readonly ConversationTurn[] {
        return [...this.history];
    }

    async ingest(source: Uint8Array | DocumentSource, fileName: string): Promise<IngestionSummary> {
        this.begin("document ingestion");
        const previousState = this.state;
        this.state = "Ingesting";
        const { pipeline, metric, maxUploadBytes } = this.settings;

        let result: IngestionResult;
        try {
            const bytes =
                source instanceof Uint8Array
                    ? source
                    : await readDocumentBytes(source, fileName, maxUploadBytes);

            result = await this.pipeline.processor.ingest({
                bytes,
                fileName,
                chunking: { chunkSize: pipeline.chunkSize, chunkOverlap: pipeline.chunkOverlap },
                metric,
            });
        } catch (error) {
            this.restore(previousState);
            throw this.isClosed() ? new SessionClosedError(this.id) : error;
        } finally {
            this.end();
        }

        if (this.isClosed()) {
            result.index.release();
            throw new SessionClosedError(this.id);
        }

        const previousIndex = this.index;
        this.index = result.index;
        this.document = result.document;
        // A new document starts a new conversation
        this.history = [];
        this.state = "Indexed";
        previousIndex?.release();

        this.logger.info(`📚 Session ${this.id} indexed ${result.document.fileName}`, {
            chunkCount: result.chunkCount,
            documentId: result.document.documentId,
        });

        return {
            document: result.document,
            chunkCount: result.chunkCount,
            message: result.summary,
            processingTime: result.metrics.totalTime,
        };
    }

    async ask(query: string): Promise<QueryResult> {
        this.assertOpen();
        this.assertIdle();

        const index = this.index;
        if (!index && this.history.length === 0) {
            this.touch();
            throw new EmptyContextError();
        }

        this.begin("query");
        const previousState = this.state;
        this.state = "Answering";
        const { pipeline, generation, optimizeQuery } = this.settings;
        const optimizedQuery = optimizeQuery ? QueryCleaningService.optimize(query) : query.trim();
        const history = [...this.history];

        let retrieval: RetrievalResult;
        let answer: Answer;
        try {
            if (index) {
                const [queryVector] = await this.pipeline.embedder.embed([optimizedQuery]);
                retrieval = queryVector
                    ? await this.pipeline.retriever.retrieve(index, queryVector, pipeline.topK)
                    : [];
            } else {
                retrieval = [];
            }

            answer = await this.pipeline.answerer.answer({
                query: optimizedQuery,
                retrieval,
                history,
                generation,
            });
        } catch (error) {
            this.restore(previousState);
            throw this.isClosed() ? new SessionClosedError(this.id) : error;
        } finally {
            this.end();
        }

        if (this.isClosed()) {
            throw new SessionClosedError(this.id);
        }

        const turn: ConversationTurn = Object.freeze({
            query,
            answer: answer.text,
            sourceChunkIds: Object.freeze([...answer.sourceChunkIds]),
            sources: Object.freeze(answer.sources.map((source) => Object.freeze({ ...source }))),
            createdAt: new Date(this.now()).toISOString(),
        });
        this.history.push(turn);
        this.state = previousState;

        return {
            turn,
            optimizedQuery,
            retrievedChunks: retrieval.length,
            sourceLabels: distinctSourceLabels(answer.sources),
            promptTokens: answer.promptTokens,
        };
    }

    clearHistory(): number {
        this.assertOpen();
        this.assertIdle();
        this.touch();

        const cleared = this.history.length;
        this.history = [];
        return cleared;
    }

    /**
     * Releases the index. An operation still in flight runs to completion
     * but its result is thrown away.
     */
    close(): void {
        if (this.isClosed()) return;

        this.index?.release();
        this.index = null;
        this.document = null;
        this.history = [];
        this.state = "Closed";

        this.logger.info(`🧹 Session ${this.id} closed`);
    }

    getStats(): ChatStats {
        return {
            messages: this.history.length * 2,
            turns: this.history.length,
            chunkCount: this.index?.size ?? 0,
            currentDocument: this.document?.fileName ?? null,
        };
    }

    snapshot(): SessionSnapshot {
        const { pipeline } = this.settings;
        return {
            id: this.id,
            state: this.state,
            model: pipeline.llmModel,
            topK: pipeline.topK,
            chunkSize: pipeline.chunkSize,
            chunkOverlap: pipeline.chunkOverlap,
            document: this.document,
            history: this.getHistory(),
            stats: this.getStats(),
            createdAt: new Date(this.createdAt).toISOString(),
            lastActivityAt: new Date(this.lastActivity).toISOString(),
        };
    }

    private begin(operation: SessionOperation): void {
        this.assertOpen();
        this.assertIdle();
        this.activeOperation = operation;
        this.touch();
    }

    private end(): void {
        this.activeOperation = null;
        this.touch();
    }

    private restore(previousState: SessionState): void {
        if (!this.isClosed()) {
            this.state = previousState;
        }
    }

    private touch(): void {
        this.lastActivity = this.now();
    }

    private assertOpen(): void {
        if (this.isClosed()) {
            throw new SessionClosedError(this.id);
        }
    }

    private assertIdle(): void {
        if (this.activeOperation) {
            throw new SessionBusyError(this.id, this.activeOperation);
        }
    }
}
