import { loadAIConfig } from "../config/ai.config";
import { loadAppConfig } from "../config/app.config";
import type { AppConfig, ChunkingConfig } from "../config/types";
import { ChunkingService } from "../services/chunking";
import { BatchedEmbeddingService } from "../services/embeddings";
import type { EmbedBatchOptions, EmbeddingProvider } from "../services/embeddings/types";
import { TextExtractionService } from "../services/extraction";
import type { GenerationSettings, LLMProvider } from "../services/LLM/types";
import { DocumentProcessingService } from "../services/processing";
import { QAService } from "../services/qa";
import { VectorSearchService } from "../services/search";
import { SessionManager } from "../services/session";
import type { SessionPipeline } from "../services/session/types";

export const VOCABULARY = ["paris", "capital", "france", "population", "million", "lyon"];

export const PARIS_TEXT =
    "Paris is the capital of France. It has a population of over 2 million.";

/**
 * Counts of each vocabulary word; enough to make retrieval predictable.
 */
export function bagOfWords(text: string): number[] {
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    return VOCABULARY.map((term) => words.filter((word) => word === term).length);
}

export class Gate {
    private release: () => void = () => {};
    readonly opened: Promise<void>;

    constructor() {
        this.opened = new Promise<void>((resolve) => {
            this.release = resolve;
        });
    }

    open(): void {
        this.release();
    }
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
    readonly name = "fake";
    calls: string[][] = [];
    failuresRemaining = 0;
    failure: Error = new Error("fetch failed");
    gate: Gate | null = null;

    async embedBatch(texts: string[], _options: EmbedBatchOptions): Promise<number[][]> {
        this.calls.push(texts);
        if (this.gate) await this.gate.opened;
        if (this.failuresRemaining > 0) {
            this.failuresRemaining--;
            throw this.failure;
        }
        return texts.map(bagOfWords);
    }
}

export interface RecordedPrompt {
    systemPrompt: string;
    userMessage: string;
    settings: GenerationSettings;
}

export class FakeLLM implements LLMProvider {
    prompts: RecordedPrompt[] = [];
    failure: Error | null = null;

    async generateResponse(
        systemPrompt: string,
        userMessage: string,
        settings: GenerationSettings
    ): Promise<string> {
        this.prompts.push({ systemPrompt, userMessage, settings });
        if (this.failure) throw this.failure;
        return userMessage.includes("Paris")
            ? "Paris is the capital of France."
            : "I don't know.";
    }
}

export const testChunkingConfig = (overrides: Partial<ChunkingConfig> = {}): ChunkingConfig => ({
    strategy: "characterWise",
    chunkSize: 600,
    chunkOverlap: 80,
    boundaryTolerance: 0,
    separators: ["\n\n", "\n", ". ", "! ", "? ", " ", ""],
    ...overrides,
});

export const noRetryDelay = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

export function createFakePipeline() {
    const provider = new FakeEmbeddingProvider();
    const llm = new FakeLLM();
    const embedder = new BatchedEmbeddingService(provider, {
        model: "fake-embedding",
        batchSize: 2,
        timeoutSeconds: 5,
        retry: noRetryDelay,
    });

    const pipeline: SessionPipeline = {
        processor: new DocumentProcessingService(
            embedder,
            new TextExtractionService(),
            new ChunkingService(testChunkingConfig())
        ),
        embedder,
        retriever: new VectorSearchService(),
        answerer: new QAService(llm, { budgetTokens: 3000, charsPerToken: 4, historyWindow: 3 }),
    };

    return { provider, llm, embedder, pipeline };
}

export function testAppConfig(env: Record<string, string | undefined> = {}): AppConfig {
    return loadAppConfig(env);
}

export function createTestSessionManager(
    options: { now?: () => number; env?: Record<string, string | undefined> } = {}
) {
    const fake = createFakePipeline();
    let sequence = 0;

    const sessions = new SessionManager({
        app: testAppConfig(options.env),
        ai: loadAIConfig({ LLM_API_KEY: "test-secret" }),
        createPipeline: () => fake.pipeline,
        generateId: () => `session-${++sequence}`,
        now: options.now,
    });

    return { sessions, ...fake };
}

export const encode = (text: string) => new TextEncoder().encode(text);
