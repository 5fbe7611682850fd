import "dotenv/config";
import { InvalidConfigError } from "../utils/PipelineError";
import type {
    AppConfig,
    ChunkingConfig,
    ChunkingStrategyName,
    DistanceMetric,
    EmbeddingBatchConfig,
    QAConfig,
    RetryConfig,
    ServerConfig,
} from "./types";

const intFrom = (value: string | undefined, fallback: number): number => {
    if (value === undefined || value.trim() === "") return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : Number.NaN;
};

const flagFrom = (value: string | undefined, fallback: boolean): boolean =>
    value === undefined || value === "" ? fallback : value !== "false";

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const strategy: ChunkingStrategyName =
        env.CHUNKING_STRATEGY === "recursive" ? "recursive" : "characterWise";
    const distanceMetric: DistanceMetric =
        env.VECTOR_DISTANCE_METRIC === "euclidean" ? "euclidean" : "cosine";

    return {
        server: {
            port: intFrom(env.PORT, 3000),
            hostname: env.HOST || "0.0.0.0",
            authToken: env.APP_AUTH_TOKEN || undefined,
        },
        chunking: {
            strategy,
            chunkSize: intFrom(env.CHUNK_SIZE, 600),
            chunkOverlap: intFrom(env.CHUNK_OVERLAP, 80),
            boundaryTolerance: intFrom(env.CHUNK_BOUNDARY_TOLERANCE, 0),
            separators: ["\n\n", "\n", ". ", "! ", "? ", " ", ""],
        },
        embedding: {
            batchSize: intFrom(env.EMBEDDINGS_BATCH_SIZE, 64),
            timeoutSeconds: intFrom(env.EMBEDDINGS_TIMEOUT_SECONDS, 30),
        },
        retry: {
            attempts: intFrom(env.PROVIDER_RETRY_ATTEMPTS, 3),
            baseDelayMs: intFrom(env.PROVIDER_RETRY_BASE_DELAY_MS, 500),
            maxDelayMs: intFrom(env.PROVIDER_RETRY_MAX_DELAY_MS, 8000),
        },
        qa: {
            topK: intFrom(env.QA_TOP_K, 2),
            historyWindow: intFrom(env.QA_HISTORY_WINDOW, 3),
            promptBudgetTokens: intFrom(env.QA_PROMPT_BUDGET_TOKENS, 3000),
            charsPerToken: 4,
            optimizeQuery: flagFrom(env.QA_OPTIMIZE_QUERY, true),
            llmTimeoutSeconds: intFrom(env.LLM_TIMEOUT_SECONDS, 30),
            distanceMetric,
        },
        session: {
            ttlMinutes: intFrom(env.SESSION_TTL_MINUTES, 60),
            sweepIntervalSeconds: intFrom(env.SESSION_SWEEP_INTERVAL_SECONDS, 60),
            maxUploadBytes: intFrom(env.MAX_UPLOAD_MB, 20) * 1024 * 1024,
        },
    };
}

const isPositiveInt = (value: number) => Number.isInteger(value) && value > 0;
const isNonNegativeInt = (value: number) => Number.isInteger(value) && value >= 0;

export function appConfigIssues(config: AppConfig): string[] {
    const issues: string[] = [];
    const { server, chunking, embedding, retry, qa, session } = config;

    if (!isPositiveInt(server.port)) issues.push("PORT must be a positive integer");
    if (!isPositiveInt(chunking.chunkSize)) {
        issues.push("CHUNK_SIZE must be a positive integer");
    }
    if (!isNonNegativeInt(chunking.chunkOverlap)) {
        issues.push("CHUNK_OVERLAP must be a non-negative integer");
    } else if (chunking.chunkOverlap >= chunking.chunkSize) {
        issues.push("CHUNK_OVERLAP must be smaller than CHUNK_SIZE");
    }
    if (!isNonNegativeInt(chunking.boundaryTolerance)) {
        issues.push("CHUNK_BOUNDARY_TOLERANCE must be a non-negative integer");
    }
    if (!isPositiveInt(embedding.batchSize)) {
        issues.push("EMBEDDINGS_BATCH_SIZE must be a positive integer");
    }
    if (!(embedding.timeoutSeconds > 0)) {
        issues.push("EMBEDDINGS_TIMEOUT_SECONDS must be positive");
    }
    if (!isPositiveInt(retry.attempts)) {
        issues.push("PROVIDER_RETRY_ATTEMPTS must be a positive integer");
    }
    if (!isNonNegativeInt(retry.baseDelayMs) || !isNonNegativeInt(retry.maxDelayMs)) {
        issues.push("Retry delays must be non-negative integers");
    }
    if (!isPositiveInt(qa.topK)) issues.push("QA_TOP_K must be a positive integer");
    if (!isNonNegativeInt(qa.historyWindow)) {
        issues.push("QA_HISTORY_WINDOW must be a non-negative integer");
    }
    if (!isPositiveInt(qa.promptBudgetTokens)) {
        issues.push("QA_PROMPT_BUDGET_TOKENS must be a positive integer");
    }
    if (!(qa.llmTimeoutSeconds > 0)) issues.push("LLM_TIMEOUT_SECONDS must be positive");
    if (!(session.ttlMinutes > 0)) issues.push("SESSION_TTL_MINUTES must be positive");
    if (!(session.sweepIntervalSeconds > 0)) {
        issues.push("SESSION_SWEEP_INTERVAL_SECONDS must be positive");
    }
    if (!isPositiveInt(session.maxUploadBytes)) {
        issues.push("MAX_UPLOAD_MB must be a positive integer");
    }

    return issues;
}

export class AppConfigService {
    private static instance: AppConfigService;
    private config: AppConfig;

    private constructor() {
        this.config = loadAppConfig();
    }

    public static getInstance(): AppConfigService {
        if (!AppConfigService.instance) {
            AppConfigService.instance = new AppConfigService();
        }
        return AppConfigService.instance;
    }

    public validate(): void {
        const issues = appConfigIssues(this.config);
        if (issues.length > 0) {
            throw new InvalidConfigError(issues);
        }
    }

    public getConfig(): AppConfig {
        return this.config;
    }

    public getServerConfig(): ServerConfig {
        return this.config.server;
    }

    public getChunkingConfig(): ChunkingConfig {
        return this.config.chunking;
    }

    public getEmbeddingConfig(): EmbeddingBatchConfig {
        return this.config.embedding;
    }

    public getRetryConfig(): RetryConfig {
        return this.config.retry;
    }

    public getQAConfig(): QAConfig {
        return this.config.qa;
    }
}
