export interface ProviderEndpointConfig {
    apiKey: string;
    baseURL: string;
    model: string;
}

export interface AIConfig {
    embedding: ProviderEndpointConfig;
    llm: ProviderEndpointConfig;
}

export type ChunkingStrategyName = "characterWise" | "recursive";

export type DistanceMetric = "cosine" | "euclidean";

export interface ChunkingConfig {
    strategy: ChunkingStrategyName;
    chunkSize: number;
    chunkOverlap: number;
    boundaryTolerance: number; // 0 = hard character cuts
    separators: string[]; // recursive strategy only
}

export interface EmbeddingBatchConfig {
    batchSize: number; // provider batch-size limit
    timeoutSeconds: number;
}

export interface RetryConfig {
    attempts: number; // total attempts, including the first
    baseDelayMs: number;
    maxDelayMs: number;
}

export interface QAConfig {
    topK: number;
    historyWindow: number; // prior turns offered to the prompt
    promptBudgetTokens: number;
    charsPerToken: number;
    optimizeQuery: boolean;
    llmTimeoutSeconds: number;
    distanceMetric: DistanceMetric;
}

export interface SessionConfig {
    ttlMinutes: number;
    sweepIntervalSeconds: number;
    maxUploadBytes: number;
}

export interface ServerConfig {
    port: number;
    hostname: string;
    authToken?: string;
}

export interface AppConfig {
    server: ServerConfig;
    chunking: ChunkingConfig;
    embedding: EmbeddingBatchConfig;
    retry: RetryConfig;
    qa: QAConfig;
    session: SessionConfig;
}

export interface LoggingConfig {
    enabled: boolean;
    logLevel: "debug" | "info" | "warn" | "error";
    fileLogging: boolean;
    consoleLogging: boolean;
    directory: string;
}

/**
 * The settings one session's pipeline runs with. Validated when the session
 * is opened so that nothing config-related can fail mid-query.
 */
export interface PipelineConfig {
    embeddingModel: string;
    llmModel: string;
    chunkSize: number;
    chunkOverlap: number;
    topK: number;
    apiCredential: string;
}

export interface ModelProfile {
    id: string;
    description: string;
    maxTokens: number;
    temperature: number;
}

export interface ChunkPreset {
    chunkSize: number;
    chunkOverlap: number;
}
