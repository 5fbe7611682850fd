import "dotenv/config";
import { InvalidConfigError } from "../utils/PipelineError";
import type { AIConfig, ProviderEndpointConfig } from "./types";

export const DEFAULT_LLM_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_LLM_MODEL = "llama-3.1-8b-instant";
export const DEFAULT_EMBEDDINGS_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_EMBEDDINGS_MODEL = "text-embedding-3-small";

const URL_PATTERN = /^https?:\/\/.+/;

export function loadAIConfig(env: NodeJS.ProcessEnv = process.env): AIConfig {
    const {
        LLM_API_KEY,
        GROQ_API_KEY,
        LLM_BASE_URL,
        LLM_MODEL,
        EMBEDDINGS_API_KEY,
        EMBEDDINGS_BASE_URL,
        EMBEDDINGS_MODEL,
    } = env;

    const llmApiKey = LLM_API_KEY || GROQ_API_KEY || "";

    return {
        llm: {
            apiKey: llmApiKey,
            baseURL: LLM_BASE_URL || DEFAULT_LLM_BASE_URL,
            model: LLM_MODEL || DEFAULT_LLM_MODEL,
        },
        embedding: {
            apiKey: EMBEDDINGS_API_KEY || llmApiKey,
            baseURL: EMBEDDINGS_BASE_URL || DEFAULT_EMBEDDINGS_BASE_URL,
            model: EMBEDDINGS_MODEL || DEFAULT_EMBEDDINGS_MODEL,
        },
    };
}

/**
 * Lists what is wrong with a provider endpoint; empty when usable.
 */
export function endpointIssues(
    label: string,
    endpoint: ProviderEndpointConfig
): string[] {
    const issues: string[] = [];
    if (!endpoint.apiKey) {
        issues.push(`${label} API key is not set`);
    }
    if (!URL_PATTERN.test(endpoint.baseURL)) {
        issues.push(`${label} base URL must be a valid HTTP/HTTPS URL`);
    }
    if (!endpoint.model.trim()) {
        issues.push(`${label} model must not be empty`);
    }
    return issues;
}

export class AIConfigService {
    private static instance: AIConfigService;
    private config: AIConfig;

    private constructor() {
        this.config = loadAIConfig();
    }

    public static getInstance(): AIConfigService {
        if (!AIConfigService.instance) {
            AIConfigService.instance = new AIConfigService();
        }
        return AIConfigService.instance;
    }

    /**
     * Throws InvalidConfig when either provider cannot be reached with the
     * current settings. Called once at startup.
     */
    public validate(): void {
        const issues = [
            ...endpointIssues("LLM", this.config.llm),
            ...endpointIssues("Embeddings", this.config.embedding),
        ];
        if (issues.length > 0) {
            throw new InvalidConfigError(issues);
        }
    }

    public getEmbeddingConfig(): ProviderEndpointConfig {
        return this.config.embedding;
    }

    public getLLMConfig(): ProviderEndpointConfig {
        return this.config.llm;
    }

    public hasCredentials(): boolean {
        return !!this.config.llm.apiKey && !!this.config.embedding.apiKey;
    }

    /**
     * Safe-to-print view of the provider settings.
     */
    public describe() {
        const mask = (key: string) =>
            key ? `[SET - Length: ${key.length}]` : "[NOT SET]";
        return {
            llm: {
                baseURL: this.config.llm.baseURL,
                model: this.config.llm.model,
                apiKey: mask(this.config.llm.apiKey),
            },
            embedding: {
                baseURL: this.config.embedding.baseURL,
                model: this.config.embedding.model,
                apiKey: mask(this.config.embedding.apiKey),
            },
        };
    }
}
