import OpenAI from "openai";
import { Config } from "../../config";
import type { ProviderEndpointConfig } from "../../config/types";
import { loggingService } from "../logging";
import type { EmbedBatchOptions, EmbeddingProvider } from "./types";

/**
 * Embeddings over any OpenAI-compatible `/embeddings` endpoint. Retries and
 * timeouts belong to the caller, so the SDK's own are switched off.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    readonly name = "openai-compatible";
    private client: OpenAI;
    private logger = loggingService.createComponentLogger("EmbeddingProvider");

    constructor(config: ProviderEndpointConfig = Config.ai.getEmbeddingConfig()) {
        this.client = new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            maxRetries: 0,
        });

        this.logger.debug("Embedding client initialized", {
            baseURL: config.baseURL,
            model: config.model,
        });
    }

    async embedBatch(texts: string[], { model, signal }: EmbedBatchOptions): Promise<number[][]> {
        const response = await this.client.embeddings.create(
            { model, input: texts, encoding_format: "float" },
            { signal }
        );

        this.logger.debug("Embedding batch returned", {
            model,
            inputs: texts.length,
            vectors: response.data.length,
            tokensUsed: response.usage?.total_tokens,
        });

        // Providers are allowed to answer out of order
        return [...response.data]
            .sort((a, b) => a.index - b.index)
            .map((item) => item.embedding);
    }
}
