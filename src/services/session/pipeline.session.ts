import { Config } from "../../config";
import type { PipelineConfig } from "../../config/types";
import { BatchedEmbeddingService, OpenAIEmbeddingProvider } from "../embeddings";
import { LLMService, OpenAIChatProvider } from "../LLM";
import { DocumentProcessingService } from "../processing";
import { QAService } from "../qa";
import { VectorSearchService } from "../search";
import type { SessionPipeline, SessionSettings } from "./types";

/**
 * Wires the hosted providers for one session from the process configuration.
 */
export function createProviderPipeline(config: PipelineConfig, settings: SessionSettings): SessionPipeline {
    const appConfig = Config.app;
    const retry = appConfig.getRetryConfig();
    const qaConfig = appConfig.getQAConfig();
    const embeddingBatch = appConfig.getEmbeddingConfig();

    const embedder = new BatchedEmbeddingService(
        new OpenAIEmbeddingProvider({
            ...Config.ai.getEmbeddingConfig(),
            model: config.embeddingModel,
        }),
        {
            model: config.embeddingModel,
            batchSize: embeddingBatch.batchSize,
            timeoutSeconds: embeddingBatch.timeoutSeconds,
            retry,
        }
    );

    const llm = new LLMService(
        new OpenAIChatProvider({
            ...Config.ai.getLLMConfig(),
            apiKey: config.apiCredential,
            model: settings.generation.model,
        }),
        { timeoutSeconds: qaConfig.llmTimeoutSeconds, retry }
    );

    return {
        processor: new DocumentProcessingService(embedder),
        embedder,
        retriever: new VectorSearchService(),
        answerer: new QAService(llm, {
            budgetTokens: qaConfig.promptBudgetTokens,
            charsPerToken: qaConfig.charsPerToken,
            historyWindow: qaConfig.historyWindow,
        }),
    };
}
