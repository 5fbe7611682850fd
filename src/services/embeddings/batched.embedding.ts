import type { RetryConfig } from "../../config/types";
import { loggingService } from "../logging";
import { sentryMonitoringService } from "../monitoring";
import { classifyProviderError, isRetryableProviderError } from "../../utils/providerErrors";
import { EmbeddingUnavailableError, PipelineError } from "../../utils/PipelineError";
import { RetryExhaustedError, withRetry } from "../../utils/retry";
import { withTimeout } from "../../utils/withTimeout";
import type { Embedder, EmbeddingProvider, EmbeddingStats } from "./types";

export function chunkArray<T>(array: T[], chunkSize: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += chunkSize) {
        chunks.push(array.slice(i, i + chunkSize));
    }
    return chunks;
}

export interface BatchedEmbeddingOptions {
    model: string;
    batchSize: number;
    timeoutSeconds: number;
    retry: RetryConfig;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Splits inputs into provider-sized batches and embeds them one batch at a
 * time, each under its own timeout and retry budget.
 */
export class BatchedEmbeddingService implements Embedder {
    private logger = loggingService.createComponentLogger("BatchedEmbedding");
    private stats: EmbeddingStats = {
        requestedTexts: 0,
        providerCalls: 0,
        retries: 0,
        failures: 0,
    };

    constructor(
        private provider: EmbeddingProvider,
        private options: BatchedEmbeddingOptions
    ) {}

    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        this.stats.requestedTexts += texts.length;
        const { batchSize, model } = this.options;

        return await sentryMonitoringService.track(
            "embeddings_generation",
            "embedding",
            {
                text_count: texts.length,
                batch_size: batchSize,
                model,
                provider: this.provider.name,
            },
            async () => {
                const batches = chunkArray(texts, batchSize);
                const startTime = Date.now();
                const vectors: number[][] = [];

                this.logger.info(
                    `🔄 Generating ${texts.length} embeddings in ${batches.length} batch(es) of up to ${batchSize}`
                );

                for (const [batchIndex, batch] of batches.entries()) {
                    vectors.push(...(await this.embedOneBatch(batch, batchIndex)));
                }

                this.assertConsistentDimensions(vectors);

                this.logger.info(
                    `✅ Generated ${vectors.length} embeddings (${vectors[0]?.length ?? 0} dimensions) in ${Date.now() - startTime}ms`
                );
                return vectors;
            }
        );
    }

    private async embedOneBatch(batch: string[], batchIndex: number): Promise<number[][]> {
        const { model, timeoutSeconds, retry, sleep } = this.options;

        try {
            return await withRetry(
                async () => {
                    this.stats.providerCalls++;
                    const vectors = await withTimeout(
                        (signal) => this.provider.embedBatch(batch, { model, signal }),
                        timeoutSeconds * 1000,
                        `embedding batch ${batchIndex + 1}`
                    );

                    if (vectors.length !== batch.length) {
                        throw new EmbeddingUnavailableError(
                            "unknown",
                            1,
                            new Error(
                                `Provider returned ${vectors.length} vectors for ${batch.length} inputs`
                            )
                        );
                    }
                    return vectors;
                },
                {
                    ...retry,
                    sleep,
                    shouldRetry: (error) =>
                        !(error instanceof PipelineError) && isRetryableProviderError(error),
                    onRetry: (error, attempt, delayMs) => {
                        this.stats.retries++;
                        this.logger.warn(
                            `Embedding batch ${batchIndex + 1} failed (attempt ${attempt}/${retry.attempts}), retrying in ${delayMs}ms`,
                            { error: error instanceof Error ? error.message : String(error) }
                        );
                    },
                }
            );
        } catch (error) {
            this.stats.failures++;
            const cause = error instanceof RetryExhaustedError ? error.cause : error;
            const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;

            if (cause instanceof PipelineError) throw cause;

            const hint = classifyProviderError(cause);
            this.logger.error(`Embedding batch ${batchIndex + 1} failed`, {
                hint,
                attempts,
                error: cause instanceof Error ? cause.message : String(cause),
            });
            throw new EmbeddingUnavailableError(hint, attempts, cause);
        }
    }

    private assertConsistentDimensions(vectors: number[][]): void {
        const expected = vectors[0]?.length ?? 0;
        const position = vectors.findIndex((vector) => vector.length !== expected);

        if (expected === 0 || position !== -1) {
            this.stats.failures++;
            throw new EmbeddingUnavailableError(
                "unknown",
                1,
                new Error(
                    expected === 0
                        ? "Provider returned empty vectors"
                        : `Provider returned vectors of inconsistent dimensionality (${expected} vs ${vectors[position]?.length} at ${position})`
                )
            );
        }
    }

    getStats(): EmbeddingStats {
        return { ...this.stats };
    }
}
