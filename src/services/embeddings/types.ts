export interface EmbedBatchOptions {
    model: string;
    signal?: AbortSignal;
}

/**
 * A hosted embedding endpoint. One call embeds one batch; the returned
 * vectors line up with `texts`.
 */
export interface EmbeddingProvider {
    readonly name: string;
    embedBatch(texts: string[], options: EmbedBatchOptions): Promise<number[][]>;
}

/**
 * Turns any number of texts into vectors of one fixed dimension.
 */
export interface Embedder {
    embed(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingStats {
    requestedTexts: number;
    providerCalls: number;
    retries: number;
    failures: number;
}
