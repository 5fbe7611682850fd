import { loggingService } from "../logging";
import type { ChunkingStrategyName } from "../../config/types";
import type { ChunkingStats, ChunkingStrategy, TextSpan } from "./types";

export abstract class BaseChunkingStrategy implements ChunkingStrategy {
    protected logger = loggingService.createComponentLogger("Chunking");

    abstract readonly name: ChunkingStrategyName;

    abstract split(text: string, filename: string): TextSpan[] | Promise<TextSpan[]>;

    protected computeStats(spans: TextSpan[], filename: string): ChunkingStats {
        const sizes = spans.map((span) => span.text.length);
        return {
            totalChunks: spans.length,
            averageChunkSize: sizes.length
                ? Math.round(sizes.reduce((sum, size) => sum + size, 0) / sizes.length)
                : 0,
            minChunkSize: sizes.length ? Math.min(...sizes) : 0,
            maxChunkSize: sizes.length ? Math.max(...sizes) : 0,
            strategy: this.name,
            filename,
        };
    }

    protected logChunkingStats(spans: TextSpan[], filename: string): ChunkingStats {
        const stats = this.computeStats(spans, filename);

        this.logger.info(`📦 Created ${stats.totalChunks} ${this.name} chunks for ${filename}`);
        this.logger.debug(
            `📊 ${this.name} statistics - Average: ${stats.averageChunkSize} chars, Min: ${stats.minChunkSize} chars, Max: ${stats.maxChunkSize} chars`
        );

        return stats;
    }
}
