import type { RetrievalResult } from "../../types/document.types";
import { loggingService } from "../logging";
import { sentryMonitoringService } from "../monitoring";
import type { SearchScoreStats, VectorIndex } from "./types";

export function scoreStats(result: RetrievalResult): SearchScoreStats | null {
    if (result.length === 0) return null;
    const distances = result.map((hit) => hit.distance);
    return {
        averageDistance: distances.reduce((a, b) => a + b, 0) / distances.length,
        minDistance: Math.min(...distances),
        maxDistance: Math.max(...distances),
    };
}

export class VectorSearchService {
    private logger = loggingService.createComponentLogger("VectorSearch");

    async retrieve(
        index: VectorIndex,
        queryVector: readonly number[],
        k: number
    ): Promise<RetrievalResult> {
        return await sentryMonitoringService.track(
            "vector_search",
            "vector_search",
            {
                candidates: index.size,
                dimensions: index.dimensions,
                metric: index.metric,
                k,
            },
            async () => {
                const startTime = Date.now();
                const result = index.query(queryVector, k);

                this.logger.info(
                    `✅ Found ${result.length} of ${index.size} chunks by ${index.metric} distance in ${Date.now() - startTime}ms`
                );
                this.logDistances(result, index.metric);

                return result;
            }
        );
    }

    private logDistances(result: RetrievalResult, metric: string): void {
        const stats = scoreStats(result);
        if (!stats) return;

        const rows = result.map(({ chunk, distance }, rank) => {
            const preview = chunk.text.substring(0, 50).replace(/\n/g, " ");
            return (
                `${(rank + 1).toString().padStart(4)} | ` +
                `${distance.toFixed(3)} | ` +
                `${chunk.pageNumber.toString().padStart(4)} | ` +
                `${chunk.text.length.toString().padStart(5)} | ` +
                `${preview}...`
            );
        });

        this.logger.debug(
            [
                `📊 Distance scores (${metric}):`,
                "Rank | Dist  | Page | Chars | Content Preview",
                ...rows,
                `📈 Average: ${stats.averageDistance.toFixed(3)}, Range: ${stats.minDistance.toFixed(3)} - ${stats.maxDistance.toFixed(3)}`,
            ].join("\n")
        );
    }
}
