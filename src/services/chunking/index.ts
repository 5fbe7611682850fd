import { CharacterWiseChunkingStrategy } from "./characterWise.chunking";
import { RecursiveTextChunkingStrategy } from "./recursiveText.chunking";
import { sentryMonitoringService } from "../monitoring";
import { Config } from "../../config";
import type { ChunkingConfig } from "../../config/types";
import type { ChunkDraft, ExtractedDocument } from "../../types/document.types";
import type { ChunkingParams, ChunkingStrategy } from "./types";

/**
 * 1-based page holding `offset`, given each page's start offset.
 */
export function pageNumberAt(pageOffsets: number[], offset: number): number {
    let page = 0;
    for (let i = 0; i < pageOffsets.length; i++) {
        const pageStart = pageOffsets[i];
        if (pageStart === undefined || pageStart > offset) break;
        page = i;
    }
    return page + 1;
}

export function chunkId(documentId: string, index: number): string {
    return `${documentId}#${index}`;
}

export class ChunkingService {
    constructor(private chunkingConfig: ChunkingConfig = Config.app.getChunkingConfig()) {}

    public createStrategy(params: ChunkingParams): ChunkingStrategy {
        if (this.chunkingConfig.strategy === "recursive") {
            return new RecursiveTextChunkingStrategy({
                ...params,
                separators: this.chunkingConfig.separators,
            });
        }
        return new CharacterWiseChunkingStrategy({
            ...params,
            boundaryTolerance: this.chunkingConfig.boundaryTolerance,
        });
    }

    public async createChunks(
        document: ExtractedDocument,
        documentId: string,
        params: ChunkingParams
    ): Promise<ChunkDraft[]> {
        const strategy = this.createStrategy(params);

        return await sentryMonitoringService.track(
            `Document chunking: ${document.fileName}`,
            "chunking",
            {
                filename: document.fileName,
                pageCount: document.totalPages,
                textLength: document.fullText.length,
            },
            async () => {
                const spans = await strategy.split(document.fullText, document.fileName);

                return spans
                    .filter((span) => span.text.trim().length > 0)
                    .map((span, index) =>
                        Object.freeze({
                            id: chunkId(documentId, index),
                            text: span.text,
                            documentId,
                            fileName: document.fileName,
                            pageNumber: pageNumberAt(document.pageOffsets, span.start),
                            offset: span.start,
                        })
                    );
            },
            { strategy: strategy.name, ...params }
        );
    }
}

export * from "./base.chunking";
export * from "./characterWise.chunking";
export * from "./recursiveText.chunking";
export type * from "./types";
