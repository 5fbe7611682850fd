import { createHash } from "crypto";
import { sentryMonitoringService } from "../monitoring";
import { loggingService } from "../logging";
import { TextExtractionService } from "../extraction";
import { ChunkingService } from "../chunking";
import { InMemoryVectorIndex } from "../search";
import type { Embedder } from "../embeddings/types";
import { UnreadableDocumentError } from "../../utils/PipelineError";
import type { IngestionRequest, IngestionResult } from "./types";

/**
 * Same bytes, same id; chunk ids derive from it.
 */
export function documentIdFor(bytes: Uint8Array): string {
    return createHash("sha256").update(bytes).digest("hex").substring(0, 16);
}

export class DocumentProcessingService {
    private logger = loggingService.createComponentLogger("DocumentProcessing");

    constructor(
        private embedder: Embedder,
        private textExtractionService: TextExtractionService = new TextExtractionService(),
        private chunkingService: ChunkingService = new ChunkingService()
    ) {}

    /**
     * Extract, chunk, embed, index. The index only exists once every step
     * has succeeded.
     */
    async ingest({ bytes, fileName, chunking, metric }: IngestionRequest): Promise<IngestionResult> {
        return await sentryMonitoringService.track(
            `Document ingestion: ${fileName}`,
            "ingestion",
            {
                filename: fileName,
                file_size_bytes: bytes.length,
                chunk_size: chunking.chunkSize,
                chunk_overlap: chunking.chunkOverlap,
            },
            async () => {
                const startTime = Date.now();
                const documentId = documentIdFor(bytes);

                const extracted = await this.textExtractionService.extract(bytes, fileName);
                const extractedAt = Date.now();

                const drafts = await this.chunkingService.createChunks(
                    extracted,
                    documentId,
                    chunking
                );
                if (drafts.length === 0) {
                    throw new UnreadableDocumentError(fileName, "No text content found");
                }
                const chunkedAt = Date.now();

                const embeddings = await this.embedder.embed(drafts.map((draft) => draft.text));
                const embeddedAt = Date.now();

                const index = InMemoryVectorIndex.build(drafts, embeddings, metric);
                const summary = `Created ${drafts.length} chunks from ${fileName}`;

                const metrics = {
                    extractionTime: extractedAt - startTime,
                    chunkingTime: chunkedAt - extractedAt,
                    embeddingTime: embeddedAt - chunkedAt,
                    totalTime: Date.now() - startTime,
                    chunksGenerated: drafts.length,
                };
                this.logger.info(`📊 ${summary}`, { documentId, ...metrics });

                return {
                    index,
                    document: {
                        documentId,
                        fileName,
                        format: extracted.format,
                        totalPages: extracted.totalPages,
                        characterCount: extracted.fullText.length,
                        byteLength: bytes.length,
                    },
                    chunkCount: drafts.length,
                    metrics,
                    summary,
                };
            }
        );
    }
}
