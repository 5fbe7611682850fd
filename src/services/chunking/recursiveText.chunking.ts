import { RecursiveCharacterTextSplitter } from "langchain/text_splitter";
import { sentryMonitoringService } from "../monitoring";
import { InvalidConfigError } from "../../utils/PipelineError";
import { BaseChunkingStrategy } from "./base.chunking";
import { segmentParamIssues } from "./characterWise.chunking";
import type { ChunkingParams, TextSpan } from "./types";

export interface RecursiveChunkingOptions extends ChunkingParams {
    separators: string[];
}

/**
 * Boundary-aware splitting on a separator hierarchy. Overlap is best effort:
 * the splitter carries whole pieces over rather than an exact character
 * count.
 */
export class RecursiveTextChunkingStrategy extends BaseChunkingStrategy {
    readonly name = "recursive" as const;
    private textSplitter: RecursiveCharacterTextSplitter;

    constructor(private options: RecursiveChunkingOptions) {
        super();
        const issues = segmentParamIssues(options.chunkSize, options.chunkOverlap);
        if (issues.length > 0) {
            throw new InvalidConfigError(issues);
        }

        this.textSplitter = new RecursiveCharacterTextSplitter({
            chunkSize: options.chunkSize,
            chunkOverlap: options.chunkOverlap,
            separators: options.separators,
            keepSeparator: false,
        });
    }

    async split(text: string, filename: string): Promise<TextSpan[]> {
        // Only large documents are worth a span of their own
        if (text.length > 50000) {
            return await sentryMonitoringService.track(
                `Recursive chunking: ${filename}`,
                "chunking",
                {
                    filename,
                    textLength: text.length,
                    chunkSize: this.options.chunkSize,
                    chunkOverlap: this.options.chunkOverlap,
                },
                async () => await this.performChunking(text, filename)
            );
        }
        return await this.performChunking(text, filename);
    }

    private async performChunking(text: string, filename: string): Promise<TextSpan[]> {
        this.logger.debug(
            `🔄 Starting recursive text splitting for ${filename} (${text.length} characters)`
        );

        const pieces = await this.textSplitter.splitText(text);
        const spans = locatePieces(text, pieces);

        this.logChunkingStats(spans, filename);
        return spans;
    }
}

/**
 * Finds each piece in the source, scanning forward from the previous match.
 * Pieces the splitter altered are placed at the running cursor.
 */
export function locatePieces(text: string, pieces: string[]): TextSpan[] {
    const spans: TextSpan[] = [];
    let cursor = 0;

    for (const piece of pieces) {
        const found = text.indexOf(piece, cursor);
        const start = found === -1 ? Math.min(cursor, text.length) : found;
        spans.push({ text: piece, start, end: start + piece.length });
        cursor = start + 1;
    }

    return spans;
}
