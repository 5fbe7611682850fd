import { extractText } from "unpdf";
import { loggingService } from "../logging";
import { sentryMonitoringService } from "../monitoring";
import { PipelineError, UnreadableDocumentError } from "../../utils/PipelineError";
import type { DocumentFormat } from "../../types/document.types";
import type { ExtractionResult } from "./types";

const PDF_SIGNATURE = [0x25, 0x50, 0x44, 0x46]; // %PDF
const PAGE_SEPARATOR = "\n\n";

export function isPDF(bytes: Uint8Array): boolean {
    return PDF_SIGNATURE.every((byte, i) => bytes[i] === byte);
}

/**
 * Decodes bytes as UTF-8 text. Returns null for anything that is not valid
 * UTF-8 or that carries NUL bytes.
 */
export function decodeText(bytes: Uint8Array): string | null {
    try {
        const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
        return text.includes("\u0000") ? null : text.replace(/^\uFEFF/, "");
    } catch {
        return null;
    }
}

export function joinPages(pageTexts: string[]): { fullText: string; pageOffsets: number[] } {
    const pageOffsets: number[] = [];
    let offset = 0;
    for (const page of pageTexts) {
        pageOffsets.push(offset);
        offset += page.length + PAGE_SEPARATOR.length;
    }
    return { fullText: pageTexts.join(PAGE_SEPARATOR), pageOffsets };
}

export class TextExtractionService {
    private logger = loggingService.createComponentLogger("TextExtraction");

    async extract(bytes: Uint8Array, fileName: string): Promise<ExtractionResult> {
        const format: DocumentFormat = isPDF(bytes) ? "pdf" : "text";

        return await sentryMonitoringService.track(
            "document_text_extraction",
            "extraction",
            {
                filename: fileName,
                format,
                file_size_bytes: bytes.length,
                file_size_mb: (bytes.length / 1024 / 1024).toFixed(2),
            },
            async () => {
                this.logger.info(`📄 Extracting text from ${fileName}`, { format });
                const startTime = Date.now();

                const pageTexts =
                    format === "pdf"
                        ? await this.extractPDFPages(bytes, fileName)
                        : this.extractTextPages(bytes, fileName);

                const { fullText, pageOffsets } = joinPages(pageTexts);
                if (!fullText.trim()) {
                    throw new UnreadableDocumentError(fileName, "No text content found");
                }

                const extractionTime = Date.now() - startTime;
                const totalPages = pageTexts.length;
                const performance = {
                    pages_per_second:
                        extractionTime > 0 ? (totalPages / extractionTime) * 1000 : 0,
                    characters_extracted: fullText.length,
                    average_chars_per_page: totalPages > 0 ? fullText.length / totalPages : 0,
                };

                this.logger.info(
                    `✅ Extracted ${fullText.length} characters from ${fileName} (${totalPages} pages)`,
                    { extractionTime }
                );

                return {
                    fileName,
                    format,
                    fullText,
                    pageTexts,
                    totalPages,
                    pageOffsets,
                    extractionTime,
                    performance,
                };
            },
            { provider: format === "pdf" ? "unpdf" : "utf-8" }
        );
    }

    private async extractPDFPages(bytes: Uint8Array, fileName: string): Promise<string[]> {
        try {
            // unpdf transfers the buffer to its worker, so hand it a copy
            const result = await extractText(new Uint8Array(bytes), { mergePages: false });
            return Array.isArray(result.text) ? result.text : [result.text];
        } catch (error) {
            if (error instanceof PipelineError) throw error;
            this.logger.error(`Error extracting text from PDF ${fileName}`, {
                error: error instanceof Error ? error.message : String(error),
            });
            throw new UnreadableDocumentError(
                fileName,
                `Failed to extract text from PDF: ${
                    error instanceof Error ? error.message : "Unknown error"
                }`,
                error
            );
        }
    }

    private extractTextPages(bytes: Uint8Array, fileName: string): string[] {
        const text = decodeText(bytes);
        if (text === null) {
            throw new UnreadableDocumentError(
                fileName,
                "Unsupported file type; upload a PDF or a UTF-8 text document"
            );
        }
        return [text];
    }
}
