import type { ExtractedDocument } from "../../types/document.types";

export interface ExtractionPerformance {
    pages_per_second: number;
    characters_extracted: number;
    average_chars_per_page: number;
}

export interface ExtractionResult extends ExtractedDocument {
    extractionTime: number;
    performance: ExtractionPerformance;
}
