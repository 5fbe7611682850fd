import { InvalidConfigError } from "../../utils/PipelineError";
import { BaseChunkingStrategy } from "./base.chunking";
import type { ChunkingParams, SegmentOptions, TextSpan } from "./types";

export function segmentParamIssues(chunkSize: number, overlap: number): string[] {
    const issues: string[] = [];
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        issues.push(`chunkSize must be a positive integer (got ${chunkSize})`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
        issues.push(`overlap must be a non-negative integer (got ${overlap})`);
    } else if (overlap >= chunkSize) {
        issues.push(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
    }
    return issues;
}

/**
 * Strength of a cut placed before `text[position]`: 2 after a sentence end or
 * newline, 1 between words, 0 inside a word.
 */
function boundaryStrength(text: string, position: number): number {
    const before = text[position - 1];
    if (before === "\n") return 2;
    if (before === " " && /[.!?]/.test(text[position - 2] ?? "")) return 2;
    if (before === " " || text[position] === " " || text[position] === "\n") return 1;
    return 0;
}

/**
 * Where to end the window `[start, end)`. Only positions past
 * `start + overlap` qualify so the next window always moves forward.
 */
export function findCut(
    text: string,
    start: number,
    end: number,
    overlap: number,
    tolerance: number
): number {
    if (tolerance <= 0 || end >= text.length) return end;

    const lowest = Math.max(end - tolerance, start + overlap + 1);
    for (const wanted of [2, 1]) {
        for (let position = end; position >= lowest; position--) {
            if (boundaryStrength(text, position) >= wanted) return position;
        }
    }
    return end;
}

/**
 * Overlapping windows over `text`. Each window after the first starts exactly
 * `overlap` characters before the previous one ended, so dropping those
 * characters and concatenating gives back the input. The returned iterable
 * can be walked any number of times.
 */
export function segmentSpans(
    text: string,
    chunkSize: number,
    overlap: number,
    options: SegmentOptions = {}
): Iterable<TextSpan> {
    const issues = segmentParamIssues(chunkSize, overlap);
    if (issues.length > 0) {
        throw new InvalidConfigError(issues);
    }
    const tolerance = options.boundaryTolerance ?? 0;
    if (!Number.isInteger(tolerance) || tolerance < 0) {
        throw new InvalidConfigError([
            `boundaryTolerance must be a non-negative integer (got ${tolerance})`,
        ]);
    }

    return {
        *[Symbol.iterator]() {
            let start = 0;
            while (start < text.length) {
                const hardEnd = Math.min(start + chunkSize, text.length);
                const end = findCut(text, start, hardEnd, overlap, tolerance);

                yield { text: text.slice(start, end), start, end };

                if (end >= text.length) return;
                start = end - overlap;
            }
        },
    };
}

export function segment(
    text: string,
    chunkSize: number,
    overlap: number,
    options: SegmentOptions = {}
): Iterable<string> {
    const spans = segmentSpans(text, chunkSize, overlap, options);
    return {
        *[Symbol.iterator]() {
            for (const span of spans) yield span.text;
        },
    };
}

export interface CharacterWiseConfig extends ChunkingParams {
    boundaryTolerance: number;
}

export class CharacterWiseChunkingStrategy extends BaseChunkingStrategy {
    readonly name = "characterWise" as const;

    constructor(private config: CharacterWiseConfig) {
        super();
    }

    split(text: string, filename: string): TextSpan[] {
        const { chunkSize, chunkOverlap, boundaryTolerance } = this.config;
        const spans = [...segmentSpans(text, chunkSize, chunkOverlap, { boundaryTolerance })];

        this.logChunkingStats(spans, filename);
        return spans;
    }
}
