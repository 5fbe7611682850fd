import { describe, expect, it } from "vitest";
import { InvalidConfigError } from "../../utils/PipelineError";
import { PARIS_TEXT } from "../../test-utils/fakes";
import { findCut, segment, segmentParamIssues, segmentSpans } from "./characterWise.chunking";

const reconstruct = (pieces: string[], overlap: number) =>
    pieces.map((piece, i) => (i === 0 ? piece : piece.slice(overlap))).join("");

describe("characterWise chunking", () => {
    describe("segment", () => {
        it("should cut hard windows that overlap by the requested amount", () => {
            expect([...segment(PARIS_TEXT, 40, 10)]).toEqual([
                "Paris is the capital of France. It has a",
                ". It has a population of over 2 million.",
            ]);
        });

        it("should give back the input when the overlaps are dropped", () => {
            const text = "The quick brown fox jumps over the lazy dog.\nAnd then it sleeps.";
            for (const [size, overlap] of [[7, 3], [10, 0], [16, 5], [64, 63]] as const) {
                const pieces = [...segment(text, size, overlap)];
                expect(reconstruct(pieces, overlap)).toBe(text);
                expect(pieces.every((piece) => piece.length <= size)).toBe(true);
            }
        });

        it("should return a single piece when the text fits", () => {
            expect([...segment("short", 600, 80)]).toEqual(["short"]);
        });

        it("should yield nothing for empty text", () => {
            expect([...segment("", 10, 2)]).toEqual([]);
        });

        it("should be restartable", () => {
            const pieces = segment(PARIS_TEXT, 25, 5);
            expect([...pieces]).toEqual([...pieces]);
        });

        it("should reject an overlap that is not smaller than the chunk size", () => {
            expect(() => segment("text", 10, 10)).toThrow(InvalidConfigError);
        });

        it("should reject a non-positive chunk size", () => {
            expect(() => segment("text", 0, 0)).toThrow(InvalidConfigError);
        });

        it("should reject a negative boundary tolerance", () => {
            expect(() => segment("text", 10, 2, { boundaryTolerance: -1 })).toThrow(
                InvalidConfigError
            );
        });
    });

    describe("segmentSpans", () => {
        const text = "alpha beta gamma delta";

        it("should report offsets for hard cuts", () => {
            expect([...segmentSpans(text, 10, 2)]).toEqual([
                { text: "alpha beta", start: 0, end: 10 },
                { text: "ta gamma d", start: 8, end: 18 },
                { text: " delta", start: 16, end: 22 },
            ]);
        });

        it("should prefer word boundaries when a tolerance is given", () => {
            const spans = [...segmentSpans(text, 10, 2, { boundaryTolerance: 5 })];
            expect(spans).toEqual([
                { text: "alpha beta", start: 0, end: 10 },
                { text: "ta gamma ", start: 8, end: 17 },
                { text: "a delta", start: 15, end: 22 },
            ]);
            expect(reconstruct(spans.map((span) => span.text), 2)).toBe(text);
        });
    });

    describe("findCut", () => {
        it("should prefer a sentence end over a word boundary", () => {
            const text = "One two. Three four five";
            // sentence boundary sits before "Three" at 9
            expect(findCut(text, 0, 12, 0, 5)).toBe(9);
        });

        it("should keep the hard end without a tolerance", () => {
            expect(findCut("abcdefghij", 0, 5, 1, 0)).toBe(5);
        });

        it("should never cut at or before start plus overlap", () => {
            expect(findCut("a bcdefghijkl", 0, 6, 3, 6)).toBe(6);
        });
    });

    describe("segmentParamIssues", () => {
        it("should accept zero overlap", () => {
            expect(segmentParamIssues(10, 0)).toEqual([]);
        });

        it("should report every problem", () => {
            expect(segmentParamIssues(-1, -2)).toEqual([
                "chunkSize must be a positive integer (got -1)",
                "overlap must be a non-negative integer (got -2)",
            ]);
        });
    });
});
