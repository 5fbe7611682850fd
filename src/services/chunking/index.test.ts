import { describe, expect, it } from "vitest";
import { testChunkingConfig } from "../../test-utils/fakes";
import type { ExtractedDocument } from "../../types/document.types";
import { InvalidConfigError } from "../../utils/PipelineError";
import {
    ChunkingService,
    CharacterWiseChunkingStrategy,
    RecursiveTextChunkingStrategy,
    chunkId,
    locatePieces,
    pageNumberAt,
} from ".";

const document = (pageTexts: string[], pageOffsets: number[]): ExtractedDocument => ({
    fileName: "notes.pdf",
    format: "pdf",
    fullText: pageTexts.join("\n\n"),
    pageTexts,
    totalPages: pageTexts.length,
    pageOffsets,
});

describe("ChunkingService", () => {
    describe("pageNumberAt", () => {
        it("should map offsets to 1-based pages", () => {
            const offsets = [0, 15, 40];
            expect(pageNumberAt(offsets, 0)).toBe(1);
            expect(pageNumberAt(offsets, 14)).toBe(1);
            expect(pageNumberAt(offsets, 15)).toBe(2);
            expect(pageNumberAt(offsets, 100)).toBe(3);
        });
    });

    describe("createChunks", () => {
        it("should number chunks and record the page they start on", async () => {
            const service = new ChunkingService(testChunkingConfig());
            const drafts = await service.createChunks(
                document(["Page one text", "Second page"], [0, 15]),
                "doc",
                { chunkSize: 10, chunkOverlap: 0 }
            );

            expect(drafts.map(({ id, text, pageNumber, offset }) => ({ id, text, pageNumber, offset })))
                .toEqual([
                    { id: "doc#0", text: "Page one t", pageNumber: 1, offset: 0 },
                    { id: "doc#1", text: "ext\n\nSecon", pageNumber: 1, offset: 10 },
                    { id: "doc#2", text: "d page", pageNumber: 2, offset: 20 },
                ]);
            expect(drafts.every((draft) => draft.fileName === "notes.pdf")).toBe(true);
            expect(Object.isFrozen(drafts[0])).toBe(true);
        });

        it("should skip windows that hold only whitespace", async () => {
            const service = new ChunkingService(testChunkingConfig());
            const drafts = await service.createChunks(
                document(["abcd      "], [0]),
                "doc",
                { chunkSize: 4, chunkOverlap: 0 }
            );

            expect(drafts.map((draft) => draft.id)).toEqual(["doc#0"]);
            expect(drafts[0]?.text).toBe("abcd");
        });

        it("should reject invalid chunking parameters", async () => {
            const service = new ChunkingService(testChunkingConfig());
            await expect(
                service.createChunks(document(["text"], [0]), "doc", { chunkSize: 5, chunkOverlap: 5 })
            ).rejects.toBeInstanceOf(InvalidConfigError);
        });
    });

    describe("createStrategy", () => {
        it("should follow the configured strategy", () => {
            const params = { chunkSize: 100, chunkOverlap: 10 };
            expect(new ChunkingService(testChunkingConfig()).createStrategy(params)).toBeInstanceOf(
                CharacterWiseChunkingStrategy
            );
            expect(
                new ChunkingService(testChunkingConfig({ strategy: "recursive" })).createStrategy(params)
            ).toBeInstanceOf(RecursiveTextChunkingStrategy);
        });
    });

    it("should build chunk ids from the document id", () => {
        expect(chunkId("abc123", 4)).toBe("abc123#4");
    });
});

describe("RecursiveTextChunkingStrategy", () => {
    it("should produce spans that point back into the source", async () => {
        const text = "one two three four five six";
        const strategy = new RecursiveTextChunkingStrategy({
            chunkSize: 10,
            chunkOverlap: 0,
            separators: [" ", ""],
        });

        const spans = await strategy.split(text, "words.txt");

        expect(spans.length).toBeGreaterThan(1);
        for (const span of spans) {
            expect(span.text.length).toBeLessThanOrEqual(10);
            expect(text.slice(span.start, span.end)).toBe(span.text);
        }
    });

    it("should reject an overlap as large as the chunk size", () => {
        expect(
            () => new RecursiveTextChunkingStrategy({ chunkSize: 10, chunkOverlap: 10, separators: [] })
        ).toThrow(InvalidConfigError);
    });

    describe("locatePieces", () => {
        it("should find repeated pieces in order", () => {
            expect(locatePieces("ab ab ab", ["ab", "ab", "ab"])).toEqual([
                { text: "ab", start: 0, end: 2 },
                { text: "ab", start: 3, end: 5 },
                { text: "ab", start: 6, end: 8 },
            ]);
        });

        it("should place an altered piece at the cursor", () => {
            expect(locatePieces("abc", ["abc", "zz"])).toEqual([
                { text: "abc", start: 0, end: 3 },
                { text: "zz", start: 1, end: 3 },
            ]);
        });
    });
});
