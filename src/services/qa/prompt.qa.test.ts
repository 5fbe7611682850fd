import { describe, expect, it } from "vitest";
import type { ConversationTurn, RetrievedChunk } from "../../types/document.types";
import { PromptTooLargeError } from "../../utils/PipelineError";
import { assemblePrompt, estimateTokens, renderUserMessage } from "./prompt.qa";

const hit = (id: string, text: string, distance: number): RetrievedChunk => ({
    chunk: {
        id,
        text,
        documentId: "d",
        fileName: "d.txt",
        pageNumber: 1,
        offset: 0,
        embedding: [1, 0],
    },
    distance,
});

const turn = (query: string, answer: string): ConversationTurn => ({
    query,
    answer,
    sourceChunkIds: [],
    sources: [],
    createdAt: "2026-01-01T00:00:00.000Z",
});

// One character per token keeps the arithmetic readable
const budget = (budgetTokens: number, historyWindow = 3) => ({
    budgetTokens,
    charsPerToken: 1,
    historyWindow,
});

describe("prompt assembly", () => {
    describe("estimateTokens", () => {
        it("should round up", () => {
            expect(estimateTokens("abcde", 4)).toBe(2);
            expect(estimateTokens("", 4)).toBe(0);
        });
    });

    describe("renderUserMessage", () => {
        it("should tag excerpts and lay out the conversation", () => {
            expect(
                renderUserMessage([{ id: "d#0", text: "aaaa" }], [turn("x", "y")], "q")
            ).toBe(
                "Document excerpts:\n\n[source: d#0]\naaaa\n\nConversation so far:\nUser: x\nAssistant: y\n\nQuestion: q"
            );
        });

        it("should leave out empty sections", () => {
            expect(renderUserMessage([], [turn("x", "y")], "q")).toBe(
                "Conversation so far:\nUser: x\nAssistant: y\n\nQuestion: q"
            );
        });
    });

    describe("assemblePrompt", () => {
        const retrieval = [hit("d#0", "aaaa", 0.1), hit("d#1", "bbbb", 0.2)];

        it("should keep everything that fits", () => {
            const prompt = assemblePrompt("S", "q", retrieval, [], budget(1000));

            expect(prompt.includedChunkIds).toEqual(["d#0", "d#1"]);
            expect(prompt.droppedChunks).toBe(0);
            expect(prompt.truncatedChunkId).toBeNull();
            expect(prompt.estimatedTokens).toBe(72);
        });

        it("should drop the most distant chunk first", () => {
            const prompt = assemblePrompt("S", "q", retrieval, [], budget(60));

            expect(prompt.includedChunkIds).toEqual(["d#0"]);
            expect(prompt.droppedChunks).toBe(1);
            expect(prompt.estimatedTokens).toBe(52);
        });

        it("should drop history before any chunk", () => {
            const prompt = assemblePrompt("S", "q", retrieval, [turn("x", "y")], budget(72));

            expect(prompt.includedChunkIds).toEqual(["d#0", "d#1"]);
            expect(prompt.includedHistoryTurns).toBe(0);
            expect(prompt.droppedHistoryTurns).toBe(1);
            expect(prompt.estimatedTokens).toBe(72);
        });

        it("should offer only the most recent turns", () => {
            const history = [1, 2, 3, 4, 5].map((i) => turn(`q${i}`, `a${i}`));
            const prompt = assemblePrompt("S", "q", retrieval, history, budget(1000, 2));

            expect(prompt.includedHistoryTurns).toBe(2);
            expect(prompt.droppedHistoryTurns).toBe(0);
            expect(prompt.userMessage).toContain(
                "Conversation so far:\nUser: q4\nAssistant: a4\nUser: q5\nAssistant: a5"
            );
            expect(prompt.userMessage).not.toContain("User: q3");
        });

        it("should truncate the last chunk when it alone is too long", () => {
            const prompt = assemblePrompt("S", "q", [hit("d#0", "aaaaaaaaaa", 0.1)], [], budget(50));

            expect(prompt.truncatedChunkId).toBe("d#0");
            expect(prompt.userMessage).toBe("Document excerpts:\n\n[source: d#0]\naa\n\nQuestion: q");
            expect(prompt.estimatedTokens).toBe(50);
        });

        it("should refuse when the question alone exceeds the budget", () => {
            expect(() => assemblePrompt("S", "q", retrieval, [], budget(47))).toThrow(
                PromptTooLargeError
            );
        });

        it("should never exceed the budget", () => {
            const history = [turn("first question", "first answer"), turn("second", "answer")];
            for (let tokens = 48; tokens <= 160; tokens++) {
                const prompt = assemblePrompt("S", "q", retrieval, history, budget(tokens));
                expect(prompt.estimatedTokens).toBeLessThanOrEqual(tokens);
            }
        });
    });
});
