import { describe, expect, it } from "vitest";
import { Gate, PARIS_TEXT, createTestSessionManager, encode } from "../../test-utils/fakes";
import {
    EmbeddingUnavailableError,
    EmptyContextError,
    SessionBusyError,
    SessionClosedError,
} from "../../utils/PipelineError";
import { documentIdFor } from "../processing";

const LYON_TEXT = "Lyon has a population of about half a million.";

const openSession = () => {
    const fixture = createTestSessionManager();
    const session = fixture.sessions.create({ chunkSize: 40, chunkOverlap: 10 });
    return { ...fixture, session };
};

describe("ChatSession", () => {
    describe("ask", () => {
        it("should answer from the uploaded document and cite it", async () => {
            const { session, llm } = openSession();
            const parisId = documentIdFor(encode(PARIS_TEXT));

            const summary = await session.ingest(encode(PARIS_TEXT), "paris.txt");
            const result = await session.ask("What is the capital of France?");

            expect(summary.chunkCount).toBe(2);
            expect(summary.message).toBe("Created 2 chunks from paris.txt");
            expect(result.optimizedQuery).toBe("the capital of france?");
            expect(result.retrievedChunks).toBe(2);
            expect(result.turn.query).toBe("What is the capital of France?");
            expect(result.turn.answer).toBe("Paris is the capital of France.");
            expect(result.turn.sourceChunkIds).toEqual([`${parisId}#0`, `${parisId}#1`]);
            expect(result.sourceLabels).toEqual(["paris.txt p.1"]);

            expect(llm.prompts).toHaveLength(1);
            expect(llm.prompts[0]?.userMessage).toContain(
                `[source: ${parisId}#0]\nParis is the capital of France. It has a`
            );
            expect(llm.prompts[0]?.userMessage.endsWith("Question: the capital of france?")).toBe(true);
            expect(session.getHistory()).toEqual([result.turn]);
            expect(session.getState()).toBe("Indexed");
        });

        it("should retrieve the same chunks after the same document is loaded again", async () => {
            const { session } = openSession();

            await session.ingest(encode(PARIS_TEXT), "paris.txt");
            const first = await session.ask("What is the capital of France?");
            await session.ingest(encode(PARIS_TEXT), "paris.txt");
            const second = await session.ask("What is the capital of France?");

            expect(second.turn.sourceChunkIds).toEqual(first.turn.sourceChunkIds);
            expect(second.turn.sourceChunkIds).toHaveLength(2);
        });

        it("should refuse to answer before any document is loaded", async () => {
            const { session, provider, llm } = openSession();

            await expect(session.ask("What is the capital of France?")).rejects.toBeInstanceOf(
                EmptyContextError
            );
            expect(provider.calls).toEqual([]);
            expect(llm.prompts).toEqual([]);
            expect(session.getState()).toBe("Empty");
            expect(session.isBusy()).toBe(false);
        });

        it("should offer earlier turns to the next prompt", async () => {
            const { session, llm } = openSession();
            await session.ingest(encode(PARIS_TEXT), "paris.txt");

            await session.ask("What is the capital of France?");
            await session.ask("How many people live there?");

            expect(llm.prompts[1]?.userMessage).toContain(
                "Conversation so far:\nUser: What is the capital of France?\nAssistant: Paris is the capital of France."
            );
            expect(session.getStats()).toEqual({
                messages: 4,
                turns: 2,
                chunkCount: 2,
                currentDocument: "paris.txt",
            });
        });

        it("should keep the history when the model call fails", async () => {
            const { session, llm } = openSession();
            await session.ingest(encode(PARIS_TEXT), "paris.txt");
            await session.ask("What is the capital of France?");

            llm.failure = new Error("model offline");
            await expect(session.ask("And the population?")).rejects.toThrow("model offline");

            expect(session.getHistory()).toHaveLength(1);
            expect(session.getState()).toBe("Indexed");
            expect(session.isBusy()).toBe(false);
        });
    });

    describe("ingest", () => {
        it("should stay empty when embedding keeps failing", async () => {
            const { session, provider, llm } = openSession();
            provider.failuresRemaining = 3;

            const error = await session.ingest(encode(PARIS_TEXT), "paris.txt").catch((e: unknown) => e);

            expect(error).toBeInstanceOf(EmbeddingUnavailableError);
            if (!(error instanceof EmbeddingUnavailableError)) return;
            expect(error.attempts).toBe(3);
            expect(session.getState()).toBe("Empty");
            expect(session.snapshot().document).toBeNull();
            await expect(session.ask("What is the capital of France?")).rejects.toBeInstanceOf(
                EmptyContextError
            );
            expect(llm.prompts).toEqual([]);
        });

        it("should keep the previous document when a new upload fails", async () => {
            const { session, provider } = openSession();
            await session.ingest(encode(PARIS_TEXT), "paris.txt");
            await session.ask("What is the capital of France?");

            provider.failuresRemaining = 3;
            await expect(session.ingest(encode(LYON_TEXT), "lyon.txt")).rejects.toBeInstanceOf(
                EmbeddingUnavailableError
            );

            expect(session.getState()).toBe("Indexed");
            expect(session.snapshot().document?.fileName).toBe("paris.txt");
            expect(session.getHistory()).toHaveLength(1);
            const result = await session.ask("What is the capital of France?");
            expect(result.sourceLabels).toEqual(["paris.txt p.1"]);
        });

        it("should replace the document and start a new conversation", async () => {
            const { session } = openSession();
            const lyonId = documentIdFor(encode(LYON_TEXT));
            await session.ingest(encode(PARIS_TEXT), "paris.txt");
            await session.ask("What is the capital of France?");

            await session.ingest(encode(LYON_TEXT), "lyon.txt");

            expect(session.getHistory()).toEqual([]);
            expect(session.snapshot().document?.documentId).toBe(lyonId);
            const result = await session.ask("What is the population?");
            expect(result.turn.sourceChunkIds.length).toBeGreaterThan(0);
            expect(result.turn.sourceChunkIds.every((id) => id.startsWith(`${lyonId}#`))).toBe(true);
            expect(result.sourceLabels).toEqual(["lyon.txt p.1"]);
        });

        it("should read a streamed upload", async () => {
            const { session } = openSession();
            const stream = new ReadableStream<Uint8Array>({
                start(controller) {
                    controller.enqueue(encode(PARIS_TEXT.slice(0, 20)));
                    controller.enqueue(encode(PARIS_TEXT.slice(20)));
                    controller.close();
                },
            });

            const summary = await session.ingest(stream, "paris.txt");

            expect(summary.document.documentId).toBe(documentIdFor(encode(PARIS_TEXT)));
            expect(summary.chunkCount).toBe(2);
        });
    });

    describe("concurrency", () => {
        it("should reject work submitted while an upload is running", async () => {
            const { session, provider } = openSession();
            const gate = new Gate();
            provider.gate = gate;

            const pending = session.ingest(encode(PARIS_TEXT), "paris.txt");

            expect(session.isBusy()).toBe(true);
            expect(session.getState()).toBe("Ingesting");
            await expect(session.ask("What is the capital of France?")).rejects.toBeInstanceOf(
                SessionBusyError
            );
            await expect(session.ingest(encode(LYON_TEXT), "lyon.txt")).rejects.toBeInstanceOf(
                SessionBusyError
            );
            expect(() => session.clearHistory()).toThrow(SessionBusyError);

            gate.open();
            await pending;
            expect(session.getState()).toBe("Indexed");
            expect(session.isBusy()).toBe(false);
        });

        it("should discard an upload that finishes after the session closed", async () => {
            const { session, provider } = openSession();
            const gate = new Gate();
            provider.gate = gate;

            const pending = session.ingest(encode(PARIS_TEXT), "paris.txt");
            session.close();
            gate.open();

            await expect(pending).rejects.toBeInstanceOf(SessionClosedError);
            expect(session.getState()).toBe("Closed");
            expect(session.getStats().chunkCount).toBe(0);
        });

        it("should discard an answer that arrives after the session closed", async () => {
            const { session, provider } = openSession();
            await session.ingest(encode(PARIS_TEXT), "paris.txt");
            const gate = new Gate();
            provider.gate = gate;

            const pending = session.ask("What is the capital of France?");
            session.close();
            gate.open();

            await expect(pending).rejects.toBeInstanceOf(SessionClosedError);
            expect(session.getHistory()).toEqual([]);
        });
    });

    describe("clearHistory", () => {
        it("should drop every turn and keep the document", async () => {
            const { session } = openSession();
            await session.ingest(encode(PARIS_TEXT), "paris.txt");
            await session.ask("What is the capital of France?");
            await session.ask("Who lives there?");

            expect(session.clearHistory()).toBe(2);
            expect(session.getHistory()).toEqual([]);
            expect(session.getState()).toBe("Indexed");
        });
    });

    describe("close", () => {
        it("should refuse further work", async () => {
            const { session } = openSession();
            await session.ingest(encode(PARIS_TEXT), "paris.txt");

            session.close();

            expect(session.isClosed()).toBe(true);
            await expect(session.ask("What is the capital of France?")).rejects.toBeInstanceOf(
                SessionClosedError
            );
            await expect(session.ingest(encode(PARIS_TEXT), "paris.txt")).rejects.toBeInstanceOf(
                SessionClosedError
            );
            expect(() => session.clearHistory()).toThrow(SessionClosedError);
        });
    });
});
