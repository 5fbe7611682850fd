import { Elysia } from "elysia";
import { createSessionController } from "../controllers/session.controller";
import { createAuthMiddleware } from "../middlewares/auth.middleware";
import type { SessionManager } from "../services/session";

export const sessionRoute = (sessions: SessionManager, authToken?: string) => {
    const controller = createSessionController(sessions);

    return new Elysia({ prefix: "/api/v1" })
        .onBeforeHandle(createAuthMiddleware(authToken))
        .get("/models", () => controller.listModels(), {
            detail: {
                summary: "List selectable chat models",
                tags: ["Models"],
            },
        })
        .post("/sessions", ({ request }) => controller.create(request), {
            detail: {
                summary: "Open a chat session",
                description:
                    "Optional JSON body { model, topK, chunkSize, chunkOverlap }. Chunk sizes default to the chosen model's preset.",
                tags: ["Sessions"],
            },
        })
        .get("/sessions/:id", ({ params }) => controller.get(params.id), {
            detail: { summary: "Session state, document, history and stats", tags: ["Sessions"] },
        })
        .post(
            "/sessions/:id/documents",
            ({ params, request }) => controller.uploadDocument(params.id, request),
            {
                detail: {
                    summary: "Upload a PDF or text document",
                    description:
                        'Multipart upload with a "file" field. Replaces the current document and clears the chat history.',
                    tags: ["Documents"],
                },
            }
        )
        .post("/sessions/:id/queries", ({ params, request }) => controller.ask(params.id, request), {
            detail: {
                summary: "Ask a question about the current document",
                description: 'JSON body { "query": string }. Returns the answer and its sources.',
                tags: ["Q&A"],
            },
        })
        .delete("/sessions/:id/history", ({ params }) => controller.clearHistory(params.id), {
            detail: { summary: "Clear the chat history", tags: ["Sessions"] },
        })
        .delete("/sessions/:id", ({ params }) => controller.close(params.id), {
            detail: { summary: "Close the session and release its document", tags: ["Sessions"] },
        });
};
