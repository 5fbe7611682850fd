import { MODEL_CATALOG, getChunkPreset } from "../config/models";
import { assertWithinUploadLimit } from "../services/extraction";
import type { SessionCreateOptions, SessionManager } from "../services/session";
import { HINT_MESSAGES } from "../utils/providerErrors";
import { ApiError } from "../utils/ApiError";
import { asyncHandler, toApiError } from "../utils/asyncHndler";
import { apiResponse } from "../utils/jsonResponse";
import {
    EmbeddingUnavailableError,
    EmptyContextError,
    InferenceUnavailableError,
} from "../utils/PipelineError";

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

async function readJsonBody(request: Request): Promise<Record<string, unknown>> {
    const text = await request.text();
    if (!text.trim()) return {};

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        throw new ApiError(400, "Request body must be valid JSON");
    }
    if (!isRecord(parsed)) {
        throw new ApiError(400, "Request body must be a JSON object");
    }
    return parsed;
}

function optionalInteger(body: Record<string, unknown>, field: string): number | undefined {
    const value = body[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new ApiError(400, `"${field}" must be an integer`);
    }
    return value;
}

export function parseSessionOptions(body: Record<string, unknown>): SessionCreateOptions {
    const { model } = body;
    if (model !== undefined && (typeof model !== "string" || !model.trim())) {
        throw new ApiError(400, `"model" must be a non-empty string`);
    }

    return {
        model: typeof model === "string" ? model.trim() : undefined,
        topK: optionalInteger(body, "topK"),
        chunkSize: optionalInteger(body, "chunkSize"),
        chunkOverlap: optionalInteger(body, "chunkOverlap"),
    };
}

export const createSessionController = (sessions: SessionManager) => ({
    listModels: asyncHandler(() =>
        apiResponse(
            200,
            MODEL_CATALOG.map((model) => ({ ...model, chunkPreset: getChunkPreset(model.id) })),
            "Available models"
        )
    ),

    create: asyncHandler(async (request: Request) => {
        const options = parseSessionOptions(await readJsonBody(request));
        const chatSession = sessions.create(options);
        return apiResponse(201, chatSession.snapshot(), "Session created");
    }),

    get: asyncHandler((sessionId: string) =>
        apiResponse(200, sessions.get(sessionId).snapshot(), "Session retrieved")
    ),

    uploadDocument: asyncHandler(async (sessionId: string, request: Request) => {
        const chatSession = sessions.get(sessionId);

        let formData: FormData;
        try {
            formData = await request.formData();
        } catch {
            throw new ApiError(400, 'Expected a multipart upload with a "file" field');
        }

        const entry = formData.get("file");
        if (entry === null || typeof entry === "string") {
            throw new ApiError(400, 'No file provided. Please include a file with key "file"');
        }

        const fileName = entry.name || "uploaded-document";
        assertWithinUploadLimit(entry.size, fileName, chatSession.settings.maxUploadBytes);
        const summary = await chatSession.ingest(entry.stream(), fileName);

        return apiResponse(
            200,
            { ...summary, session: chatSession.snapshot() },
            summary.message
        );
    }),

    ask: asyncHandler(async (sessionId: string, request: Request) => {
        const chatSession = sessions.get(sessionId);
        const body = await readJsonBody(request);
        const { query } = body;

        if (typeof query !== "string" || !query.trim()) {
            throw new ApiError(400, 'Please include a non-empty "query" field');
        }

        try {
            const result = await chatSession.ask(query);
            return apiResponse(200, { ...result, stats: chatSession.getStats() }, "Answer generated");
        } catch (error) {
            if (error instanceof EmptyContextError) {
                return apiResponse(
                    200,
                    { guidance: true, answer: error.message, sourceChunkIds: [], query },
                    error.message
                );
            }
            if (
                error instanceof EmbeddingUnavailableError ||
                error instanceof InferenceUnavailableError
            ) {
                throw toApiError(error, { query, hint: error.hint, advice: HINT_MESSAGES[error.hint] });
            }
            throw toApiError(error, { query });
        }
    }),

    clearHistory: asyncHandler((sessionId: string) => {
        const chatSession = sessions.get(sessionId);
        const cleared = chatSession.clearHistory();
        return apiResponse(200, { cleared, session: chatSession.snapshot() }, "Chat history cleared");
    }),

    close: asyncHandler((sessionId: string) => {
        sessions.close(sessionId);
        return apiResponse(200, { id: sessionId, closed: true }, "Session closed");
    }),
});
