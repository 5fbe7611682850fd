import { describe, expect, it } from "vitest";
import { ApiError } from "./ApiError";
import { asyncHandler, errorResponse, toApiError } from "./asyncHndler";
import {
    EmptyContextError,
    InferenceUnavailableError,
    SessionBusyError,
    UnreadableDocumentError,
} from "./PipelineError";

describe("asyncHandler", () => {
    describe("toApiError", () => {
        it("should map pipeline errors to their HTTP status", () => {
            expect(toApiError(new SessionBusyError("s1", "query")).statusCode).toBe(409);
            expect(toApiError(new UnreadableDocumentError("a.bin", "bad")).statusCode).toBe(422);
            expect(toApiError(new InferenceUnavailableError("timeout", 3)).statusCode).toBe(503);
            expect(toApiError(new EmptyContextError()).statusCode).toBe(200);
        });

        it("should carry the error code, details and request data", () => {
            const apiError = toApiError(new SessionBusyError("s1", "query"), { query: "hi" });

            expect(apiError.message).toBe("Session s1 is busy with a query; try again when it completes");
            expect(apiError.errors).toEqual([
                { code: "SessionBusy", sessionId: "s1", activeOperation: "query" },
            ]);
            expect(apiError.data).toEqual({ query: "hi" });
        });

        it("should hide the message of an unexpected error", () => {
            const apiError = toApiError(new Error("secret internals"));
            expect(apiError.statusCode).toBe(500);
            expect(apiError.message).toBe("Internal Server Error");
        });

        it("should pass an ApiError through", () => {
            const original = new ApiError(418, "Teapot");
            expect(toApiError(original)).toBe(original);
        });
    });

    describe("errorResponse", () => {
        it("should render the error body", async () => {
            const response = errorResponse(new ApiError(400, "Bad input", ["field"]));

            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({
                success: false,
                message: "Bad input",
                errors: ["field"],
                data: null,
                status: 400,
            });
        });
    });

    it("should turn a thrown error into a response", async () => {
        const handler = asyncHandler(async (name: string) => {
            throw new UnreadableDocumentError(name, "File is empty");
        });

        const response = await handler("empty.txt");

        expect(response.status).toBe(422);
        expect(await response.json()).toMatchObject({
            success: false,
            message: "Could not read empty.txt: File is empty",
        });
    });
});
