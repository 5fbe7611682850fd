import { loggingService } from "../services/logging";
import { sentryMonitoringService } from "../services/monitoring";
import type { ApiErrorBody } from "../types/ApiResponseTypes";
import { ApiError } from "./ApiError";
import { jsonResponse } from "./jsonResponse";
import { PipelineError, type PipelineErrorCode } from "./PipelineError";

const logger = loggingService.createComponentLogger("HTTP");

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
    InvalidConfig: 400,
    UnreadableDocument: 422,
    PromptTooLarge: 413,
    EmptyContext: 200,
    SessionNotFound: 404,
    SessionBusy: 409,
    SessionClosed: 410,
    EmbeddingUnavailable: 503,
    InferenceUnavailable: 503,
    DimensionMismatch: 500,
};

export function statusForPipelineError(error: PipelineError): number {
    return STATUS_BY_CODE[error.code];
}

/**
 * Lifts a pipeline failure into an ApiError; `data` is attached to the body
 * (the original query, for instance, so the client can re-submit it).
 */
export function toApiError(error: unknown, data: unknown = null): ApiError {
    if (error instanceof ApiError) return error;

    if (error instanceof PipelineError) {
        return new ApiError(
            statusForPipelineError(error),
            error.message,
            [{ code: error.code, ...error.details }],
            data
        );
    }

    return new ApiError(500, "Internal Server Error", [], data);
}

export function errorResponse(error: unknown): Response {
    const apiError = toApiError(error);

    if (apiError.statusCode >= 500) {
        logger.error(error instanceof Error ? error.message : String(error), {
            status: apiError.statusCode,
        });
        if (!(error instanceof PipelineError)) {
            sentryMonitoringService.captureException(error, {
                tags: { component: "http" },
            });
        }
    }

    const body: ApiErrorBody = {
        success: false,
        message: apiError.message,
        errors: apiError.errors,
        data: apiError.data,
        status: apiError.statusCode,
    };
    return jsonResponse(body, apiError.statusCode);
}

export function asyncHandler<A extends unknown[]>(
    handler: (...args: A) => Promise<Response> | Response
) {
    return async (...args: A): Promise<Response> => {
        try {
            return await handler(...args);
        } catch (err) {
            return errorResponse(err);
        }
    };
}
