export type PipelineErrorCode =
    | "InvalidConfig"
    | "UnreadableDocument"
    | "EmbeddingUnavailable"
    | "DimensionMismatch"
    | "InferenceUnavailable"
    | "EmptyContext"
    | "SessionBusy"
    | "SessionNotFound"
    | "SessionClosed"
    | "PromptTooLarge";

/**
 * How a provider failure looks to the person asking the question.
 */
export type ProviderFailureHint =
    | "request_too_large"
    | "model_unavailable"
    | "rate_limited"
    | "auth"
    | "timeout"
    | "network"
    | "unknown";

export const NO_DOCUMENT_MESSAGE =
    "No document is loaded yet. Upload a PDF or text document, then ask your question about it.";

export class PipelineError extends Error {
    readonly code: PipelineErrorCode;
    readonly details: Record<string, unknown>;

    constructor(
        code: PipelineErrorCode,
        message: string,
        options: { cause?: unknown; details?: Record<string, unknown> } = {}
    ) {
        super(message, { cause: options.cause });
        this.name = `${code}Error`;
        this.code = code;
        this.details = options.details ?? {};
    }
}

export class InvalidConfigError extends PipelineError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super("InvalidConfig", `Invalid configuration: ${issues.join("; ")}`, {
            details: { issues },
        });
        this.issues = issues;
    }
}

export class UnreadableDocumentError extends PipelineError {
    constructor(fileName: string, reason: string, cause?: unknown) {
        super("UnreadableDocument", `Could not read ${fileName}: ${reason}`, {
            cause,
            details: { fileName, reason },
        });
    }
}

export class DimensionMismatchError extends PipelineError {
    constructor(expected: number, actual: number, position?: number) {
        super(
            "DimensionMismatch",
            position === undefined
                ? `Expected vectors of dimension ${expected}, got ${actual}`
                : `Embedding ${position} has dimension ${actual}, expected ${expected}`,
            { details: { expected, actual, position } }
        );
    }
}

abstract class ProviderUnavailableError extends PipelineError {
    readonly hint: ProviderFailureHint;
    readonly attempts: number;

    constructor(
        code: "EmbeddingUnavailable" | "InferenceUnavailable",
        provider: string,
        hint: ProviderFailureHint,
        attempts: number,
        cause?: unknown
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(
            code,
            `${provider} unavailable after ${attempts} attempt${
                attempts === 1 ? "" : "s"
            }: ${reason}`,
            { cause, details: { provider, hint, attempts } }
        );
        this.hint = hint;
        this.attempts = attempts;
    }
}

export class EmbeddingUnavailableError extends ProviderUnavailableError {
    constructor(hint: ProviderFailureHint, attempts: number, cause?: unknown) {
        super("EmbeddingUnavailable", "Embedding provider", hint, attempts, cause);
    }
}

export class InferenceUnavailableError extends ProviderUnavailableError {
    constructor(hint: ProviderFailureHint, attempts: number, cause?: unknown) {
        super("InferenceUnavailable", "Inference provider", hint, attempts, cause);
    }
}

export class EmptyContextError extends PipelineError {
    constructor() {
        super("EmptyContext", NO_DOCUMENT_MESSAGE);
    }
}

export class SessionBusyError extends PipelineError {
    constructor(sessionId: string, activeOperation: string) {
        super(
            "SessionBusy",
            `Session ${sessionId} is busy with a ${activeOperation}; try again when it completes`,
            { details: { sessionId, activeOperation } }
        );
    }
}

export class SessionNotFoundError extends PipelineError {
    constructor(sessionId: string) {
        super("SessionNotFound", `Session ${sessionId} does not exist`, {
            details: { sessionId },
        });
    }
}

export class SessionClosedError extends PipelineError {
    constructor(sessionId: string) {
        super("SessionClosed", `Session ${sessionId} has been closed`, {
            details: { sessionId },
        });
    }
}

export class PromptTooLargeError extends PipelineError {
    constructor(estimatedTokens: number, budgetTokens: number) {
        super(
            "PromptTooLarge",
            `Request too large (${estimatedTokens} tokens, budget ${budgetTokens}). Try asking a shorter question.`,
            { details: { estimatedTokens, budgetTokens } }
        );
    }
}
