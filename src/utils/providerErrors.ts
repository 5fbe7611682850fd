import { APIConnectionError, APIConnectionTimeoutError, APIError } from "openai";
import type { ProviderFailureHint } from "./PipelineError";
import { TimeoutError } from "./withTimeout";

const RETRYABLE: ReadonlySet<ProviderFailureHint> = new Set([
    "rate_limited",
    "timeout",
    "network",
    "unknown",
]);

export const HINT_MESSAGES: Record<ProviderFailureHint, string> = {
    request_too_large: "Request too large! Try asking shorter questions.",
    model_unavailable: "Model deprecated! Please select a different model.",
    rate_limited: "Rate limit exceeded! Wait a few minutes.",
    auth: "The provider rejected the API key. Check your credentials.",
    timeout: "The provider took too long to respond. Try again.",
    network: "Could not reach the provider. Check your connection and try again.",
    unknown: "The provider returned an unexpected error. Try again.",
};

function classifyStatus(status: number): ProviderFailureHint | null {
    if (status === 413) return "request_too_large";
    if (status === 429) return "rate_limited";
    if (status === 401 || status === 403) return "auth";
    if (status === 400 || status === 404) return "model_unavailable";
    if (status === 408) return "timeout";
    return null;
}

function classifyMessage(message: string): ProviderFailureHint {
    const lowered = message.toLowerCase();
    if (lowered.includes("too large") || /\b413\b/.test(lowered)) return "request_too_large";
    if (lowered.includes("model_decommissioned") || lowered.includes("model_not_found")) {
        return "model_unavailable";
    }
    if (lowered.includes("rate limit") || /\b429\b/.test(lowered)) return "rate_limited";
    if (lowered.includes("unauthorized") || lowered.includes("invalid api key")) return "auth";
    if (lowered.includes("timeout") || lowered.includes("timed out")) return "timeout";
    if (
        lowered.includes("econnrefused") ||
        lowered.includes("enotfound") ||
        lowered.includes("econnreset") ||
        lowered.includes("fetch failed") ||
        lowered.includes("network")
    ) {
        return "network";
    }
    return "unknown";
}

export function classifyProviderError(error: unknown): ProviderFailureHint {
    if (error instanceof TimeoutError || error instanceof APIConnectionTimeoutError) {
        return "timeout";
    }
    if (error instanceof APIConnectionError) return "network";

    // Provider bodies often say more than the status does
    const message = error instanceof Error ? error.message : String(error);
    const fromMessage = classifyMessage(message);
    if (fromMessage !== "unknown") return fromMessage;

    if (error instanceof APIError && error.status !== undefined) {
        return classifyStatus(error.status) ?? "unknown";
    }
    return "unknown";
}

export function isRetryableHint(hint: ProviderFailureHint): boolean {
    return RETRYABLE.has(hint);
}

export function isRetryableProviderError(error: unknown): boolean {
    return isRetryableHint(classifyProviderError(error));
}
