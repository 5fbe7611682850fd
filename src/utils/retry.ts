import type { RetryConfig } from "../config/types";

export interface RetryOptions extends RetryConfig {
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Raised once every attempt has failed; `cause` is the last failure.
 */
export class RetryExhaustedError extends Error {
    readonly attempts: number;

    constructor(attempts: number, cause: unknown) {
        super(
            `Gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${
                cause instanceof Error ? cause.message : String(cause)
            }`,
            { cause }
        );
        this.name = "RetryExhaustedError";
        this.attempts = attempts;
    }
}

const defaultSleep = (ms: number) =>
    new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const { attempts, baseDelayMs, maxDelayMs, shouldRetry, onRetry } = options;
    const sleep = options.sleep ?? defaultSleep;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            const retryable = shouldRetry ? shouldRetry(error, attempt) : true;
            if (!retryable || attempt >= attempts) {
                throw new RetryExhaustedError(attempt, error);
            }

            const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
            onRetry?.(error, attempt, delayMs);
            await sleep(delayMs);
        }
    }
}
