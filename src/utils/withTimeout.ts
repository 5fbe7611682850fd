export class TimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(timeoutMs: number, identifier?: string) {
        super(`Timeout after ${timeoutMs}ms${identifier ? ` for ${identifier}` : ""}`);
        this.name = "TimeoutError";
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with TimeoutError at the deadline even if the task ignores
 * the signal.
 */
export async function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    identifier?: string
): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(timeoutMs, identifier);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}
