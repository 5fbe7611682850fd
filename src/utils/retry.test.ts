import { describe, expect, it, vi } from "vitest";
import { RetryExhaustedError, backoffDelay, withRetry } from "./retry";
import { TimeoutError, withTimeout } from "./withTimeout";

describe("retry", () => {
    describe("backoffDelay", () => {
        it("should double the delay per attempt up to the cap", () => {
            expect([1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt, 500, 8000))).toEqual([
                500, 1000, 2000, 4000, 8000, 8000,
            ]);
        });
    });

    describe("withRetry", () => {
        const options = { attempts: 3, baseDelayMs: 100, maxDelayMs: 1000 };

        it("should return the first success", async () => {
            const sleep = vi.fn(async (_ms: number) => {});
            let calls = 0;

            const result = await withRetry(
                async (attempt) => {
                    calls++;
                    if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
                    return "done";
                },
                { ...options, sleep }
            );

            expect(result).toBe("done");
            expect(calls).toBe(3);
            expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
        });

        it("should wrap the last failure once attempts run out", async () => {
            const onRetry = vi.fn();
            const error = await withRetry(
                async (attempt) => {
                    throw new Error(`attempt ${attempt} failed`);
                },
                { ...options, sleep: async () => {}, onRetry }
            ).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RetryExhaustedError);
            if (!(error instanceof RetryExhaustedError)) return;
            expect(error.attempts).toBe(3);
            expect(error.message).toBe("Gave up after 3 attempts: attempt 3 failed");
            expect(onRetry).toHaveBeenCalledTimes(2);
        });

        it("should stop at once when the failure is not retryable", async () => {
            const fn = vi.fn(async () => {
                throw new Error("bad request");
            });

            const error = await withRetry(fn, {
                ...options,
                shouldRetry: () => false,
            }).catch((e: unknown) => e);

            expect(fn).toHaveBeenCalledTimes(1);
            expect(error).toBeInstanceOf(RetryExhaustedError);
            if (!(error instanceof RetryExhaustedError)) return;
            expect(error.attempts).toBe(1);
        });
    });
});

describe("withTimeout", () => {
    it("should resolve with the task result before the deadline", async () => {
        expect(await withTimeout(async () => 42, 1000)).toBe(42);
    });

    it("should reject and abort the signal at the deadline", async () => {
        let seen: AbortSignal | undefined;

        const error = await withTimeout(
            (signal) => {
                seen = signal;
                return new Promise<never>(() => {});
            },
            10,
            "slow task"
        ).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TimeoutError);
        if (!(error instanceof TimeoutError)) return;
        expect(error.message).toBe("Timeout after 10ms for slow task");
        expect(seen?.aborted).toBe(true);
    });
});
