import * as Sentry from "@sentry/node";
import type {
    MonitoredOperation,
    MonitoringStats,
    SpanAttributeValue,
} from "./types";

const SENSITIVE_KEY = /api_?key|auth_?token|secret|credential|authorization|^token$/i;

export class SentryMonitoringService {
    private enabled: boolean;
    private trackedOperations = 0;
    private failedOperations = 0;

    constructor() {
        this.enabled = this.initializeSentry();

        if (process.env.NODE_ENV !== "test") {
            console.log(
                `🔍 Sentry Performance Monitoring: ${this.enabled ? "ENABLED" : "DISABLED"}${
                    this.enabled ? ` (Environment: ${this.environment()})` : ""
                }`
            );
        }
    }

    private environment(): string {
        return process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || "development";
    }

    private initializeSentry(): boolean {
        if (!process.env.SENTRY_DSN || process.env.NODE_ENV === "test") {
            return false;
        }

        try {
            Sentry.init({
                dsn: process.env.SENTRY_DSN,
                environment: this.environment(),
                tracesSampleRate: parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || "1.0"),
                release:
                    process.env.SENTRY_RELEASE ||
                    `docqa-server@${process.env.npm_package_version || "unknown"}`,
                beforeSend(event) {
                    // Uploaded documents and questions never leave the process
                    if (event.request?.data) {
                        event.request.data = "[Filtered]";
                    }
                    return event;
                },
                beforeSendTransaction(event) {
                    const op = event.contexts?.trace?.op ?? "";
                    if (op.includes("llm") || op.includes("embedding")) {
                        event.tags = { ...event.tags, component: "ai" };
                    }
                    return event;
                },
            });
            return true;
        } catch (error) {
            console.warn("⚠️ Failed to initialize Sentry:", error);
            return false;
        }
    }

    /**
     * Runs `fn` inside a span named after the pipeline stage. Errors are
     * captured and rethrown unchanged.
     */
    async track<T>(
        name: string,
        op: MonitoredOperation,
        inputs: Record<string, unknown>,
        fn: () => Promise<T>,
        metadata: Record<string, unknown> = {}
    ): Promise<T> {
        this.trackedOperations++;

        if (!this.enabled) {
            try {
                return await fn();
            } catch (error) {
                this.failedOperations++;
                throw error;
            }
        }

        const startTime = Date.now();

        return await Sentry.startSpan(
            {
                name,
                op,
                attributes: {
                    ...this.toAttributes(inputs),
                    ...this.toAttributes(metadata),
                    component: this.getComponentFromOp(op),
                },
            },
            async (span) => {
                try {
                    const result = await fn();
                    span.setAttribute("duration_ms", Date.now() - startTime);
                    span.setStatus({ code: 1 });
                    return result;
                } catch (error) {
                    this.failedOperations++;
                    const duration = Date.now() - startTime;

                    Sentry.captureException(error, {
                        contexts: {
                            operation: {
                                name,
                                op,
                                duration_ms: duration,
                                inputs: this.sanitizeData(inputs),
                            },
                        },
                    });

                    span.setStatus({
                        code: 2,
                        message: error instanceof Error ? error.message : String(error),
                    });
                    span.setAttribute("duration_ms", duration);
                    span.setAttribute("error", true);

                    throw error;
                }
            }
        );
    }

    captureException(
        error: unknown,
        options: {
            tags?: Record<string, string>;
            contexts?: Record<string, Record<string, unknown>>;
        } = {}
    ): void {
        if (!this.enabled) return;

        Sentry.captureException(error, {
            tags: options.tags,
            contexts: options.contexts
                ? Object.fromEntries(
                      Object.entries(options.contexts).map(([key, value]) => [
                          key,
                          this.sanitizeData(value),
                      ])
                  )
                : undefined,
        });
    }

    getStats(): MonitoringStats {
        return {
            enabled: this.enabled,
            sentryDsn: !!process.env.SENTRY_DSN,
            environment: this.environment(),
            trackedOperations: this.trackedOperations,
            failedOperations: this.failedOperations,
        };
    }

    async cleanup(): Promise<void> {
        if (!this.enabled) return;
        await Sentry.flush(2000);
    }

    private getComponentFromOp(op: MonitoredOperation): string {
        if (op === "llm" || op === "embedding") return "ai";
        if (op === "extraction" || op === "chunking" || op === "ingestion") return "processing";
        if (op === "vector_search") return "search";
        return "general";
    }

    sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
        const sanitized: Record<string, unknown> = {};

        for (const [key, value] of Object.entries(data)) {
            sanitized[key] = SENSITIVE_KEY.test(key) ? "[REDACTED]" : value;
        }

        return sanitized;
    }

    private toAttributes(data: Record<string, unknown>): Record<string, SpanAttributeValue> {
        const attributes: Record<string, SpanAttributeValue> = {};

        for (const [key, value] of Object.entries(this.sanitizeData(data))) {
            if (
                typeof value === "string" ||
                typeof value === "number" ||
                typeof value === "boolean"
            ) {
                attributes[key] = value;
            } else if (value !== undefined && value !== null) {
                attributes[key] = JSON.stringify(value);
            }
        }

        return attributes;
    }
}

export const sentryMonitoringService = new SentryMonitoringService();
