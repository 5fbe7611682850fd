import { ApiResponse } from "../utils/ApiResponse";
import { sentryMonitoringService } from "../services/monitoring";
import { loggingService } from "../services/logging";
import { Config } from "../config";
import type { SessionManager } from "../services/session";

export const createHealthcheckController = (sessions: SessionManager) => ({
    handle: () => {
        const monitoringStats = sentryMonitoringService.getStats();
        const loggingStats = loggingService.getStats();
        const ai = Config.ai.describe();

        const response = new ApiResponse({
            statusCode: 200,
            data: {
                status: "ok",
                uptimeSeconds: Math.round(process.uptime()),
                services: {
                    llm: { baseURL: ai.llm.baseURL, model: ai.llm.model },
                    embeddings: { baseURL: ai.embedding.baseURL, model: ai.embedding.model },
                    credentialsConfigured: Config.ai.hasCredentials(),
                },
                sessions: sessions.getStats(),
                monitoring: {
                    enabled: monitoringStats.enabled,
                    environment: monitoringStats.environment,
                    trackedOperations: monitoringStats.trackedOperations,
                    failedOperations: monitoringStats.failedOperations,
                    sentry_config: {
                        dsn_configured: monitoringStats.sentryDsn,
                        traces_sample_rate: process.env.SENTRY_TRACES_SAMPLE_RATE || "1.0",
                        release: process.env.SENTRY_RELEASE || "unknown",
                    },
                },
                logging: {
                    enabled: loggingStats.enabled,
                    fileLogging: loggingStats.fileLogging,
                    directory: loggingStats.logsDirectory,
                    totalFiles: loggingStats.totalLogFiles,
                    estimatedSize: loggingStats.estimatedLogSize,
                },
            },
            message: "Document Q&A service is running",
        });

        return response.toJSON();
    },
});
