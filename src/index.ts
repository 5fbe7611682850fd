import { Elysia } from "elysia";
import { node } from "@elysiajs/node";
import { Config } from "./config";
import { createApp } from "./app";
import { loggingService } from "./services/logging";
import { sentryMonitoringService } from "./services/monitoring";
import { createSessionManager } from "./services/session";

const logger = loggingService.createComponentLogger("Server");

async function startServer() {
    // Bad settings stop the process here rather than on the first request
    Config.ai.validate();
    Config.app.validate();

    const serverConfig = Config.app.getServerConfig();
    const sessions = createSessionManager();
    sessions.start();

    logger.info(`🚀 Starting server on port ${serverConfig.port}...`, {
        environment: process.env.NODE_ENV || "development",
        providers: Config.ai.describe(),
    });

    const server = new Elysia({ adapter: node() })
        .use(createApp({ sessions, authToken: serverConfig.authToken }))
        .listen({ port: serverConfig.port, hostname: serverConfig.hostname });

    logger.info(`✅ Server running on http://${serverConfig.hostname}:${serverConfig.port}`);
    logger.info(`🏥 Health check available at: http://localhost:${serverConfig.port}/healthcheck`);

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;

        logger.info(`🔄 Received ${signal}, starting graceful shutdown...`);
        sessions.shutdown();
        await server.stop();
        await sentryMonitoringService.cleanup();
        process.exit(0);
    };

    const onSignal = (signal: string) => {
        shutdown(signal).catch((error: unknown) => {
            logger.error("❌ Shutdown failed", {
                error: error instanceof Error ? error.message : String(error),
            });
            process.exit(1);
        });
    };
    process.on("SIGINT", () => onSignal("SIGINT"));
    process.on("SIGTERM", () => onSignal("SIGTERM"));
}

startServer().catch((error: unknown) => {
    logger.error("❌ Failed to start server", {
        error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
});
