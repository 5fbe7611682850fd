import { Elysia } from "elysia";
import { createHealthcheckController } from "../controllers/healthcheck.controller";
import type { SessionManager } from "../services/session";

export const healthcheckRoute = (sessions: SessionManager) => {
    const healthcheckController = createHealthcheckController(sessions);

    return new Elysia()
        .get("/", () => healthcheckController.handle())
        .get("/healthcheck", () => healthcheckController.handle())
        .get("/health", () => healthcheckController.handle()); // alias for /healthcheck
};
