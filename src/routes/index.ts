import { Elysia } from "elysia";
import type { SessionManager } from "../services/session";
import { healthcheckRoute } from "./healthcheck.route";
import { sessionRoute } from "./session.route";

export const setupRoutes = (sessions: SessionManager, authToken?: string) =>
    new Elysia().use(healthcheckRoute(sessions)).use(sessionRoute(sessions, authToken));
