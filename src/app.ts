import { Elysia } from "elysia";
import { setupRoutes } from "./routes";
import type { SessionManager } from "./services/session";
import { ApiError } from "./utils/ApiError";
import { errorResponse } from "./utils/asyncHndler";

export interface AppOptions {
    sessions: SessionManager;
    authToken?: string;
}

export const createApp = ({ sessions, authToken }: AppOptions) =>
    new Elysia()
        .onError({ as: "global" }, ({ code, error }) => {
            if (code === "NOT_FOUND") {
                return errorResponse(new ApiError(404, "Route not found"));
            }
            if (code === "PARSE" || code === "VALIDATION") {
                return errorResponse(new ApiError(400, "Malformed request"));
            }
            return errorResponse(error);
        })
        .options("*", () => new Response(null, { status: 204 }))
        .use(setupRoutes(sessions, authToken));
