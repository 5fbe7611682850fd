import { ApiError } from "../utils/ApiError";
import { errorResponse } from "../utils/asyncHndler";

/**
 * Bearer-token check for the API routes. With no token configured every
 * request is let through.
 */
export const createAuthMiddleware =
    (expectedToken: string | undefined) =>
    ({ request }: { request: Request }): Response | undefined => {
        if (!expectedToken) return undefined;

        if (!validateAuthToken(request, expectedToken)) {
            return errorResponse(new ApiError(401, "Unauthorized"));
        }

        // Token is valid, continue to next handler
        return undefined;
    };

export const validateAuthToken = (request: Request, expectedToken: string): boolean => {
    const authHeader = request.headers.get("Authorization");

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
        return false;
    }

    const token = authHeader.substring(7);
    return token === expectedToken;
};
