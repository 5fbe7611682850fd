import { ApiResponse } from "./ApiResponse";

export function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "Content-Type": "application/json" },
    });
}

export function apiResponse<T>(statusCode: number, data: T, message?: string): Response {
    return jsonResponse(new ApiResponse({ statusCode, data, message }), statusCode);
}
