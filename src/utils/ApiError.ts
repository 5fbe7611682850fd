export class ApiError extends Error {
    statusCode: number;
    errors: unknown[];
    data: unknown;

    constructor(
        statusCode: number,
        message = "Something went wrong",
        errors: unknown[] = [],
        data: unknown = null
    ) {
        super(message);
        this.name = "ApiError";
        this.statusCode = statusCode;
        this.errors = errors;
        this.data = data;
    }
}
