export interface ApiResponseParams<T> {
    statusCode: number;
    data: T;
    message?: string;
}

export interface ApiErrorBody {
    success: false;
    message: string;
    errors: unknown[];
    data: unknown;
    status: number;
}
