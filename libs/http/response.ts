import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda";

import { ValidationError, errorMessage, isPipelineError, type ErrorCode } from "../validation/errors";

/** The parts of an API Gateway proxy event the handlers read. */
export type ApiRequest = Pick<
    APIGatewayProxyEvent,
    "body" | "isBase64Encoded" | "headers" | "queryStringParameters" | "pathParameters"
>;

const STATUS: Record<ErrorCode, number> = {
    ParseError: 400,
    ValidationError: 400,
    IngestError: 400,
    NotFoundError: 404,
    AuthError: 401,
    ProviderError: 502,
    StoreError: 503,
};

export function json(statusCode: number, body: unknown): APIGatewayProxyResult {
    return {
        statusCode,
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
    };
}

export function statusFor(err: unknown): number {
    return isPipelineError(err) ? STATUS[err.code] : 500;
}

export function errorResponse(tag: string, err: unknown): APIGatewayProxyResult {
    const statusCode = statusFor(err);
    if (statusCode >= 500) console.error(tag, { error: errorMessage(err) });
    else console.warn(tag, { status: statusCode, error: errorMessage(err) });
    return json(statusCode, {
        ok: false,
        error: statusCode === 500 ? "Internal Error" : errorMessage(err),
    });
}

export function rawBody(event: Pick<ApiRequest, "body" | "isBase64Encoded">): Buffer {
    const raw = event.body ?? "";
    return event.isBase64Encoded ? Buffer.from(raw, "base64") : Buffer.from(raw, "utf8");
}

export function jsonBody(event: Pick<ApiRequest, "body" | "isBase64Encoded">): unknown {
    const text = rawBody(event).toString("utf8");
    if (!text.trim()) throw new ValidationError("Request body is required");
    try {
        return JSON.parse(text);
    } catch {
        throw new ValidationError("Request body is not valid JSON");
    }
}

export function header(event: Pick<ApiRequest, "headers">, name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [k, v] of Object.entries(event.headers ?? {})) {
        if (k.toLowerCase() === wanted && v !== undefined) return v;
    }
    return undefined;
}
