import type { ApiRequest } from "../http/response";
import { createAppContext, type AppContext } from "./context";

export const TEST_NOW = new Date("2025-08-17T10:00:00Z");

/** In-memory context with a fixed clock and a no-op audit sink. */
export function testContext(overrides: Partial<AppContext> = {}): AppContext {
    return createAppContext({}, { clock: () => TEST_NOW, audit: async () => undefined, ...overrides });
}

export function apiRequest(over: Partial<ApiRequest> = {}): ApiRequest {
    return {
        body: null,
        isBase64Encoded: false,
        headers: {},
        queryStringParameters: null,
        pathParameters: null,
        ...over,
    };
}
