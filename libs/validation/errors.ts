export type ErrorCode =
    | "ParseError"
    | "ValidationError"
    | "NotFoundError"
    | "AuthError"
    | "IngestError"
    | "ProviderError"
    | "StoreError";

/**
 * Base of every error the pipeline raises on purpose.
 * `details` carries machine-readable context (zod issues, ajv errors, HTTP status).
 */
export class PipelineError extends Error {
    constructor(
        readonly code: ErrorCode,
        message: string,
        readonly details?: unknown,
    ) {
        super(message);
        this.name = code;
    }
}

/** A single row/record is unreadable. Isolated and counted; the batch continues. */
export class ParseError extends PipelineError {
    constructor(message: string, details?: unknown) {
        super("ParseError", message, details);
    }
}

/** A value, unit or timestamp breaks a domain rule. */
export class ValidationError extends PipelineError {
    constructor(message: string, details?: unknown) {
        super("ValidationError", message, details);
    }
}

export class NotFoundError extends PipelineError {
    constructor(message: string) {
        super("NotFoundError", message);
    }
}

/** Credential or token problem reported by a wearable vendor. Never retried here. */
export class AuthError extends PipelineError {
    constructor(message: string, details?: unknown) {
        super("AuthError", message, details);
    }
}

/** Structural failure: the whole upload is rejected (unreadable file, unsupported format). */
export class IngestError extends PipelineError {
    constructor(message: string, details?: unknown) {
        super("IngestError", message, details);
    }
}

export class ProviderError extends PipelineError {
    constructor(message: string, details?: unknown) {
        super("ProviderError", message, details);
    }
}

/** The event or history store refused or failed a write. */
export class StoreError extends PipelineError {
    constructor(message: string, details?: unknown) {
        super("StoreError", message, details);
    }
}

export function isPipelineError(err: unknown): err is PipelineError {
    return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
