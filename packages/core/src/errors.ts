/**
 * Stable error codes surfaced by rowsession core, backends and adapters.
 */
export type ErrorCode =
    | "CONFIGURATION_ERROR"
    | "STORE_UNAVAILABLE"
    | "BACKEND_FAILURE"
    | "LOCK_TIMEOUT"
    | "INVALID_STATE"
    | "INTERNAL_ERROR";

/**
 * Canonical error type used across rowsession packages.
 */
export class SessionStoreError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public override readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SessionStoreError";
        this.details = details;
    }
}

/**
 * JSON-safe error response shape used by adapters.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Logger contract used for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Creates a normalized error response body.
 */
export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

/**
 * Type guard for {@link SessionStoreError}.
 */
export function isSessionStoreError(error: unknown): error is SessionStoreError {
    return error instanceof SessionStoreError;
}

/**
 * Shorthand for the fatal errors raised while validating options.
 */
export function configurationError(message: string, details?: Record<string, unknown>): SessionStoreError {
    return new SessionStoreError("CONFIGURATION_ERROR", message, undefined, details);
}

/**
 * Maps {@link ErrorCode} to an HTTP status code.
 */
export function statusFromErrorCode(code: ErrorCode): number {
    switch (code) {
        case "STORE_UNAVAILABLE":
        case "BACKEND_FAILURE":
        case "LOCK_TIMEOUT":
            return 503;
        case "CONFIGURATION_ERROR":
        case "INVALID_STATE":
        case "INTERNAL_ERROR":
        default:
            return 500;
    }
}
