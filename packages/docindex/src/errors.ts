// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * Base class for every error the index raises on purpose.
 * Anything else reaching a caller is a bug.
 */
export class DocIndexError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "DocIndexError";
    }
}

/**
 * The blob source could not list or fetch objects.
 * Listing failures abort a sync; fetch failures skip the one path.
 */
export class SourceUnavailableError extends DocIndexError {
    constructor(
        message: string,
        public readonly path?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "SourceUnavailableError";
    }
}

/**
 * A document could not be parsed (malformed front-matter).
 */
export class ParseError extends DocIndexError {
    constructor(
        message: string,
        public readonly path: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "ParseError";
    }
}

/**
 * The persistence layer failed. The operation was rolled back and can be
 * retried.
 */
export class StoreError extends DocIndexError {
    constructor(
        public readonly operation: string,
        options?: { cause?: unknown },
    ) {
        super(
            `Index store operation '${operation}' failed: ${describeError(options?.cause)}`,
            options,
        );
        this.name = "StoreError";
    }
}

/**
 * Query parameters were rejected. Surfaced to callers as a client error.
 */
export class InvalidFilterError extends DocIndexError {
    constructor(
        message: string,
        public readonly parameter?: string,
    ) {
        super(message);
        this.name = "InvalidFilterError";
    }
}

/**
 * The summarization backend did not answer within its time budget.
 */
export class BackendTimeoutError extends DocIndexError {
    constructor(public readonly timeoutMs: number) {
        super(`Summarization backend timed out after ${timeoutMs}ms`);
        this.name = "BackendTimeoutError";
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return error === undefined ? "unknown error" : String(error);
}
