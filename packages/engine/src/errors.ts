/**
 * @fileoverview Pipeline error hierarchy
 *
 * Malformed-but-parseable input never raises; these errors are reserved
 * for structural failures the caller has to handle.
 *
 * @module @entrypipe/engine/errors
 */

/**
 * Base error for everything raised by the pipeline.
 */
export class EntryPipelineError extends Error {
    readonly code: string;
    readonly recoverable: boolean;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: string,
        recoverable: boolean = true,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.name        = "EntryPipelineError";
        this.code        = code;
        this.recoverable = recoverable;
        this.context     = context;
        Error.captureStackTrace?.(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name       : this.name,
            message    : this.message,
            code       : this.code,
            recoverable: this.recoverable,
            context    : this.context,
        };
    }
}

/**
 * Raised when a document cannot be decoded at all (e.g. it is not an object).
 */
export class EntryDecodeError extends EntryPipelineError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "ENTRY_DECODE_FAILED", true, context);
        this.name = "EntryDecodeError";
    }
}

/**
 * Describe a thrown value for logs and event payloads.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
