/**
 * @fileoverview Date helpers for the entry codec
 *
 * Dates are written as ISO-8601 UTC with milliseconds,
 * e.g. "2024-05-01T09:30:00.000Z".
 *
 * @module @entrypipe/engine/codec/dates
 */

/**
 * Format a date in the document's fixed UTC format.
 */
export function formatUtc(date: Date): string {
    return date.toISOString();
}

/**
 * Parse a document date: an ISO/RFC date string or epoch milliseconds.
 *
 * @returns The date, or null when the value is missing or unparsable
 */
export function parseDocumentDate(value: unknown): Date | null {
    let date: Date | null = null;

    if (typeof value === "string" && value.trim().length > 0) {
        date = new Date(value);
    }
    else if (typeof value === "number" && Number.isFinite(value)) {
        date = new Date(value);
    }

    return date !== null && !Number.isNaN(date.getTime()) ? date : null;
}
