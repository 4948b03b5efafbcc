/**
 * Entry Sink Contract
 *
 * Sinks receive every enriched entry together with its encoded document
 * and persist or forward it. A source may have any number of sinks; each
 * one sees every entry.
 */

import type { EncodedEntryDocument } from "../codec/EntryDocument.js";
import type { MessageEntry } from "../entry/MessageEntry.js";
import type { PluginLogger } from "./PluginLogger.js";

/**
 * Context provided to a sink for one entry.
 */
export interface SinkContext {
    /** The enriched entry */
    readonly entry: MessageEntry;

    /** The entry encoded with the source's encode options */
    readonly document: EncodedEntryDocument;

    readonly logger: PluginLogger;

    /** Trace ID of this entry's processing */
    readonly traceId: string;
}

/**
 * Result of writing one entry.
 */
export interface SinkResult {
    readonly sinkId: string;
    readonly success: boolean;

    /** Error message if the write failed */
    readonly error?: string;
}

/**
 * Entry Sink interface.
 *
 * Writes should be idempotent per `document.id_str` where the target
 * allows it; the engine may hand the same entry over again after a
 * restart.
 *
 * @example
 * ```typescript
 * const stdoutSink: EntrySink = {
 *     id: "stdout",
 *     async write(context) {
 *         process.stdout.write(`${JSON.stringify(context.document)}\n`);
 *         return { sinkId: this.id, success: true };
 *     },
 * };
 * ```
 */
export interface EntrySink {
    readonly id: string;
    readonly name?: string;
    readonly description?: string;

    write(context: SinkContext): Promise<SinkResult>;

    /**
     * Flush and release resources. Called when the engine stops.
     */
    close?(): Promise<void>;
}

/**
 * Type guard to check if an object is an EntrySink.
 */
export function isEntrySink(obj: unknown): obj is EntrySink {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "write" in obj &&
        typeof obj.write === "function"
    );
}
