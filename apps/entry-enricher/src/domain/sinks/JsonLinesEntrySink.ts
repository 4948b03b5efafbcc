/**
 * @fileoverview JSON Lines Entry Sink
 *
 * Implements the EntrySink contract by appending each encoded document as
 * one line of JSON.
 *
 * @module domain/sinks/JsonLinesEntrySink
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import {
    describeError,
    type EntrySink,
    type SinkContext,
    type SinkResult,
} from "@entrypipe/engine";

export interface JsonLinesSinkConfig {
    /** Path of the output file; parent directories are created */
    readonly path: string;

    /** Sink ID (default: "jsonl-sink") */
    readonly id?: string;
}

/**
 * JSON Lines Entry Sink
 *
 * @example
 * ```typescript
 * const sink = new JsonLinesEntrySink({ path: "data/enriched.jsonl" });
 * ```
 */
export class JsonLinesEntrySink implements EntrySink {
    readonly id: string;
    readonly name = "JSON Lines Sink";

    private readonly path: string;
    private directoryReady = false;

    constructor(config: JsonLinesSinkConfig) {
        this.id   = config.id ?? "jsonl-sink";
        this.path = config.path;
    }

    async write(context: SinkContext): Promise<SinkResult> {
        try {
            if (!this.directoryReady) {
                mkdirSync(dirname(this.path), { recursive: true });
                this.directoryReady = true;
            }

            appendFileSync(this.path, `${JSON.stringify(context.document)}\n`, "utf-8");

            context.logger.debug("Entry written", {
                path   : this.path,
                entryId: context.document.id_str,
            });

            return { sinkId: this.id, success: true };
        }
        catch (error) {
            return {
                sinkId : this.id,
                success: false,
                error  : describeError(error),
            };
        }
    }
}
