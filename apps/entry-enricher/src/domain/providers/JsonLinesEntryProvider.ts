/**
 * @fileoverview JSON Lines Entry Provider
 *
 * Implements the EntryProvider contract over a capture file holding one
 * JSON document per line. The provider remembers how many lines it has
 * consumed and resumes from there on the next poll.
 *
 * @module domain/providers/JsonLinesEntryProvider
 */

import { existsSync, readFileSync } from "fs";
import {
    consoleLogger,
    decodeHtmlEntities,
    describeError,
    type EntryProvider,
    type FetchOptions,
    type FetchResult,
    type PluginLogger,
} from "@entrypipe/engine";

export interface JsonLinesProviderConfig {
    /** Path of the capture file */
    readonly path: string;

    /** Decode legacy HTML escapes in string `text` fields (default: false) */
    readonly decodeHtmlEntities?: boolean;

    /** Documents per fetch when the engine gives no limit (default: 100) */
    readonly defaultLimit?: number;

    readonly logger?: PluginLogger;
}

/**
 * JSON Lines Entry Provider
 *
 * - Blank lines are skipped
 * - Unparsable lines are logged and skipped
 * - A final line without a newline is treated as still being written and
 *   left for the next poll
 *
 * @example
 * ```typescript
 * const provider = new JsonLinesEntryProvider({ path: "data/capture.jsonl" });
 *
 * const result = await provider.getDocuments({ limit: 10 });
 * result.cursor; // "10" - number of lines consumed
 * ```
 */
export class JsonLinesEntryProvider implements EntryProvider {
    readonly id = "jsonl-provider";
    readonly name = "JSON Lines Provider";
    readonly description = "Reads entry documents from a JSON-lines capture file";

    private readonly config: {
        path: string;
        decodeHtmlEntities: boolean;
        defaultLimit: number;
        logger: PluginLogger;
    };
    private nextLine: number = 0;

    constructor(config: JsonLinesProviderConfig) {
        this.config = {
            path              : config.path,
            decodeHtmlEntities: config.decodeHtmlEntities ?? false,
            defaultLimit      : config.defaultLimit ?? 100,
            logger            : config.logger ?? consoleLogger,
        };
    }

    /**
     * Fetch the next documents.
     *
     * @param options - `limit` caps the batch; `since` is a line cursor
     *                  from an earlier result
     */
    async getDocuments(options: FetchOptions = {}): Promise<FetchResult> {
        const limit = options.limit ?? this.config.defaultLimit;

        if (options.since !== undefined) {
            const since = parseInt(options.since, 10);
            if (Number.isInteger(since) && since >= 0) {
                this.nextLine = since;
            }
        }

        if (!existsSync(this.config.path)) {
            return { documents: [], cursor: this.nextLine.toString(), hasMore: false };
        }

        const lines = this.completeLines(readFileSync(this.config.path, "utf-8"));
        const documents: unknown[] = [];

        while (this.nextLine < lines.length && documents.length < limit) {
            const lineNumber = this.nextLine + 1;
            const line = lines[this.nextLine]?.trim() ?? "";
            this.nextLine++;

            if (line.length === 0) {
                continue;
            }

            try {
                documents.push(this.prepare(JSON.parse(line)));
            }
            catch (error) {
                this.config.logger.warn("Skipping unparsable line", {
                    path : this.config.path,
                    line : lineNumber,
                    error: describeError(error),
                });
            }
        }

        return {
            documents,
            cursor : this.nextLine.toString(),
            hasMore: this.nextLine < lines.length,
        };
    }

    async isHealthy(): Promise<boolean> {
        return existsSync(this.config.path);
    }

    private completeLines(content: string): string[] {
        const lines = content.split("\n");
        // Whatever follows the last newline is incomplete (or empty).
        lines.pop();
        return lines;
    }

    private prepare(document: unknown): unknown {
        if (!this.config.decodeHtmlEntities || typeof document !== "object" || document === null || Array.isArray(document)) {
            return document;
        }

        if (!("text" in document) || typeof document.text !== "string") {
            return document;
        }

        return { ...document, text: decodeHtmlEntities(document.text) };
    }
}
