/**
 * EntryProvider Contract
 *
 * Entry providers are passive sources of raw entry documents. The engine
 * pulls documents during each polling cycle and decodes them itself, so a
 * provider never needs to know the document format beyond "a JSON value".
 *
 * - Passive: providers don't push; the engine pulls
 * - Providers track their own cursor
 */

/**
 * Options for fetching documents.
 */
export interface FetchOptions {
    /** Maximum number of documents to fetch */
    readonly limit?: number;

    /** Fetch documents after this cursor */
    readonly since?: string;
}

/**
 * Result of fetching documents.
 */
export interface FetchResult {
    /** Parsed JSON documents, undecoded */
    readonly documents: readonly unknown[];

    /** Cursor after the last returned document */
    readonly cursor?: string;

    /** Whether more documents are immediately available */
    readonly hasMore: boolean;
}

/**
 * EntryProvider interface.
 *
 * @example
 * ```typescript
 * class QueueProvider implements EntryProvider {
 *     readonly id = "queue";
 *     readonly name = "Capture queue";
 *
 *     async getDocuments(options?: FetchOptions) {
 *         const batch = await this.queue.take(options?.limit ?? 10);
 *         return {
 *             documents: batch.map((item) => JSON.parse(item.body)),
 *             hasMore  : batch.length === options?.limit,
 *         };
 *     }
 * }
 * ```
 */
export interface EntryProvider {
    /** Unique identifier for this provider */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    readonly description?: string;

    /**
     * Called once when the engine starts.
     */
    initialize?(): Promise<void>;

    /**
     * Fetch the next batch of documents.
     */
    getDocuments(options?: FetchOptions): Promise<FetchResult>;

    /**
     * Called once when the engine stops.
     */
    shutdown?(): Promise<void>;

    isHealthy?(): Promise<boolean>;
}
