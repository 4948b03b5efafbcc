/**
 * @fileoverview EnrichmentEngine
 *
 * Orchestrates the entry pipeline.
 *
 * Pipeline flow:
 * 1. Documents pulled from each source's provider
 * 2. Each document decoded into a MessageEntry and enriched
 * 3. Entry encoded with the source's encode options
 * 4. Encoded document handed to every sink of the source
 *
 * The engine is pull-based and observable: it polls providers on an
 * interval and emits events at each stage.
 *
 * @module @entrypipe/engine/engine/EnrichmentEngine
 */

import { decodeEntry } from "../codec/decodeEntry.js";
import { encodeEntry, type EncodeOptions } from "../codec/encodeEntry.js";
import type { EncodedEntryDocument } from "../codec/EntryDocument.js";
import type { ContentClassifier } from "../contracts/ContentClassifier.js";
import type { EntryProvider } from "../contracts/EntryProvider.js";
import type { EntrySink, SinkContext, SinkResult } from "../contracts/EntrySink.js";
import { isEntrySink } from "../contracts/EntrySink.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { CountryLookup, GeoInferencer } from "../contracts/GeoInferencer.js";
import type { PluginLogger } from "../contracts/PluginLogger.js";
import type { MessageEntry } from "../entry/MessageEntry.js";
import { EntryPipelineError, describeError } from "../errors.js";
import { consoleLogger } from "../impl/consoleLogger.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

/**
 * Source registration - everything needed to process one document stream.
 */
export interface SourceRegistration {
    /** Unique identifier for this source */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    readonly provider: EntryProvider;

    /** Sinks receiving every processed entry */
    readonly sinks: EntrySink[];

    /** Encode options for this source's documents (default: full documents) */
    readonly encode?: EncodeOptions;
}

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Polling interval in milliseconds (default: 30000) */
    readonly pollingInterval?: number;

    /** Maximum documents to fetch per poll (default: 10) */
    readonly batchSize?: number;

    /** Classifier used during enrichment */
    readonly classifier?: ContentClassifier | null;

    /** Geo inferencer used during enrichment */
    readonly geo?: GeoInferencer | null;

    /** Country lookup used when encoding */
    readonly countries?: CountryLookup | null;

    /** Clock for documents with missing dates (default: `new Date()`) */
    readonly now?: () => Date;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;
}

/**
 * Logger interface for the engine.
 */
export type EngineLogger = PluginLogger;

/**
 * Generate a unique trace ID for one document.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * EnrichmentEngine - polls sources, enriches entries and writes them out.
 *
 * @example
 * ```typescript
 * const engine = new EnrichmentEngine({
 *     pollingInterval: 10000,
 *     classifier,
 *     geo      : gazetteer,
 *     countries: gazetteer,
 * });
 *
 * engine.registerSource({
 *     id      : "capture",
 *     name    : "Capture file",
 *     provider: new JsonLinesEntryProvider({ path: "capture.jsonl" }),
 *     sinks   : [new JsonLinesEntrySink({ path: "enriched.jsonl" })],
 *     encode  : { linkLengthThreshold: 80, shortlinkStub: "https://sho.rt" },
 * });
 *
 * engine.eventBus.subscribe("entry:processed", (event) => {
 *     console.log("Processed:", event.data);
 * });
 *
 * await engine.start();
 * ```
 */
export class EnrichmentEngine {
    private readonly config: {
        pollingInterval: number;
        batchSize: number;
        classifier: ContentClassifier | null;
        geo: GeoInferencer | null;
        countries: CountryLookup | null;
        now: (() => Date) | undefined;
        logger: EngineLogger;
    };

    private readonly sources: Map<string, SourceRegistration> = new Map();

    /** Last cursor returned by each source's provider */
    private readonly cursors: Map<string, string> = new Map();
    private running = false;
    private polling = false;
    private pollTimer: NodeJS.Timeout | null = null;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig = {}) {
        const logger = config.logger ?? consoleLogger;

        this.eventBus = config.eventBus ?? new InMemoryEventBus({ logger });

        this.config = {
            pollingInterval: config.pollingInterval ?? 30000,
            batchSize      : config.batchSize ?? 10,
            classifier     : config.classifier ?? null,
            geo            : config.geo ?? null,
            countries      : config.countries ?? null,
            now            : config.now,
            logger,
        };
    }

    /**
     * Register a source with the engine.
     *
     * @throws EntryPipelineError if a source with the same ID is already
     *   registered or one of its sinks lacks an `id` or `write`
     */
    registerSource(source: SourceRegistration): void {
        if (this.sources.has(source.id)) {
            throw new EntryPipelineError(`Source already registered: ${source.id}`, "SOURCE_DUPLICATE", false, {
                sourceId: source.id,
            });
        }

        source.sinks.forEach((sink: unknown, index) => {
            if (!isEntrySink(sink)) {
                throw new EntryPipelineError(`Invalid sink at index ${index} of source ${source.id}`, "SINK_INVALID", false, {
                    sourceId: source.id,
                    index,
                });
            }
        });

        this.sources.set(source.id, source);
        this.config.logger.info("Source registered", {
            sourceId: source.id,
            name    : source.name,
            sinks   : source.sinks.length,
        });
    }

    unregisterSource(sourceId: string): void {
        this.cursors.delete(sourceId);
        if (this.sources.delete(sourceId)) {
            this.config.logger.info("Source unregistered", { sourceId });
        }
    }

    /**
     * Start the engine.
     *
     * Initializes all providers, polls once immediately, then every
     * `pollingInterval` milliseconds.
     */
    async start(): Promise<void> {
        if (this.running) {
            this.config.logger.warn("Engine already running");
            return;
        }

        this.emit(createEvent("engine:starting"));
        this.config.logger.info("Engine starting...");

        for (const source of this.sources.values()) {
            try {
                if (source.provider.initialize) {
                    await source.provider.initialize();
                }
                this.config.logger.info("Provider initialized", {
                    sourceId  : source.id,
                    providerId: source.provider.id,
                });
            }
            catch (error) {
                this.config.logger.error("Provider initialization failed", {
                    sourceId: source.id,
                    error   : describeError(error),
                });
                throw error;
            }
        }

        this.running = true;

        this.schedulePoll();
        this.pollTimer = setInterval(() => this.schedulePoll(), this.config.pollingInterval);

        this.emit(createEvent("engine:started", {
            sources        : Array.from(this.sources.keys()),
            pollingInterval: this.config.pollingInterval,
        }));

        this.config.logger.info("Engine started", {
            sources        : this.sources.size,
            pollingInterval: this.config.pollingInterval,
        });
    }

    /**
     * Stop the engine.
     *
     * Stops the polling loop, shuts down providers and closes sinks.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }

        this.emit(createEvent("engine:stopping"));
        this.config.logger.info("Engine stopping...");

        this.running = false;

        if (this.pollTimer) {
            clearInterval(this.pollTimer);
            this.pollTimer = null;
        }

        for (const source of this.sources.values()) {
            try {
                if (source.provider.shutdown) {
                    await source.provider.shutdown();
                }
                for (const sink of source.sinks) {
                    if (sink.close) {
                        await sink.close();
                    }
                }
            }
            catch (error) {
                this.config.logger.error("Source shutdown error", {
                    sourceId: source.id,
                    error   : describeError(error),
                });
            }
        }

        this.emit(createEvent("engine:stopped"));
        this.config.logger.info("Engine stopped");
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Poll every registered source once.
     *
     * A failing source is logged and reported as `engine:error`; the
     * remaining sources are still polled.
     */
    async poll(): Promise<void> {
        for (const source of this.sources.values()) {
            try {
                await this.pollSource(source);
            }
            catch (error) {
                this.config.logger.error("Source poll error", {
                    sourceId: source.id,
                    error   : describeError(error),
                });
                this.emit(createEvent("engine:error", {
                    sourceId: source.id,
                    error   : describeError(error),
                }));
            }
        }
    }

    /**
     * Run one poll unless the previous one is still in progress.
     */
    private schedulePoll(): void {
        if (this.polling) {
            this.config.logger.debug("Previous poll still running, skipping");
            return;
        }

        this.polling = true;
        this.poll()
            .catch((error: unknown) => {
                this.config.logger.error("Poll failed", { error: describeError(error) });
            })
            .finally(() => {
                this.polling = false;
            });
    }

    /**
     * Drain a source: fetch batches from the last cursor until the provider
     * reports nothing more or returns an empty batch.
     */
    private async pollSource(source: SourceRegistration): Promise<void> {
        let hasMore = true;

        while (hasMore) {
            const since  = this.cursors.get(source.id);
            const result = await source.provider.getDocuments({
                limit: this.config.batchSize,
                ...(since !== undefined && { since }),
            });

            if (result.cursor !== undefined) {
                this.cursors.set(source.id, result.cursor);
            }

            if (result.documents.length === 0) {
                return;
            }

            this.config.logger.debug("Fetched documents", {
                sourceId: source.id,
                count   : result.documents.length,
                cursor  : result.cursor,
            });

            for (const document of result.documents) {
                await this.processDocument(source, document);
            }

            hasMore = result.hasMore;
        }
    }

    /**
     * Process a single document through decode, enrichment, encoding and
     * the source's sinks.
     *
     * 1. Assign trace ID, emit entry:received
     * 2. Decode and enrich, emit entry:enriched
     * 3. Encode with the source's options
     * 4. Write to every sink, emit entry:written or entry:sinkError
     * 5. Emit entry:processed
     *
     * Failures are reported as entry:error and never thrown.
     *
     * @returns The enriched entry, or null if the document was rejected
     */
    async processDocument(source: SourceRegistration, document: unknown): Promise<MessageEntry | null> {
        const traceId   = generateTraceId();
        const startTime = Date.now();

        this.emit(createEvent("entry:received", { sourceId: source.id }, traceId));

        try {
            const entry = decodeEntry(document, {
                classifier: this.config.classifier,
                geo       : this.config.geo,
                logger    : this.createPluginLogger(source.id, "codec", traceId),
                ...(this.config.now && { now: this.config.now }),
            });

            this.emit(createEvent("entry:enriched", {
                sourceId: source.id,
                entryId : entry.idStr,
                links   : entry.links.length,
                hashtags: entry.hashtags.length,
                located : entry.location !== null,
            }, traceId));

            const encoded = encodeEntry(entry, source.encode, { countries: this.config.countries });

            await this.writeToSinks(source, entry, encoded, traceId);

            const duration = Date.now() - startTime;
            this.emit(createEvent("entry:processed", {
                sourceId: source.id,
                entryId : entry.idStr,
                duration,
            }, traceId));

            this.config.logger.debug("Entry processed", {
                sourceId: source.id,
                entryId : entry.idStr,
                traceId,
                duration,
            });

            return entry;
        }
        catch (error) {
            this.emit(createEvent("entry:error", {
                sourceId: source.id,
                error   : describeError(error),
            }, traceId));

            this.config.logger.error("Entry processing error", {
                sourceId: source.id,
                traceId,
                error   : error instanceof EntryPipelineError ? error.toJSON() : describeError(error),
            });

            return null;
        }
    }

    private async writeToSinks(
        source: SourceRegistration,
        entry: MessageEntry,
        document: EncodedEntryDocument,
        traceId: string
    ): Promise<void> {
        for (const sink of source.sinks) {
            try {
                const context: SinkContext = {
                    entry,
                    document,
                    logger: this.createPluginLogger(source.id, sink.id, traceId),
                    traceId,
                };

                const result: SinkResult = await sink.write(context);

                this.emit(createEvent("entry:written", {
                    sourceId: source.id,
                    entryId : entry.idStr,
                    sinkId  : sink.id,
                    success : result.success,
                    error   : result.error,
                }, traceId));

                if (!result.success) {
                    this.config.logger.warn("Sink write failed", {
                        sourceId: source.id,
                        sinkId  : sink.id,
                        entryId : entry.idStr,
                        error   : result.error,
                    });
                }
            }
            catch (error) {
                this.config.logger.error("Sink error", {
                    sourceId: source.id,
                    sinkId  : sink.id,
                    entryId : entry.idStr,
                    error   : describeError(error),
                });

                this.emit(createEvent("entry:sinkError", {
                    sourceId: source.id,
                    entryId : entry.idStr,
                    sinkId  : sink.id,
                    error   : describeError(error),
                }, traceId));
            }
        }
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    /**
     * Create a logger for a plugin (codec or sink) scoped to a source.
     */
    private createPluginLogger(sourceId: string, pluginId: string, traceId: string): PluginLogger {
        return {
            debug: (msg, data) => this.config.logger.debug(`[${sourceId}:${pluginId}] ${msg}`, { ...data, traceId }),
            info : (msg, data) => this.config.logger.info(`[${sourceId}:${pluginId}] ${msg}`, { ...data, traceId }),
            warn : (msg, data) => this.config.logger.warn(`[${sourceId}:${pluginId}] ${msg}`, { ...data, traceId }),
            error: (msg, data) => this.config.logger.error(`[${sourceId}:${pluginId}] ${msg}`, { ...data, traceId }),
        };
    }
}
