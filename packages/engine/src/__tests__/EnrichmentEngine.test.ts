/**
 * @fileoverview Unit tests for EnrichmentEngine
 *
 * Tests cover:
 * - Source registration
 * - Engine lifecycle (start/stop)
 * - Document pipeline: decode, enrich, encode, sinks
 * - Event emission and trace IDs
 * - Sink and provider failures
 *
 * @module @entrypipe/engine/__tests__/EnrichmentEngine
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EnrichmentEngine, type EngineConfig, type SourceRegistration } from "../engine/EnrichmentEngine.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { EventPayload } from "../contracts/EventBus.js";
import type { EntryProvider, FetchOptions, FetchResult } from "../contracts/EntryProvider.js";
import type { EntrySink, SinkContext, SinkResult } from "../contracts/EntrySink.js";
import type { ContentClassifier } from "../contracts/ContentClassifier.js";
import type { CountryLookup, GeoInferencer } from "../contracts/GeoInferencer.js";
import type { PluginLogger } from "../contracts/PluginLogger.js";
import { EntryPipelineError } from "../errors.js";

const kDOCUMENT = {
    timestamp : "2024-05-01T09:30:00.000Z",
    created_at: "2024-05-01T09:29:00.000Z",
    id_str    : "1001",
    text      : "sunset https://example.org/p.jpg #beach",
};

/**
 * Create a mock provider that returns its documents only once
 */
function createMockProvider(documents: unknown[] = []): EntryProvider {
    let called = false;

    return {
        id          : "mock-provider",
        name        : "Mock Provider",
        initialize  : vi.fn().mockResolvedValue(undefined),
        shutdown    : vi.fn().mockResolvedValue(undefined),
        getDocuments: vi.fn().mockImplementation(async (): Promise<FetchResult> => {
            if (called) {
                return { documents: [], hasMore: false };
            }
            called = true;
            return { documents, hasMore: false };
        }),
    };
}

/**
 * Create a provider serving `total` documents in pages addressed by a
 * numeric `since` cursor
 */
function createPagingProvider(total: number): EntryProvider {
    const documents = Array.from({ length: total }, (_, index) => ({ ...kDOCUMENT, id_str: String(index + 1) }));

    return {
        id          : "paging-provider",
        name        : "Paging Provider",
        getDocuments: vi.fn(async (options?: FetchOptions): Promise<FetchResult> => {
            const start = options?.since === undefined ? 0 : parseInt(options.since, 10);
            const end   = Math.min(start + (options?.limit ?? total), total);

            return {
                documents: documents.slice(start, end),
                cursor   : String(end),
                hasMore  : end < total,
            };
        }),
    };
}

/**
 * Create a mock sink recording every context it receives
 */
function createMockSink(id: string, result?: Partial<SinkResult>, shouldThrow = false) {
    const contexts: SinkContext[] = [];

    const sink = {
        id,
        write: vi.fn(async (context: SinkContext): Promise<SinkResult> => {
            contexts.push(context);
            if (shouldThrow) {
                throw new Error(`Sink ${id} error`);
            }
            return { sinkId: id, success: true, ...result };
        }),
        close: vi.fn().mockResolvedValue(undefined),
    } satisfies EntrySink;

    return { sink, contexts };
}

function createMockLogger(): PluginLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function createSource(provider: EntryProvider, sinks: EntrySink[], extra: Partial<SourceRegistration> = {}): SourceRegistration {
    return {
        id  : "capture",
        name: "Capture",
        provider,
        sinks,
        ...extra,
    };
}

/**
 * Wait for the initial poll to complete and process documents.
 */
async function waitForInitialPoll(): Promise<void> {
    await vi.advanceTimersByTimeAsync(10);
}

describe("EnrichmentEngine", () => {
    let engine: EnrichmentEngine;
    let eventBus: InMemoryEventBus;
    let logger: PluginLogger;
    let events: EventPayload[];

    function createEngine(config: EngineConfig = {}): EnrichmentEngine {
        return new EnrichmentEngine({
            pollingInterval: 1000,
            batchSize      : 10,
            eventBus,
            logger,
            ...config,
        });
    }

    beforeEach(() => {
        vi.useFakeTimers();
        eventBus = new InMemoryEventBus();
        logger   = createMockLogger();
        events   = [];
        eventBus.subscribe("*", (event) => {
            events.push(event);
        });
        engine = createEngine();
    });

    afterEach(async () => {
        if (engine.isRunning) {
            await engine.stop();
        }
        vi.useRealTimers();
    });

    describe("source registration", () => {
        // Scenario: Register the same source twice
        it("should throw when registering a duplicate source ID", () => {
            const source = createSource(createMockProvider(), []);
            engine.registerSource(source);

            expect(() => engine.registerSource(source)).toThrow(EntryPipelineError);
            expect(() => engine.registerSource(source)).toThrow("Source already registered: capture");
        });

        // Scenario: A sink without a write method
        it("should reject a source whose sink is not an EntrySink", () => {
            const { sink } = createMockSink("out");
            const sinks: EntrySink[] = [sink];
            Reflect.set(sinks, 1, { id: "broken" });

            let thrown: unknown;
            try {
                engine.registerSource(createSource(createMockProvider(), sinks));
            }
            catch (error) {
                thrown = error;
            }

            expect(thrown).toBeInstanceOf(EntryPipelineError);
            expect(thrown).toMatchObject({
                message: "Invalid sink at index 1 of source capture",
                code   : "SINK_INVALID",
                context: { sourceId: "capture", index: 1 },
            });
            expect(() => engine.registerSource(createSource(createMockProvider(), [sink]))).not.toThrow();
        });

        // Scenario: Unregistered sources are no longer polled
        it("should not poll an unregistered source", async () => {
            const provider = createMockProvider([kDOCUMENT]);
            engine.registerSource(createSource(provider, []));
            engine.unregisterSource("capture");

            await engine.poll();

            expect(provider.getDocuments).not.toHaveBeenCalled();
        });
    });

    describe("lifecycle", () => {
        // Scenario: Start and stop
        it("should start, stop and release providers and sinks", async () => {
            const provider = createMockProvider();
            const { sink } = createMockSink("out");
            engine.registerSource(createSource(provider, [sink]));

            await engine.start();
            expect(engine.isRunning).toBe(true);
            expect(provider.initialize).toHaveBeenCalledTimes(1);

            await engine.stop();
            expect(engine.isRunning).toBe(false);
            expect(provider.shutdown).toHaveBeenCalledTimes(1);
            expect(sink.close).toHaveBeenCalledTimes(1);

            expect(events.map((event) => event.type)).toEqual([
                "engine:starting",
                "engine:started",
                "engine:stopping",
                "engine:stopped",
            ]);
        });

        // Scenario: Starting twice
        it("should not start twice", async () => {
            const provider = createMockProvider();
            engine.registerSource(createSource(provider, []));

            await engine.start();
            await engine.start();

            expect(provider.initialize).toHaveBeenCalledTimes(1);
            expect(logger.warn).toHaveBeenCalledWith("Engine already running");
        });

        // Scenario: Provider cannot initialize
        it("should reject start if provider initialization fails", async () => {
            const provider = createMockProvider();
            provider.initialize = vi.fn().mockRejectedValue(new Error("no capture file"));
            engine.registerSource(createSource(provider, []));

            await expect(engine.start()).rejects.toThrow("no capture file");
            expect(engine.isRunning).toBe(false);
        });

        // Scenario: Poll on start and on every interval
        it("should poll immediately and at the configured interval", async () => {
            const provider = createMockProvider([kDOCUMENT]);
            const { sink } = createMockSink("out");
            engine.registerSource(createSource(provider, [sink]));

            await engine.start();
            await waitForInitialPoll();

            expect(provider.getDocuments).toHaveBeenCalledTimes(1);
            expect(provider.getDocuments).toHaveBeenCalledWith({ limit: 10 });
            expect(sink.write).toHaveBeenCalledTimes(1);

            await vi.advanceTimersByTimeAsync(1000);
            expect(provider.getDocuments).toHaveBeenCalledTimes(2);

            await vi.advanceTimersByTimeAsync(1000);
            expect(provider.getDocuments).toHaveBeenCalledTimes(3);
        });

        // Scenario: No polling after stop
        it("should stop polling after engine stops", async () => {
            const provider = createMockProvider();
            engine.registerSource(createSource(provider, []));

            await engine.start();
            await waitForInitialPoll();
            await engine.stop();

            await vi.advanceTimersByTimeAsync(5000);

            expect(provider.getDocuments).toHaveBeenCalledTimes(1);
        });

        // Scenario: A slow poll is not overlapped by the next tick
        it("should skip a tick while the previous poll is running", async () => {
            let release: (result: FetchResult) => void = () => undefined;
            const provider = createMockProvider();
            provider.getDocuments = vi.fn(() => new Promise<FetchResult>((resolve) => {
                release = resolve;
            }));
            engine.registerSource(createSource(provider, []));

            await engine.start();
            await vi.advanceTimersByTimeAsync(2500);

            expect(provider.getDocuments).toHaveBeenCalledTimes(1);

            release({ documents: [], hasMore: false });
            await vi.advanceTimersByTimeAsync(1000);

            expect(provider.getDocuments).toHaveBeenCalledTimes(2);
        });

        // Scenario: Provider fails while polling
        it("should emit engine:error when the provider fails", async () => {
            const provider = createMockProvider();
            provider.getDocuments = vi.fn().mockRejectedValue(new Error("capture unreadable"));
            engine.registerSource(createSource(provider, []));

            await engine.poll();

            const errors = events.filter((event) => event.type === "engine:error");
            expect(errors).toHaveLength(1);
            expect(errors[0]?.data).toEqual({ sourceId: "capture", error: "capture unreadable" });
            expect(logger.error).toHaveBeenCalledWith("Source poll error", {
                sourceId: "capture",
                error   : "capture unreadable",
            });
        });
    });

    describe("cursor and backlog", () => {
        // Scenario: A backlog larger than one batch drains in a single poll
        it("should keep fetching while the provider reports more documents", async () => {
            const provider = createPagingProvider(25);
            const { sink } = createMockSink("out");
            engine.registerSource(createSource(provider, [sink]));

            await engine.poll();

            expect(sink.write).toHaveBeenCalledTimes(25);
            expect(vi.mocked(provider.getDocuments).mock.calls).toEqual([
                [{ limit: 10 }],
                [{ limit: 10, since: "10" }],
                [{ limit: 10, since: "20" }],
            ]);
        });

        // Scenario: The next poll resumes after the last cursor
        it("should pass the last cursor as since on the next poll", async () => {
            const provider = createPagingProvider(3);
            const { sink } = createMockSink("out");
            engine.registerSource(createSource(provider, [sink]));

            await engine.poll();
            await engine.poll();

            expect(sink.write).toHaveBeenCalledTimes(3);
            expect(provider.getDocuments).toHaveBeenLastCalledWith({ limit: 10, since: "3" });
        });

        // Scenario: Provider claims more but returns nothing
        it("should stop draining on an empty batch", async () => {
            const provider = createMockProvider();
            provider.getDocuments = vi.fn().mockResolvedValue({ documents: [], hasMore: true });
            engine.registerSource(createSource(provider, []));

            await engine.poll();

            expect(provider.getDocuments).toHaveBeenCalledTimes(1);
        });
    });

    describe("document pipeline", () => {
        // Scenario: A document passes every stage
        it("should emit pipeline events sharing one trace ID", async () => {
            const { sink } = createMockSink("out");
            const source = createSource(createMockProvider(), [sink]);

            const entry = await engine.processDocument(source, kDOCUMENT);

            expect(entry?.idStr).toBe("1001");
            expect(entry?.hashtags).toEqual(["beach"]);
            expect(events.map((event) => event.type)).toEqual([
                "entry:received",
                "entry:enriched",
                "entry:written",
                "entry:processed",
            ]);

            const traceIds = new Set(events.map((event) => event.traceId));
            expect(traceIds.size).toBe(1);
            expect([...traceIds][0]).toMatch(/^tr_[0-9a-z]+_[0-9a-z]*$/);

            expect(events[1]?.data).toEqual({
                sourceId: "capture",
                entryId : "1001",
                links   : 1,
                hashtags: 1,
                located : false,
            });
            expect(events[2]?.data).toEqual({
                sourceId: "capture",
                entryId : "1001",
                sinkId  : "out",
                success : true,
                error   : undefined,
            });
        });

        // Scenario: Sinks get the encoded document
        it("should hand the encoded document to every sink", async () => {
            const first  = createMockSink("first");
            const second = createMockSink("second");
            const source = createSource(createMockProvider(), [first.sink, second.sink], {
                encode: { includeDerived: false },
            });

            await engine.processDocument(source, kDOCUMENT);

            expect(first.contexts).toHaveLength(1);
            expect(second.contexts).toHaveLength(1);

            const context = first.contexts[0];
            expect(context?.document.id_str).toBe("1001");
            expect(context?.document.timestamp).toBe("2024-05-01T09:30:00.000Z");
            expect(context?.document.links).toBeUndefined();
            expect(context?.traceId).toBe(events[0]?.traceId);
        });

        // Scenario: Full documents by default
        it("should write derived fields when the source sets no encode options", async () => {
            const { sink, contexts } = createMockSink("out");

            await engine.processDocument(createSource(createMockProvider(), [sink]), kDOCUMENT);

            expect(contexts[0]?.document.links).toEqual(["https://example.org/p.jpg"]);
            expect(contexts[0]?.document.images).toEqual(["https://example.org/p.jpg"]);
        });

        // Scenario: Document is not an object
        it("should emit entry:error and return null for a rejected document", async () => {
            const { sink } = createMockSink("out");

            const entry = await engine.processDocument(createSource(createMockProvider(), [sink]), "not a document");

            expect(entry).toBeNull();
            expect(sink.write).not.toHaveBeenCalled();
            expect(events.map((event) => event.type)).toEqual(["entry:received", "entry:error"]);
            expect(events[1]?.data).toEqual({
                sourceId: "capture",
                error   : "Entry document must be a JSON object",
            });
            expect(logger.error).toHaveBeenCalledWith("Entry processing error", {
                sourceId: "capture",
                traceId : events[0]?.traceId,
                error   : {
                    name       : "EntryDecodeError",
                    message    : "Entry document must be a JSON object",
                    code       : "ENTRY_DECODE_FAILED",
                    recoverable: true,
                    context    : { received: "string" },
                },
            });
        });

        // Scenario: Sink reports a failed write
        it("should report an unsuccessful write and continue with the next sink", async () => {
            const failing = createMockSink("failing", { success: false, error: "disk full" });
            const next    = createMockSink("next");

            await engine.processDocument(createSource(createMockProvider(), [failing.sink, next.sink]), kDOCUMENT);

            expect(next.sink.write).toHaveBeenCalledTimes(1);
            expect(logger.warn).toHaveBeenCalledWith("Sink write failed", {
                sourceId: "capture",
                sinkId  : "failing",
                entryId : "1001",
                error   : "disk full",
            });

            const written = events.filter((event) => event.type === "entry:written");
            expect(written.map((event) => event.data?.success)).toEqual([false, true]);
        });

        // Scenario: Sink throws
        it("should emit entry:sinkError and still finish the entry", async () => {
            const throwing = createMockSink("throwing", undefined, true);
            const next     = createMockSink("next");

            await engine.processDocument(createSource(createMockProvider(), [throwing.sink, next.sink]), kDOCUMENT);

            expect(next.sink.write).toHaveBeenCalledTimes(1);
            expect(events.map((event) => event.type)).toEqual([
                "entry:received",
                "entry:enriched",
                "entry:sinkError",
                "entry:written",
                "entry:processed",
            ]);
            expect(events[2]?.data).toEqual({
                sourceId: "capture",
                entryId : "1001",
                sinkId  : "throwing",
                error   : "Sink throwing error",
            });
        });
    });

    describe("enrichment collaborators", () => {
        // Scenario: Classifier and country lookup reach the encoded document
        it("should classify and name the country", async () => {
            const classifier: ContentClassifier = {
                id      : "fixed",
                classify: vi.fn(() => ({ language: { category: "english" as const, probability: 0.9 } })),
            };
            const countries: CountryLookup = {
                countryName  : (code) => (code === "DE" ? "Germany" : null),
                countryCenter: () => null,
            };
            engine = createEngine({ classifier, countries });
            const { sink, contexts } = createMockSink("out");

            await engine.processDocument(createSource(createMockProvider(), [sink]), {
                ...kDOCUMENT,
                place_country: "DE",
            });

            expect(classifier.classify).toHaveBeenCalledWith(kDOCUMENT.text);
            expect(contexts[0]?.document.classifier_language).toBe("english");
            expect(contexts[0]?.document.classifier_language_probability).toBe(0.9);
            expect(contexts[0]?.document.place_country).toBe("Germany");
            expect(contexts[0]?.document.place_country_code).toBe("DE");
        });

        // Scenario: Geo inferencer locates the entry by place name
        it("should locate entries through the geo inferencer", async () => {
            const geo: GeoInferencer = {
                analyse: vi.fn((query: string) => (query === "Pier" ? {
                    lon        : 13.4,
                    lat        : 52.52,
                    markLon    : 13.41,
                    markLat    : 52.53,
                    countryCode: "DE",
                    names      : ["Pier"],
                } : null)),
            };
            engine = createEngine({ geo });
            const { sink, contexts } = createMockSink("out");

            await engine.processDocument(createSource(createMockProvider(), [sink]), {
                ...kDOCUMENT,
                place_name: "Pier",
            });

            expect(contexts[0]?.document.location_point).toEqual([13.4, 52.52]);
            expect(contexts[0]?.document.location_source).toBe("PLACE");
            expect(contexts[0]?.document.place_context).toBe("FROM");
            expect(events[1]?.data?.located).toBe(true);
        });

        // Scenario: Missing dates use the configured clock
        it("should use the configured clock for missing dates", async () => {
            engine = createEngine({ now: () => new Date("2030-01-01T00:00:00.000Z") });
            const { sink, contexts } = createMockSink("out");

            await engine.processDocument(createSource(createMockProvider(), [sink]), { id_str: "7" });

            expect(contexts[0]?.document.timestamp).toBe("2030-01-01T00:00:00.000Z");
            expect(contexts[0]?.document.created_at).toBe("2030-01-01T00:00:00.000Z");
            expect(logger.warn).toHaveBeenCalledWith(
                "[capture:codec] Unparsable date, falling back to current time",
                expect.objectContaining({ field: "timestamp", idStr: "7" })
            );
        });
    });
});
