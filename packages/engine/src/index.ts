/**
 * @fileoverview Entry enrichment engine
 *
 * Message entry model, text analysis, JSON codec and the polling engine
 * that ties providers, enrichment and sinks together.
 *
 * @module @entrypipe/engine
 * @example
 * ```typescript
 * import { decodeEntry, encodeEntry } from "@entrypipe/engine";
 *
 * const entry = decodeEntry(JSON.parse(line), { classifier, geo });
 * const doc   = encodeEntry(entry, { includeDerived: true });
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    Category,
    Classification,
    ClassificationMap,
    ClassifierContext,
    ContentClassifier,
    CountryLookup,
    GeoInferencer,
    LocationCandidate,
    LonLat,
    PluginLogger,
    EntryProvider,
    FetchOptions,
    FetchResult,
    EntrySink,
    SinkContext,
    SinkResult,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./contracts/index.js";
export {
    CLASSIFIER_CONTEXTS,
    CONTEXT_CATEGORIES,
    NONE_CATEGORY,
    isCategoryOf,
    isClassifierContext,
    isEntrySink,
    createEvent,
} from "./contracts/index.js";

// ============================================================================
// Entry model, text analysis and codec
// ============================================================================

export * from "./entry/index.js";
export * from "./text/index.js";
export * from "./codec/index.js";

export {
    EntryPipelineError,
    EntryDecodeError,
    describeError,
} from "./errors.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus, consoleLogger, type InMemoryEventBusOptions } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    EnrichmentEngine,
    type EngineConfig,
    type EngineLogger,
    type SourceRegistration,
} from "./engine/index.js";
