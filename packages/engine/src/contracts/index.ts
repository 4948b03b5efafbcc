/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces the enrichment engine is wired through: classifiers, geo
 * inference, providers, sinks, logging and events.
 *
 * @module @entrypipe/engine/contracts
 */

// Content classifier contract
export type {
    Category,
    Classification,
    ClassificationMap,
    ClassifierContext,
    ContentClassifier,
} from "./ContentClassifier.js";
export {
    CLASSIFIER_CONTEXTS,
    CONTEXT_CATEGORIES,
    NONE_CATEGORY,
    isCategoryOf,
    isClassifierContext,
} from "./ContentClassifier.js";

// Geo inference contract
export type {
    CountryLookup,
    GeoInferencer,
    LocationCandidate,
    LonLat,
} from "./GeoInferencer.js";

// Logging
export type { PluginLogger } from "./PluginLogger.js";

// EntryProvider contract
export type {
    EntryProvider,
    FetchOptions,
    FetchResult,
} from "./EntryProvider.js";

// EntrySink contract
export type {
    EntrySink,
    SinkContext,
    SinkResult,
} from "./EntrySink.js";
export { isEntrySink } from "./EntrySink.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
