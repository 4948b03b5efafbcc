/**
 * @fileoverview Entry model barrel exports
 *
 * @module @entrypipe/engine/entry
 */

export {
    MessageEntry,
    type EnrichmentContext,
    type MessageEntryInit,
} from "./MessageEntry.js";
export {
    GEO_MAX_RESULTS,
    inferLocation,
    textSeed,
    type LocationInference,
    type LocationQuery,
} from "./locationInference.js";
export {
    LOCATION_SOURCES,
    PLACE_CONTEXTS,
    PROVIDER_TYPES,
    SOURCE_TYPES,
    normalizeCountryCode,
    parseLocationSource,
    parsePlaceContext,
    parseProviderType,
    parseSourceType,
    type GeoLocation,
    type LocationSource,
    type PlaceContext,
    type ProviderType,
    type SourceType,
    type ValidityWindow,
} from "./types.js";
