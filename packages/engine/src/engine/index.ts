/**
 * @fileoverview Engine barrel exports
 *
 * @module @entrypipe/engine/engine
 */

export {
    EnrichmentEngine,
    type EngineConfig,
    type EngineLogger,
    type SourceRegistration,
} from "./EnrichmentEngine.js";
