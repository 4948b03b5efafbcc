/**
 * @fileoverview Application wiring
 *
 * Builds the enrichment engine and the capture source from a loaded
 * configuration.
 *
 * @module wiring
 */

import {
    EnrichmentEngine,
    type EngineLogger,
    type SourceRegistration,
} from "@entrypipe/engine";
import {
    loadClassifierRulesWithFallback,
    loadGazetteerWithFallback,
    type EnricherConfig,
} from "./config/index.js";
import {
    GazetteerGeoInferencer,
    JsonLinesEntryProvider,
    JsonLinesEntrySink,
    KeywordClassifier,
} from "./domain/index.js";

/**
 * Create the capture source: JSON-lines in, JSON-lines out.
 */
export function createCaptureSource(config: EnricherConfig, logger: EngineLogger): SourceRegistration {
    return {
        id      : "capture",
        name    : "Capture file",
        provider: new JsonLinesEntryProvider({
            path              : config.input,
            decodeHtmlEntities: config.decodeHtmlEntities,
            logger,
        }),
        sinks : [new JsonLinesEntrySink({ path: config.output })],
        encode: config.encode,
    };
}

/**
 * Create the engine with classifier and gazetteer loaded from the data
 * files named in the configuration, and register the capture source.
 */
export function createEnricher(config: EnricherConfig, logger: EngineLogger): EnrichmentEngine {
    const rules     = loadClassifierRulesWithFallback(config.data.classifier);
    const gazetteer = loadGazetteerWithFallback(config.data.places, config.data.countries);
    const geo       = new GazetteerGeoInferencer({ gazetteer });

    logger.info("Enrichment data loaded", {
        contexts : Object.keys(rules).length,
        places   : gazetteer.places.length,
        countries: gazetteer.countries.size,
    });

    const engine = new EnrichmentEngine({
        pollingInterval: config.pollingInterval,
        batchSize      : config.batchSize,
        classifier     : new KeywordClassifier({ rules }),
        geo,
        countries      : geo,
        logger,
    });

    engine.registerSource(createCaptureSource(config, logger));
    return engine;
}
