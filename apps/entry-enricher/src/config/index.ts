/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadEnricherConfig,
    loadEnricherConfigWithFallback,
    applyEnvOverrides,
    getDefaultConfig,
    type EnricherConfig,
    type EnricherEnv,
} from "./loadConfig.js";
export {
    loadClassifierRules,
    loadClassifierRulesWithFallback,
    parseClassifierRules,
    type CategoryRule,
    type KeywordRules,
} from "./loadClassifierRules.js";
export {
    loadGazetteer,
    loadGazetteerWithFallback,
    parseCountries,
    parsePlaces,
    type Gazetteer,
    type GazetteerCountry,
    type GazetteerPlace,
} from "./loadGazetteer.js";
