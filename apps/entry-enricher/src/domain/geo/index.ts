/**
 * @fileoverview Domain geo barrel exports
 *
 * @module domain/geo
 */

export {
    GazetteerGeoInferencer,
    displaceMarker,
    type GazetteerGeoInferencerConfig,
} from "./GazetteerGeoInferencer.js";
