/**
 * @fileoverview Location inference policy
 *
 * Decides how the geo inferencer is queried for an entry that has no
 * location yet, and what a successful answer changes.
 *
 * @module @entrypipe/engine/entry/locationInference
 */

import type { GeoInferencer, LocationCandidate } from "../contracts/GeoInferencer.js";
import type { GeoLocation, LocationSource, PlaceContext } from "./types.js";
import { normalizeCountryCode } from "./types.js";

/**
 * Number of candidates the inferencer may consider per query.
 */
export const GEO_MAX_RESULTS = 5;

/**
 * What the policy needs to know about an entry.
 */
export interface LocationQuery {
    readonly text: string;
    readonly hashtags: readonly string[];
    readonly placeName: string;
    readonly locationSource: LocationSource | null;
}

/**
 * Changes to apply to an entry after a successful inference.
 */
export interface LocationInference {
    readonly location: GeoLocation;
    readonly locationSource: LocationSource;
    readonly placeContext: PlaceContext;

    /** Name to use when the entry has no place name yet */
    readonly candidateName: string | null;

    /** Normalized ISO code, or null if the candidate's code is malformed */
    readonly placeCountry: string | null;
}

/**
 * 32-bit string hash rendered in decimal; seeds marker displacement so
 * messages at the same place get distinct markers.
 */
export function textSeed(text: string): string {
    let hash = 0;
    for (let i = 0; i < text.length; i++) {
        hash = (Math.imul(hash, 31) + text.charCodeAt(i)) | 0;
    }
    return hash.toString();
}

/**
 * A place name lookup is only trusted when nothing more specific than a
 * previous place or annotation lookup set the location source.
 */
function placeNameIsQueryable(query: LocationQuery): boolean {
    return query.placeName.length > 0 && (
        query.locationSource === null ||
        query.locationSource === "ANNOTATION" ||
        query.locationSource === "PLACE"
    );
}

function toInference(
    candidate: LocationCandidate,
    locationSource: LocationSource,
    placeContext: PlaceContext
): LocationInference {
    return {
        location: {
            point : [candidate.lon, candidate.lat],
            mark  : [candidate.markLon, candidate.markLat],
            radius: 0,
        },
        locationSource,
        placeContext,
        candidateName: candidate.names[0] ?? null,
        placeCountry : normalizeCountryCode(candidate.countryCode),
    };
}

/**
 * Infer a location for an entry.
 *
 * 1. Query by place name (no hint tags) when the place name is usable;
 *    a hit means the author is FROM that place.
 * 2. Otherwise, or on a miss, query by full text with hashtags as hints;
 *    a hit means the text is ABOUT that place.
 *
 * @param query - Entry state relevant to the lookup
 * @param geo - Geo inferencer
 * @returns Changes to apply, or null when both lookups miss
 */
export function inferLocation(query: LocationQuery, geo: GeoInferencer): LocationInference | null {
    const seed = textSeed(query.text);

    if (placeNameIsQueryable(query)) {
        const byPlace = geo.analyse(query.placeName, null, GEO_MAX_RESULTS, seed);
        if (byPlace) {
            return toInference(byPlace, "PLACE", "FROM");
        }
    }

    const byText = geo.analyse(query.text, query.hashtags, GEO_MAX_RESULTS, seed);
    if (byText) {
        return toInference(byText, "ANNOTATION", "ABOUT");
    }

    return null;
}
