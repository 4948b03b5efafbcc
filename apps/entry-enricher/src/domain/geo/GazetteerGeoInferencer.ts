/**
 * @fileoverview Gazetteer Geo Inferencer
 *
 * Implements the GeoInferencer and CountryLookup contracts over a static
 * gazetteer. A place matches when one of its names occurs as a whole word
 * in the query (case-insensitive), or equals a hint tag once spaces are
 * removed ("#newyork" matches "New York").
 *
 * The most populous matching place wins. Its marker is displaced from the
 * place center by a distance and bearing derived from the dedup seed, so
 * that different messages about the same place don't stack on one point
 * while the same message always lands on the same marker.
 *
 * @module domain/geo/GazetteerGeoInferencer
 */

import type {
    CountryLookup,
    GeoInferencer,
    LocationCandidate,
    LonLat,
} from "@entrypipe/engine";
import type { Gazetteer, GazetteerPlace } from "../../config/loadGazetteer.js";

export interface GazetteerGeoInferencerConfig {
    readonly gazetteer: Gazetteer;

    /** Maximum marker displacement in degrees (default: 0.01) */
    readonly markerRadius?: number;
}

interface IndexedPlace {
    readonly place: GazetteerPlace;
    readonly patterns: readonly RegExp[];
    readonly tagKeys: ReadonlySet<string>;
}

const kDEFAULT_MARKER_RADIUS = 0.01;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function indexPlace(place: GazetteerPlace): IndexedPlace {
    const names = [place.name, ...place.alternates].map((name) => name.toLowerCase());

    return {
        place,
        patterns: names.map((name) => new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(name)}(?=$|[^\\p{L}\\p{N}])`, "u")),
        tagKeys : new Set(names.map((name) => name.replace(/\s+/g, ""))),
    };
}

/**
 * 32-bit FNV-1a hash of the seed.
 */
function seedHash(seed: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < seed.length; i++) {
        hash ^= seed.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

/**
 * Marker position for a place center and seed. The displacement is at
 * most `radius` degrees in each axis.
 */
export function displaceMarker(lon: number, lat: number, seed: string, radius: number): LonLat {
    const hash     = seedHash(seed);
    const bearing  = ((hash % 3600) / 3600) * 2 * Math.PI;
    const distance = radius * ((((hash >>> 12) % 1000) + 1) / 1000);

    return [lon + distance * Math.cos(bearing), lat + distance * Math.sin(bearing)];
}

/**
 * Gazetteer Geo Inferencer
 *
 * @example
 * ```typescript
 * const geo = new GazetteerGeoInferencer({
 *     gazetteer: loadGazetteer("config/places.json", "config/countries.json"),
 * });
 *
 * geo.analyse("lunch in Berlin", null, 5, "17");
 * // => { lon: 13.4, lat: 52.52, markLon: ..., countryCode: "DE", names: ["Berlin"] }
 * geo.countryName("DE"); // "Germany"
 * ```
 */
export class GazetteerGeoInferencer implements GeoInferencer, CountryLookup {
    private readonly places: readonly IndexedPlace[];
    private readonly gazetteer: Gazetteer;
    private readonly markerRadius: number;

    constructor(config: GazetteerGeoInferencerConfig) {
        this.gazetteer    = config.gazetteer;
        this.markerRadius = config.markerRadius ?? kDEFAULT_MARKER_RADIUS;

        // Most populous first; stable for equal populations.
        this.places = [...config.gazetteer.places]
            .sort((a, b) => b.population - a.population)
            .map(indexPlace);
    }

    analyse(
        query: string,
        hintTags: readonly string[] | null,
        maxResults: number,
        dedupSeed: string
    ): LocationCandidate | null {
        const text = query.toLowerCase();
        const tags = new Set((hintTags ?? []).map((tag) => tag.toLowerCase()));

        const matches = this.places
            .filter((indexed) => this.matches(indexed, text, tags))
            .slice(0, Math.max(maxResults, 1));

        const best = matches[0];
        if (!best) {
            return null;
        }

        const { place } = best;
        const [markLon, markLat] = displaceMarker(place.lon, place.lat, dedupSeed, this.markerRadius);

        return {
            lon        : place.lon,
            lat        : place.lat,
            markLon,
            markLat,
            countryCode: place.countryCode,
            names      : matches.map((match) => match.place.name),
        };
    }

    countryName(code: string): string | null {
        return this.gazetteer.countries.get(code.toUpperCase())?.name ?? null;
    }

    countryCenter(code: string): LonLat | null {
        return this.gazetteer.countries.get(code.toUpperCase())?.center ?? null;
    }

    private matches(indexed: IndexedPlace, text: string, tags: ReadonlySet<string>): boolean {
        for (const tag of tags) {
            if (indexed.tagKeys.has(tag)) {
                return true;
            }
        }
        return indexed.patterns.some((pattern) => pattern.test(text));
    }
}
