/**
 * Geo Inferencer Contract
 *
 * Resolves a location candidate from a place name or from message text.
 * The geocoding database and algorithm live behind this interface.
 */

/**
 * Coordinate pair in `[longitude, latitude]` order.
 */
export type LonLat = readonly [lon: number, lat: number];

/**
 * A resolved location.
 */
export interface LocationCandidate {
    /** Longitude of the location center */
    readonly lon: number;

    /** Latitude of the location center */
    readonly lat: number;

    /** Longitude of the map marker, displaced from the center */
    readonly markLon: number;

    /** Latitude of the map marker, displaced from the center */
    readonly markLat: number;

    /** ISO 3166 alpha-2 country code */
    readonly countryCode: string;

    /** Names of the matched places, best match first */
    readonly names: readonly string[];
}

/**
 * Geo inferencer interface.
 *
 * Implementations return null rather than throwing when nothing matches.
 */
export interface GeoInferencer {
    /**
     * Resolve a location from free text.
     *
     * @param query - Place name or full message text
     * @param hintTags - Hashtags that may name a place, or null
     * @param maxResults - Maximum number of candidate names to consider
     * @param dedupSeed - Seed used to spread markers of different messages
     * @returns The best candidate, or null
     */
    analyse(
        query: string,
        hintTags: readonly string[] | null,
        maxResults: number,
        dedupSeed: string
    ): LocationCandidate | null;
}

/**
 * Country metadata lookup used when encoding derived fields.
 */
export interface CountryLookup {
    /** English country name for an ISO code, or null if unknown */
    countryName(code: string): string | null;

    /** Country center as `[lon, lat]`, or null if unknown */
    countryCenter(code: string): LonLat | null;
}
