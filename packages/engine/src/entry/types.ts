/**
 * @fileoverview Entry value types
 *
 * Closed enumerations and grouped optional values carried by a
 * MessageEntry.
 *
 * @module @entrypipe/engine/entry/types
 */

import type { LonLat } from "../contracts/GeoInferencer.js";

/**
 * Where a message text came from.
 */
export const SOURCE_TYPES = [
    "GENERIC",
    "TWITTER",
    "RSS",
    "USER",
    "IMPORT",
    "GEOJSON",
    "FOSSASIA_API",
    "OPENWIFIMAP",
    "NODELIST",
    "NETMON",
    "FREIFUNK_NODE",
    "NINUX",
] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

/**
 * Who authored the message.
 */
export const PROVIDER_TYPES = ["NOONE", "SCRAPED", "REMOTE", "IMPORT", "GEOJSON"] as const;
export type ProviderType = (typeof PROVIDER_TYPES)[number];

/**
 * Whether a place is where the author is (FROM) or what the text is about (ABOUT).
 */
export const PLACE_CONTEXTS = ["FROM", "ABOUT"] as const;
export type PlaceContext = (typeof PLACE_CONTEXTS)[number];

/**
 * How a location was obtained.
 */
export const LOCATION_SOURCES = ["USER", "REPORT", "PLACE", "ANNOTATION"] as const;
export type LocationSource = (typeof LOCATION_SOURCES)[number];

/**
 * Location of a message. Point and mark only ever exist together.
 */
export interface GeoLocation {
    /** Primary coordinate */
    readonly point: LonLat;

    /** Marker coordinate, within `radius` meters of the point */
    readonly mark: LonLat;

    /** Radius in meters around the point */
    readonly radius: number;
}

/**
 * Validity window of a message. `to` may stay open.
 */
export interface ValidityWindow {
    readonly on: Date;
    readonly to: Date | null;
}

function matchMember<T extends string>(members: readonly T[], value: unknown): T | null {
    if (typeof value !== "string") {
        return null;
    }

    const normalized = value.trim().toUpperCase();
    return members.find((member) => member === normalized) ?? null;
}

/**
 * Parse a source type name (case-insensitive). Unknown names fall back to GENERIC.
 */
export function parseSourceType(value: unknown): SourceType {
    return matchMember(SOURCE_TYPES, value) ?? "GENERIC";
}

/**
 * Parse a provider type name (case-insensitive). Unknown names fall back to NOONE.
 */
export function parseProviderType(value: unknown): ProviderType {
    return matchMember(PROVIDER_TYPES, value) ?? "NOONE";
}

export function parsePlaceContext(value: unknown): PlaceContext | null {
    return matchMember(PLACE_CONTEXTS, value);
}

export function parseLocationSource(value: unknown): LocationSource | null {
    return matchMember(LOCATION_SOURCES, value);
}

/**
 * Country codes are kept only when exactly two characters long.
 */
export function normalizeCountryCode(value: unknown): string | null {
    return typeof value === "string" && value.length === 2 ? value : null;
}
