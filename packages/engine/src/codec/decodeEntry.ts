/**
 * @fileoverview Entry decoder
 *
 * Rehydrates a MessageEntry from a JSON document. Malformed fields never
 * raise: each one falls back to a documented default. Only a document
 * that is not an object at all is rejected.
 *
 * @module @entrypipe/engine/codec/decodeEntry
 */

import type { LonLat } from "../contracts/GeoInferencer.js";
import { EntryDecodeError } from "../errors.js";
import { MessageEntry, type EnrichmentContext } from "../entry/MessageEntry.js";
import {
    normalizeCountryCode,
    parseLocationSource,
    parsePlaceContext,
    parseProviderType,
    parseSourceType,
    type GeoLocation,
    type LocationSource,
    type ValidityWindow,
} from "../entry/types.js";
import { parseUrl } from "../utils/parseUrl.js";
import { parseDocumentDate } from "./dates.js";

/**
 * Collaborators and options for decoding.
 */
export interface DecodeContext extends EnrichmentContext {
    /** Clock used for missing or unparsable dates (default: `new Date()`) */
    readonly now?: () => Date;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    return Array.isArray(value) ? "array" : typeof value;
}

function readString(doc: JsonObject, key: string): string {
    const value = doc[key];
    return typeof value === "string" ? value : "";
}

/**
 * Counters are non-negative integers; anything else reads as 0.
 */
function readCount(doc: JsonObject, key: string): number {
    const value = doc[key];
    return typeof value === "number" && Number.isFinite(value) && value >= 0 ? Math.trunc(value) : 0;
}

/**
 * A list field may be an array of strings or a single string.
 */
function readStringList(doc: JsonObject, key: string): string[] {
    const value = doc[key];

    if (typeof value === "string") {
        return [value];
    }
    if (Array.isArray(value)) {
        return value.filter((item): item is string => typeof item === "string");
    }
    return [];
}

function readLonLat(value: unknown): LonLat | null {
    if (!Array.isArray(value) || value.length < 2) {
        return null;
    }

    const [lon, lat]: unknown[] = value;
    if (typeof lon !== "number" || typeof lat !== "number" || !Number.isFinite(lon) || !Number.isFinite(lat)) {
        return null;
    }

    return [lon, lat];
}

/**
 * `text` is either a plain string or the encoded `{ text, unshorten }` object.
 */
function readText(doc: JsonObject): string {
    const value = doc.text;

    if (typeof value === "string") {
        return value;
    }
    if (isJsonObject(value) && typeof value.text === "string") {
        return value.text;
    }
    return "";
}

/**
 * Timestamps that cannot be parsed fall back to the current time; the
 * fallback is logged so corrupted captures stay visible.
 */
function readRequiredDate(doc: JsonObject, key: string, context: DecodeContext): Date {
    const parsed = parseDocumentDate(doc[key]);
    if (parsed) {
        return parsed;
    }

    context.logger?.warn("Unparsable date, falling back to current time", {
        field: key,
        value: doc[key] === undefined ? "<missing>" : String(doc[key]),
        idStr: readString(doc, "id_str"),
    });

    return context.now ? context.now() : new Date();
}

/**
 * A validity window needs a parsable `on`; `to` stays open when it is
 * missing or unparsable.
 */
function readValidity(doc: JsonObject): ValidityWindow | null {
    const on = parseDocumentDate(doc.on);
    if (!on) {
        return null;
    }

    return { on, to: parseDocumentDate(doc.to) };
}

/**
 * `place_country_code` is preferred because encoded documents carry the
 * country name in `place_country`.
 */
function readCountry(doc: JsonObject): string | null {
    const code = doc.place_country_code;
    return normalizeCountryCode(typeof code === "string" ? code : doc.place_country);
}

interface DecodedLocation {
    readonly location: GeoLocation | null;
    readonly source: LocationSource | null;
}

/**
 * Location decodes only when both point and mark are well-formed pairs;
 * otherwise location, radius and source are all cleared.
 */
function readLocation(doc: JsonObject): DecodedLocation {
    const point = readLonLat(doc.location_point);
    const mark  = readLonLat(doc.location_mark);

    if (!point || !mark) {
        return { location: null, source: null };
    }

    return {
        location: {
            point,
            mark,
            radius: readCount(doc, "location_radius"),
        },
        source: parseLocationSource(doc.location_source),
    };
}

/**
 * Decode a JSON document into an enriched MessageEntry.
 *
 * @param document - Parsed JSON value
 * @param context - Enrichment collaborators, logger and clock
 * @returns The rehydrated entry, already enriched
 * @throws EntryDecodeError if the document is not a JSON object
 *
 * @example
 * ```typescript
 * const entry = decodeEntry(JSON.parse(line), { classifier, geo, logger });
 * entry.enriched; // true
 * ```
 */
export function decodeEntry(document: unknown, context: DecodeContext = {}): MessageEntry {
    if (!isJsonObject(document)) {
        throw new EntryDecodeError("Entry document must be a JSON object", {
            received: describeValue(document),
        });
    }

    const link     = readString(document, "link");
    const location = readLocation(document);

    const entry = new MessageEntry({
        timestamp      : readRequiredDate(document, "timestamp", context),
        createdAt      : readRequiredDate(document, "created_at", context),
        validity       : readValidity(document),
        sourceType     : parseSourceType(document.source_type),
        providerType   : parseProviderType(document.provider_type),
        providerHash   : readString(document, "provider_hash"),
        screenName     : readString(document, "screen_name"),
        retweetFrom    : readString(document, "retweet_from"),
        idStr          : readString(document, "id_str"),
        canonicalId    : readString(document, "canonical_id"),
        parent         : readString(document, "parent"),
        text           : readText(document),
        statusIdUrl    : link ? parseUrl(link) : null,
        retweetCount   : readCount(document, "retweet_count"),
        favouritesCount: readCount(document, "favourites_count"),
        images         : readStringList(document, "images"),
        audio          : readStringList(document, "audio"),
        videos         : readStringList(document, "videos"),
        placeName      : readString(document, "place_name"),
        placeId        : readString(document, "place_id"),
        placeContext   : parsePlaceContext(document.place_context),
        placeCountry   : readCountry(document),
        location       : location.location,
        locationSource : location.source,
    });

    entry.enrich(context);
    return entry;
}
