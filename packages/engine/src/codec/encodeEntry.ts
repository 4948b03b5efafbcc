/**
 * @fileoverview Entry encoder
 *
 * Writes a MessageEntry as a JSON document. The lean form carries only
 * the raw fields and is meant for embedding in a parent record; the full
 * form adds every derived field for indexing.
 *
 * @module @entrypipe/engine/codec/encodeEntry
 */

import {
    CLASSIFIER_CONTEXTS,
    NONE_CATEGORY,
    type ClassificationMap,
} from "../contracts/ContentClassifier.js";
import type { CountryLookup } from "../contracts/GeoInferencer.js";
import type { MessageEntry } from "../entry/MessageEntry.js";
import { rewriteShortlinks, type RewrittenText } from "../text/ShortlinkRewriter.js";
import { formatUtc } from "./dates.js";
import type {
    ClassifierFields,
    ClassifierKey,
    ClassifierProbabilityKey,
    EncodedEntryDocument,
    EntryDocument,
} from "./EntryDocument.js";

/**
 * Output options.
 */
export interface EncodeOptions {
    /** Include derived and redundant fields (default: true) */
    readonly includeDerived?: boolean;

    /** Links longer than this are replaced by shortlinks (default: never) */
    readonly linkLengthThreshold?: number;

    /** Base URL of the shortlink redirect service (default: "") */
    readonly shortlinkStub?: string;

    /** Separator before the shortlink counter (default: "-") */
    readonly counterSeparator?: string;
}

/**
 * Collaborators used when encoding derived fields.
 */
export interface EncodeContext {
    /** Country name and center lookup */
    readonly countries?: CountryLookup | null;
}

/**
 * Largest probability written to a document; JSON has no infinity.
 */
export const MAX_PROBABILITY = Number.MAX_VALUE;

function countryFields(code: string, countries: CountryLookup | null | undefined): Partial<EntryDocument> {
    const name   = countries?.countryName(code) ?? null;
    const center = countries?.countryCenter(code) ?? null;

    return {
        ...(name !== null && { place_country: name }),
        place_country_code: code,
        ...(center !== null && { place_country_center: center }),
    };
}

function classifierFields(classification: ClassificationMap | null): ClassifierFields {
    const fields: ClassifierFields = {};

    if (!classification) {
        return fields;
    }

    for (const context of CLASSIFIER_CONTEXTS) {
        const result = classification[context];
        if (!result || result.category === NONE_CATEGORY) {
            continue;
        }

        const key: ClassifierKey = `classifier_${context}`;
        const probabilityKey: ClassifierProbabilityKey = `classifier_${context}_probability`;

        fields[key]            = result.category;
        fields[probabilityKey] = result.probability === Number.POSITIVE_INFINITY ? MAX_PROBABILITY : result.probability;
    }

    return fields;
}

function derivedFields(
    entry: MessageEntry,
    rewritten: RewrittenText,
    context: EncodeContext
): Partial<EntryDocument> & ClassifierFields {
    const location = entry.location;
    const country  = entry.placeCountry;

    return {
        text_length: entry.text.length,
        ...(entry.placeContext !== null && { place_context: entry.placeContext }),
        ...(country !== null && countryFields(country, context.countries)),
        ...(location && {
            location_point : location.point,
            location_radius: location.radius,
            location_mark  : location.mark,
            ...(entry.locationSource !== null && { location_source: entry.locationSource }),
        }),
        hosts         : [...entry.hosts],
        hosts_count   : entry.hosts.length,
        links         : [...entry.links],
        links_count   : entry.links.length,
        unshorten     : Object.fromEntries(rewritten.unshorten),
        images        : [...entry.images],
        images_count  : entry.images.size,
        audio         : [...entry.audio],
        audio_count   : entry.audio.size,
        videos        : [...entry.videos],
        videos_count  : entry.videos.size,
        mentions      : [...entry.mentions],
        mentions_count: entry.mentions.length,
        hashtags      : [...entry.hashtags],
        hashtags_count: entry.hashtags.length,
        ...classifierFields(entry.classifier),
        without_l_len  : entry.withoutLLen,
        without_lu_len : entry.withoutLuLen,
        without_luh_len: entry.withoutLuhLen,
    };
}

/**
 * Encode an entry as a JSON document.
 *
 * @param entry - The entry to encode (normally already enriched)
 * @param options - Detail level and shortlink settings
 * @param context - Country lookup for derived country fields
 * @returns Document with keys in their fixed order
 *
 * @example
 * ```typescript
 * const lean = encodeEntry(entry, { includeDerived: false });
 * const full = encodeEntry(entry, {
 *     linkLengthThreshold: 80,
 *     shortlinkStub      : "https://sho.rt",
 * }, { countries });
 * ```
 */
export function encodeEntry(
    entry: MessageEntry,
    options: EncodeOptions = {},
    context: EncodeContext = {}
): EncodedEntryDocument {
    const rewritten = rewriteShortlinks(entry.text, entry.links, {
        threshold       : options.linkLengthThreshold ?? Number.POSITIVE_INFINITY,
        stub            : options.shortlinkStub ?? "",
        id              : entry.idStr,
        counterSeparator: options.counterSeparator,
    });

    const validity = entry.validity;

    const document: EntryDocument = {
        timestamp : formatUtc(entry.timestamp),
        created_at: formatUtc(entry.createdAt),
        ...(validity && { on: formatUtc(validity.on) }),
        ...(validity?.to && { to: formatUtc(validity.to) }),
        screen_name: entry.screenName,
        ...(entry.retweetFrom.length > 0 && { retweet_from: entry.retweetFrom }),
        text: {
            text     : rewritten.text,
            unshorten: Object.fromEntries(rewritten.unshorten),
        },
        ...(entry.statusIdUrl && { link: entry.statusIdUrl.href }),
        id_str: entry.idStr,
        ...(entry.canonicalId.length > 0 && { canonical_id: entry.canonicalId }),
        ...(entry.parent.length > 0 && { parent: entry.parent }),
        source_type  : entry.sourceType,
        provider_type: entry.providerType,
        ...(entry.providerHash.length > 0 && { provider_hash: entry.providerHash }),
        retweet_count   : entry.retweetCount,
        favourites_count: entry.favouritesCount,
        place_name      : entry.placeName,
        place_id        : entry.placeId,
    };

    if (options.includeDerived === false) {
        return document;
    }

    return {
        ...document,
        ...derivedFields(entry, rewritten, context),
    };
}
