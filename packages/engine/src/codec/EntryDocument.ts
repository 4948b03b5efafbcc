/**
 * @fileoverview Entry document shape
 *
 * The JSON representation of a MessageEntry as written by encodeEntry().
 * Key order in an encoded document is significant to downstream indexers
 * and follows the order of the properties below.
 *
 * @module @entrypipe/engine/codec/EntryDocument
 */

import type { ClassifierContext } from "../contracts/ContentClassifier.js";
import type { LonLat } from "../contracts/GeoInferencer.js";
import type {
    LocationSource,
    PlaceContext,
    ProviderType,
    SourceType,
} from "../entry/types.js";

/**
 * Display text with its shortlink map.
 */
export interface EntryTextDocument {
    readonly text: string;
    readonly unshorten: Readonly<Record<string, string>>;
}

/**
 * Keys written per classification context.
 */
export type ClassifierKey = `classifier_${ClassifierContext}`;
export type ClassifierProbabilityKey = `classifier_${ClassifierContext}_probability`;

/**
 * Encoded entry document.
 */
export interface EntryDocument {
    timestamp: string;
    created_at: string;
    on?: string;
    to?: string;
    screen_name: string;
    retweet_from?: string;
    text: EntryTextDocument;
    link?: string;
    id_str: string;
    canonical_id?: string;
    parent?: string;
    source_type: SourceType;
    provider_type: ProviderType;
    provider_hash?: string;
    retweet_count: number;
    favourites_count: number;
    place_name: string;
    place_id: string;

    // derived data
    text_length?: number;
    place_context?: PlaceContext;
    place_country?: string;
    place_country_code?: string;
    place_country_center?: LonLat;
    location_point?: LonLat;
    location_radius?: number;
    location_mark?: LonLat;
    location_source?: LocationSource;
    hosts?: string[];
    hosts_count?: number;
    links?: string[];
    links_count?: number;
    unshorten?: Record<string, string>;
    images?: string[];
    images_count?: number;
    audio?: string[];
    audio_count?: number;
    videos?: string[];
    videos_count?: number;
    mentions?: string[];
    mentions_count?: number;
    hashtags?: string[];
    hashtags_count?: number;
    without_l_len?: number;
    without_lu_len?: number;
    without_luh_len?: number;
}

/**
 * Classifier keys sit between the hashtag counts and the residual lengths.
 */
export type ClassifierFields = Partial<Record<ClassifierKey, string> & Record<ClassifierProbabilityKey, number>>;

export type EncodedEntryDocument = EntryDocument & ClassifierFields;
