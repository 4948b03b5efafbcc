/**
 * @fileoverview Message Entry
 *
 * One captured message: raw fields as provided by the source, plus the
 * fields derived from them by enrichment.
 *
 * An entry is either built empty and filled in by the caller (who then
 * calls enrich() explicitly), or rehydrated by decodeEntry(), which
 * enriches as its last step. Enrichment runs at most once per instance.
 *
 * @module @entrypipe/engine/entry/MessageEntry
 */

import type { ClassificationMap, ContentClassifier } from "../contracts/ContentClassifier.js";
import type { GeoInferencer } from "../contracts/GeoInferencer.js";
import type { PluginLogger } from "../contracts/PluginLogger.js";
import { extractTextEntities, type TextEntities } from "../text/TextEntityExtractor.js";
import { extractHosts } from "../text/HostExtractor.js";
import { bucketMediaLinks } from "../text/MediaClassifier.js";
import { inferLocation } from "./locationInference.js";
import {
    normalizeCountryCode,
    type GeoLocation,
    type LocationSource,
    type PlaceContext,
    type ProviderType,
    type SourceType,
    type ValidityWindow,
} from "./types.js";

/**
 * Collaborators used by enrichment. Each one is optional; a missing
 * collaborator skips its step.
 */
export interface EnrichmentContext {
    /** Text classifier */
    readonly classifier?: ContentClassifier | null;

    /** Location inferencer */
    readonly geo?: GeoInferencer | null;

    /** Logger for enrichment diagnostics */
    readonly logger?: PluginLogger;
}

/**
 * Raw fields accepted when creating an entry.
 */
export interface MessageEntryInit {
    timestamp?: Date;
    createdAt?: Date;
    validity?: ValidityWindow | null;
    sourceType?: SourceType;
    providerType?: ProviderType;
    providerHash?: string;
    screenName?: string;
    retweetFrom?: string;
    idStr?: string;
    canonicalId?: string;
    parent?: string;
    text?: string;
    statusIdUrl?: URL | null;
    retweetCount?: number;
    favouritesCount?: number;
    images?: Iterable<string>;
    audio?: Iterable<string>;
    videos?: Iterable<string>;
    placeName?: string;
    placeId?: string;
    placeContext?: PlaceContext | null;
    placeCountry?: string | null;
    location?: GeoLocation | null;
    locationSource?: LocationSource | null;
}

const kNO_ENTITIES: TextEntities = {
    links                             : [],
    mentions                          : [],
    hashtags                          : [],
    lengthWithoutLinks                : 0,
    lengthWithoutLinksMentions        : 0,
    lengthWithoutLinksMentionsHashtags: 0,
};

/**
 * Message Entry
 *
 * @example
 * ```typescript
 * const entry = new MessageEntry({
 *     idStr     : "1001",
 *     screenName: "ann",
 *     text      : "sunset at the pier https://example.org/p.jpg #beach",
 * });
 *
 * entry.enrich({ classifier, geo });
 *
 * entry.images;   // Set { "https://example.org/p.jpg" }
 * entry.hashtags; // ["beach"]
 * ```
 */
export class MessageEntry {
    /** Capture time */
    timestamp: Date;

    /** Time the author created the message */
    createdAt: Date;

    validity: ValidityWindow | null;
    sourceType: SourceType;
    providerType: ProviderType;
    providerHash: string;
    screenName: string;
    retweetFrom: string;
    idStr: string;
    canonicalId: string;
    parent: string;
    text: string;
    statusIdUrl: URL | null;
    retweetCount: number;
    favouritesCount: number;

    readonly images: Set<string>;
    readonly audio: Set<string>;
    readonly videos: Set<string>;

    placeName: string;
    placeId: string;
    placeContext: PlaceContext | null;
    location: GeoLocation | null;
    locationSource: LocationSource | null;

    private country: string | null;
    private entities: TextEntities = kNO_ENTITIES;
    private hostList: readonly string[] = [];
    private classification: ClassificationMap | null = null;
    private enrichedFlag = false;

    constructor(init: MessageEntryInit = {}) {
        this.timestamp       = init.timestamp ?? new Date();
        this.createdAt       = init.createdAt ?? new Date();
        this.validity        = init.validity ?? null;
        this.sourceType      = init.sourceType ?? "GENERIC";
        this.providerType    = init.providerType ?? "NOONE";
        this.providerHash    = init.providerHash ?? "";
        this.screenName      = init.screenName ?? "";
        this.retweetFrom     = init.retweetFrom ?? "";
        this.idStr           = init.idStr ?? "";
        this.canonicalId     = init.canonicalId ?? "";
        this.parent          = init.parent ?? "";
        this.text            = init.text ?? "";
        this.statusIdUrl     = init.statusIdUrl ?? null;
        this.retweetCount    = init.retweetCount ?? 0;
        this.favouritesCount = init.favouritesCount ?? 0;
        this.images          = new Set(init.images);
        this.audio           = new Set(init.audio);
        this.videos          = new Set(init.videos);
        this.placeName       = init.placeName ?? "";
        this.placeId         = init.placeId ?? "";
        this.placeContext    = init.placeContext ?? null;
        this.country         = normalizeCountryCode(init.placeCountry);
        this.location        = init.location ?? null;
        this.locationSource  = init.locationSource ?? null;
    }

    /**
     * ISO 3166 alpha-2 code of the place; anything not two characters long
     * is stored as null.
     */
    get placeCountry(): string | null {
        return this.country;
    }

    set placeCountry(code: string | null) {
        this.country = normalizeCountryCode(code);
    }

    get enriched(): boolean {
        return this.enrichedFlag;
    }

    get links(): readonly string[] {
        return this.entities.links;
    }

    get mentions(): readonly string[] {
        return this.entities.mentions;
    }

    get hashtags(): readonly string[] {
        return this.entities.hashtags;
    }

    get hosts(): readonly string[] {
        return this.hostList;
    }

    /** Text length without links */
    get withoutLLen(): number {
        return this.entities.lengthWithoutLinks;
    }

    /** Text length without links and mentions */
    get withoutLuLen(): number {
        return this.entities.lengthWithoutLinksMentions;
    }

    /** Text length without links, mentions and hashtags */
    get withoutLuhLen(): number {
        return this.entities.lengthWithoutLinksMentionsHashtags;
    }

    get classifier(): ClassificationMap | null {
        return this.classification;
    }

    /**
     * Derive entities, hosts, media, classification and location from the
     * raw fields. Calls after the first one do nothing.
     *
     * @param context - Collaborators; missing ones skip their step
     */
    enrich(context: EnrichmentContext = {}): void {
        if (this.enrichedFlag) {
            return;
        }

        this.entities = extractTextEntities(this.text);
        this.hostList = extractHosts(this.entities.links);

        if (context.classifier) {
            this.classification = context.classifier.classify(this.text);
        }

        bucketMediaLinks(this.entities.links, this);

        if (this.location === null && context.geo) {
            this.applyLocation(context.geo);
        }

        this.enrichedFlag = true;

        context.logger?.debug("Entry enriched", {
            idStr   : this.idStr,
            links   : this.entities.links.length,
            mentions: this.entities.mentions.length,
            hashtags: this.entities.hashtags.length,
            located : this.location !== null,
        });
    }

    private applyLocation(geo: GeoInferencer): void {
        const inference = inferLocation({
            text          : this.text,
            hashtags      : this.entities.hashtags,
            placeName     : this.placeName,
            locationSource: this.locationSource,
        }, geo);

        if (!inference) {
            return;
        }

        this.location       = inference.location;
        this.locationSource = inference.locationSource;
        this.placeContext   = inference.placeContext;
        this.country        = inference.placeCountry;

        if (this.placeName.length === 0 && inference.candidateName !== null) {
            this.placeName = inference.candidateName;
        }
    }
}
