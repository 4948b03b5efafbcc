/**
 * @fileoverview Media Classifier Heuristic
 *
 * Buckets links into video, audio and image sets by file suffix or by the
 * hosting service named in the link.
 *
 * Service names are matched as plain substrings anywhere after the first
 * character, not as anchored host names: "https://notyoutube.com.example/x"
 * counts as video. This is a ranking heuristic, not a security boundary.
 *
 * @module @entrypipe/engine/text/MediaClassifier
 */

export type MediaKind = "video" | "audio" | "image";

interface MediaRule {
    readonly kind: MediaKind;
    readonly suffixes: readonly string[];
    readonly services: readonly string[];
}

/**
 * Rules in priority order; the first rule a link satisfies wins.
 */
const kMEDIA_RULES: readonly MediaRule[] = [
    {
        kind    : "video",
        suffixes: [".mp4", ".m4v"],
        services: ["vimeo.com", "youtube.com", "youtu.be", "vine.co", "ted.com"],
    },
    {
        kind    : "audio",
        suffixes: [".mp3"],
        services: ["soundcloud.com"],
    },
    {
        kind    : "image",
        suffixes: [".jpg", ".jpeg", ".png", ".gif"],
        services: ["flickr.com", "instagram.com", "imgur.com", "giphy.com", "pic.twitter.com"],
    },
];

/**
 * Media sets of an entry, each an insertion-ordered unique set.
 */
export interface MediaSets {
    readonly images: Set<string>;
    readonly audio: Set<string>;
    readonly videos: Set<string>;
}

/**
 * Decide which media kind a link points to.
 *
 * @param link - A link as extracted from text
 * @returns The first matching media kind, or null for a plain link
 */
export function classifyMediaLink(link: string): MediaKind | null {
    for (const rule of kMEDIA_RULES) {
        const hasSuffix  = rule.suffixes.some((suffix) => link.endsWith(suffix));
        const hasService = rule.services.some((service) => link.indexOf(service) > 0);

        if (hasSuffix || hasService) {
            return rule.kind;
        }
    }

    return null;
}

/**
 * Add each media link to the set of its kind, in link order.
 *
 * @param links - Links in extraction order
 * @param sets - Media sets to extend
 */
export function bucketMediaLinks(links: readonly string[], sets: MediaSets): void {
    for (const link of links) {
        switch (classifyMediaLink(link)) {
            case "video":
                sets.videos.add(link);
                break;
            case "audio":
                sets.audio.add(link);
                break;
            case "image":
                sets.images.add(link);
                break;
            case null:
                break;
        }
    }
}
