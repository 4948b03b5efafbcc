/**
 * @fileoverview Text Entity Extractor
 *
 * Extracts links, mentions and hashtags from raw message text in three
 * ordered passes. Each pass removes what it matched before the next pass
 * runs, so an "@" inside a URL is never read as a mention and a "#" that
 * belongs to a mention is never read as a hashtag.
 *
 * After each pass the residual text has runs of spaces collapsed and is
 * trimmed; its length is recorded as a ranking metric.
 *
 * @module @entrypipe/engine/text/TextEntityExtractor
 */

/**
 * Link: starts at a word boundary, ends on a character that cannot be
 * trailing punctuation.
 */
const kLINK_PATTERN = /(?:\b|^)(https?:\/\/[-A-Za-z0-9+&@#/%?=~_()|!:,.;]*[-A-Za-z0-9+&@#/%=~_()|])/g;

/**
 * Word boundary over Unicode letters and digits; `\b` only knows ASCII.
 */
const kWORD_BOUNDARY = "(?:(?<=[\\p{L}\\p{N}_])(?![\\p{L}\\p{N}_])|(?<![\\p{L}\\p{N}_])(?=[\\p{L}\\p{N}_])|$)";

/**
 * Mention: "@" is itself a boundary, so the left edge must be a space, an
 * opening parenthesis or the text start.
 */
const kMENTION_PATTERN = new RegExp(`(?:[ (]|^)(@..*?)${kWORD_BOUNDARY}`, "gu");

/**
 * Hashtag: same left-edge rule as mentions.
 */
const kHASHTAG_PATTERN = new RegExp(`(?:[ (]|^)(#..*?)${kWORD_BOUNDARY}`, "gu");

const kSPACE_RUN = / {2,}/g;

/**
 * Entities and residual lengths extracted from a message text.
 */
export interface TextEntities {
    /** Links in order of appearance */
    readonly links: readonly string[];

    /** Mentioned screen names without the leading "@" */
    readonly mentions: readonly string[];

    /** Lowercased hashtags without the leading "#" */
    readonly hashtags: readonly string[];

    /** Length of the text once links are removed */
    readonly lengthWithoutLinks: number;

    /** Length once links and mentions are removed */
    readonly lengthWithoutLinksMentions: number;

    /** Length once links, mentions and hashtags are removed */
    readonly lengthWithoutLinksMentionsHashtags: number;
}

interface PassResult {
    readonly matches: string[];
    readonly residual: string;
}

/**
 * Collapse runs of two or more spaces to one and trim.
 */
export function collapseSpaces(text: string): string {
    return text.replace(kSPACE_RUN, " ").trim();
}

/**
 * Run one extraction pass: collect capture group 1 of every match and cut
 * each captured span out of the text.
 *
 * `matchAll` works on a copy of the pattern, so the shared module-level
 * patterns never carry `lastIndex` state between calls.
 */
function extractPass(text: string, pattern: RegExp): PassResult {
    const matches: string[] = [];
    let residual = "";
    let cursor = 0;

    for (const match of text.matchAll(pattern)) {
        const value = match[1];
        const start = (match.index ?? 0) + match[0].length - value.length;

        residual += text.slice(cursor, start);
        cursor = start + value.length;
        matches.push(value);
    }

    residual += text.slice(cursor);

    return {
        matches,
        residual: collapseSpaces(residual),
    };
}

/**
 * Extract links, mentions and hashtags from a message text.
 *
 * @param text - Raw message text
 * @returns Ordered entity lists and the three residual lengths
 *
 * @example
 * ```typescript
 * const entities = extractTextEntities("see https://example.org/a @ann #News");
 * // entities.links    => ["https://example.org/a"]
 * // entities.mentions => ["ann"]
 * // entities.hashtags => ["news"]
 * // entities.lengthWithoutLinksMentionsHashtags => 3
 * ```
 */
export function extractTextEntities(text: string): TextEntities {
    const links    = extractPass(text, kLINK_PATTERN);
    const mentions = extractPass(links.residual, kMENTION_PATTERN);
    const hashtags = extractPass(mentions.residual, kHASHTAG_PATTERN);

    return {
        links                             : links.matches,
        mentions                          : mentions.matches.map((mention) => mention.substring(1)),
        hashtags                          : hashtags.matches.map((hashtag) => hashtag.substring(1).toLowerCase()),
        lengthWithoutLinks                : links.residual.length,
        lengthWithoutLinksMentions        : mentions.residual.length,
        lengthWithoutLinksMentionsHashtags: hashtags.residual.length,
    };
}
