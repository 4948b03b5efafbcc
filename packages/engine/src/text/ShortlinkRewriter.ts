/**
 * @fileoverview Shortlink Rewriter
 *
 * Replaces over-long links in display text with short redirect links and
 * records a preview of each replaced link.
 *
 * @module @entrypipe/engine/text/ShortlinkRewriter
 */

/**
 * Separator between the entry id and the link counter of the second and
 * later shortlinks of one entry.
 */
export const DEFAULT_COUNTER_SEPARATOR = "-";

const kELLIPSIS = "...";

/**
 * Options for shortlink rewriting.
 */
export interface ShortlinkOptions {
    /** Links longer than this many characters are shortened */
    readonly threshold: number;

    /** Base URL of the redirect service, without trailing slash */
    readonly stub: string;

    /** Entry id the redirect service resolves */
    readonly id: string;

    /** Separator before the link counter (default: "-") */
    readonly counterSeparator?: string;
}

/**
 * Display text plus the shortlink → preview map.
 */
export interface RewrittenText {
    readonly text: string;
    readonly unshorten: ReadonlyMap<string, string>;
}

/**
 * Build the shortlink for the link at a given index.
 */
export function buildShortlink(options: ShortlinkOptions, index: number): string {
    const separator = options.counterSeparator ?? DEFAULT_COUNTER_SEPARATOR;
    const counter   = index > 0 ? `${separator}${index}` : "";
    return `${options.stub}/x?id=${options.id}${counter}`;
}

/**
 * Shorten a link for display next to its shortlink.
 *
 * The preview is cut to the shortlink's length and suffixed with "..."
 * only when that actually makes it shorter than the link.
 */
function previewLink(link: string, shortlink: string): string {
    if (link.length >= shortlink.length + kELLIPSIS.length) {
        return link.substring(0, shortlink.length) + kELLIPSIS;
    }
    return link;
}

/**
 * Rewrite over-long links in a text.
 *
 * Links are visited in extraction order; the counter suffix uses the
 * link's position among all links, shortened or not. A link is only
 * replaced when its shortlink is strictly shorter.
 *
 * @param text - Display text
 * @param links - Links extracted from the text, in order
 * @param options - Threshold, stub and entry id
 * @returns Rewritten text and the insertion-ordered unshorten map
 *
 * @example
 * ```typescript
 * const result = rewriteShortlinks(text, links, { threshold: 40, stub: "http://s", id: "42" });
 * // result.unshorten.get("http://s/x?id=42") => "https://example.org/a/very..."
 * ```
 */
export function rewriteShortlinks(
    text: string,
    links: readonly string[],
    options: ShortlinkOptions
): RewrittenText {
    const unshorten = new Map<string, string>();
    let rewritten = text;

    links.forEach((link, index) => {
        if (link.length <= options.threshold) {
            return;
        }

        const shortlink = buildShortlink(options, index);
        if (shortlink.length >= link.length) {
            return;
        }

        // split/join keeps "$" sequences in the shortlink literal
        rewritten = rewritten.split(link).join(shortlink);
        unshorten.set(shortlink, previewLink(link, shortlink));
    });

    return {
        text: rewritten,
        unshorten,
    };
}
