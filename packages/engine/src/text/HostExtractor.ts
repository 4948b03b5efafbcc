/**
 * @fileoverview Host Extractor
 *
 * @module @entrypipe/engine/text/HostExtractor
 */

import { parseUrl } from "../utils/parseUrl.js";

/**
 * Collect the lowercase host names of a list of links.
 *
 * Hosts keep the order in which they were first seen and appear once.
 * Links that do not parse as URLs contribute nothing.
 *
 * @param links - Links in extraction order
 * @returns Unique lowercase host names
 */
export function extractHosts(links: readonly string[]): string[] {
    const hosts = new Set<string>();

    for (const link of links) {
        const host = parseUrl(link)?.hostname.toLowerCase();
        if (host) {
            hosts.add(host);
        }
    }

    return [...hosts];
}
