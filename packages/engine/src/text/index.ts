/**
 * @fileoverview Text analysis barrel exports
 *
 * @module @entrypipe/engine/text
 */

export {
    collapseSpaces,
    extractTextEntities,
    type TextEntities,
} from "./TextEntityExtractor.js";
export { extractHosts } from "./HostExtractor.js";
export {
    bucketMediaLinks,
    classifyMediaLink,
    type MediaKind,
    type MediaSets,
} from "./MediaClassifier.js";
export {
    DEFAULT_COUNTER_SEPARATOR,
    buildShortlink,
    rewriteShortlinks,
    type RewrittenText,
    type ShortlinkOptions,
} from "./ShortlinkRewriter.js";
export {
    decodeHtmlEntities,
    decodeHtmlEntitiesDetailed,
    type DecodedText,
} from "./HtmlEntityDecoder.js";
