/**
 * @fileoverview Codec barrel exports
 *
 * @module @entrypipe/engine/codec
 */

export { decodeEntry, type DecodeContext } from "./decodeEntry.js";
export {
    MAX_PROBABILITY,
    encodeEntry,
    type EncodeContext,
    type EncodeOptions,
} from "./encodeEntry.js";
export { formatUtc, parseDocumentDate } from "./dates.js";
export type {
    ClassifierFields,
    ClassifierKey,
    ClassifierProbabilityKey,
    EncodedEntryDocument,
    EntryDocument,
    EntryTextDocument,
} from "./EntryDocument.js";
