/**
 * @fileoverview Domain sinks barrel exports
 *
 * @module domain/sinks
 */

export {
    JsonLinesEntrySink,
    type JsonLinesSinkConfig,
} from "./JsonLinesEntrySink.js";
