/**
 * @fileoverview Domain providers barrel exports
 *
 * @module domain/providers
 */

export {
    JsonLinesEntryProvider,
    type JsonLinesProviderConfig,
} from "./JsonLinesEntryProvider.js";
