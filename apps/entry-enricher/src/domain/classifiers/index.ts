/**
 * @fileoverview Domain classifiers barrel exports
 *
 * @module domain/classifiers
 */

export {
    KeywordClassifier,
    tokenize,
    type KeywordClassifierConfig,
} from "./KeywordClassifier.js";
