/**
 * Content Classifier Contract
 *
 * Maps message text to a category and probability per classification
 * context. The model behind a classifier is opaque to the pipeline;
 * implementations are injected into enrichment.
 *
 * Design principles:
 * - Synchronous: enrichment calls classify() inline
 * - Closed vocabulary: contexts and categories are fixed unions
 * - Explicit absence: "none" is a category, not a missing key
 */

/**
 * Classification contexts, in serialization order.
 */
export const CLASSIFIER_CONTEXTS = ["emotion", "profanity", "language"] as const;

/**
 * A classification context (the dimension a category belongs to).
 */
export type ClassifierContext = (typeof CLASSIFIER_CONTEXTS)[number];

/**
 * Categories that each context may produce (besides "none").
 */
export const CONTEXT_CATEGORIES = {
    emotion  : ["joy", "trust", "fear", "surprise", "sadness", "disgust", "anger", "anticipation"],
    profanity: ["swear", "sex", "leet", "pissed"],
    language : ["english", "german", "french", "spanish", "dutch"],
} as const satisfies Record<ClassifierContext, readonly string[]>;

/**
 * Sentinel category for "the classifier has no opinion in this context".
 * Never serialized.
 */
export const NONE_CATEGORY = "none";

/**
 * Any category a classifier may report.
 */
export type Category =
    | typeof NONE_CATEGORY
    | (typeof CONTEXT_CATEGORIES)[ClassifierContext][number];

/**
 * Category plus probability for one context.
 */
export interface Classification {
    readonly category: Category;
    readonly probability: number;
}

/**
 * Classification results keyed by context. Contexts the classifier did not
 * evaluate are simply missing.
 */
export type ClassificationMap = Partial<Record<ClassifierContext, Classification>>;

/**
 * Content classifier interface.
 *
 * @example
 * ```typescript
 * const shouting: ContentClassifier = {
 *     id: "shouting",
 *     classify(text) {
 *         return text === text.toUpperCase()
 *             ? { emotion: { category: "anger", probability: 0.7 } }
 *             : {};
 *     },
 * };
 * ```
 */
export interface ContentClassifier {
    /** Unique identifier for this classifier */
    readonly id: string;

    /** Optional human-readable name */
    readonly name?: string;

    /**
     * Classify a message text.
     *
     * @param text - Raw message text
     * @returns Results per context; an empty map when nothing applies
     */
    classify(text: string): ClassificationMap;
}

/**
 * Check whether a string names a classification context.
 */
export function isClassifierContext(value: string): value is ClassifierContext {
    return CLASSIFIER_CONTEXTS.some((context) => context === value);
}

/**
 * Check whether a string is a category the given context may produce.
 * The "none" sentinel is accepted for every context.
 */
export function isCategoryOf(context: ClassifierContext, value: string): value is Category {
    if (value === NONE_CATEGORY) {
        return true;
    }

    const categories: readonly string[] = CONTEXT_CATEGORIES[context];
    return categories.includes(value);
}
