/**
 * @fileoverview Keyword Content Classifier
 *
 * Implements the ContentClassifier contract with keyword lists. For each
 * context with rules, every word of the message that appears in a
 * category's keyword list counts as a hit for that category.
 *
 * - The category with the most hits wins; ties go to the category declared
 *   first
 * - Probability is the winner's share of all hits in the context
 * - A context with rules but no hits reports "none" at probability 0
 * - Contexts without rules are left out of the result
 *
 * @module domain/classifiers/KeywordClassifier
 */

import {
    CLASSIFIER_CONTEXTS,
    NONE_CATEGORY,
    type Classification,
    type ClassificationMap,
    type ClassifierContext,
    type ContentClassifier,
} from "@entrypipe/engine";
import type { CategoryRule, KeywordRules } from "../../config/loadClassifierRules.js";

export interface KeywordClassifierConfig {
    readonly rules: KeywordRules;

    /** Classifier ID (default: "keyword-classifier") */
    readonly id?: string;
}

const kWORD_SEPARATOR = /[^\p{L}\p{N}']+/u;

interface CompiledRule {
    readonly rule: CategoryRule;
    readonly keywords: ReadonlySet<string>;
}

/**
 * Lowercased word tokens of a text.
 */
export function tokenize(text: string): string[] {
    return text.toLowerCase().split(kWORD_SEPARATOR).filter((token) => token.length > 0);
}

/**
 * Keyword Classifier
 *
 * @example
 * ```typescript
 * const classifier = new KeywordClassifier({
 *     rules: {
 *         emotion: [
 *             { category: "joy", keywords: ["happy", "glad"] },
 *             { category: "anger", keywords: ["furious"] },
 *         ],
 *     },
 * });
 *
 * classifier.classify("So happy and glad today");
 * // => { emotion: { category: "joy", probability: 1 } }
 * ```
 */
export class KeywordClassifier implements ContentClassifier {
    readonly id: string;
    readonly name = "Keyword Classifier";

    private readonly compiled: Map<ClassifierContext, readonly CompiledRule[]> = new Map();

    constructor(config: KeywordClassifierConfig) {
        this.id = config.id ?? "keyword-classifier";

        for (const context of CLASSIFIER_CONTEXTS) {
            const rules = config.rules[context];
            if (rules) {
                this.compiled.set(context, rules.map((rule) => ({
                    rule,
                    keywords: new Set(rule.keywords.map((keyword) => keyword.toLowerCase())),
                })));
            }
        }
    }

    classify(text: string): ClassificationMap {
        const tokens = tokenize(text);
        const result: ClassificationMap = {};

        for (const context of CLASSIFIER_CONTEXTS) {
            const rules = this.compiled.get(context);
            if (rules) {
                result[context] = this.classifyContext(tokens, rules);
            }
        }

        return result;
    }

    private classifyContext(tokens: readonly string[], rules: readonly CompiledRule[]): Classification {
        let total = 0;
        let winner: CompiledRule | null = null;
        let winnerHits = 0;

        for (const compiled of rules) {
            const hits = tokens.filter((token) => compiled.keywords.has(token)).length;
            total += hits;

            if (hits > winnerHits) {
                winner     = compiled;
                winnerHits = hits;
            }
        }

        if (!winner || total === 0) {
            return { category: NONE_CATEGORY, probability: 0 };
        }

        return {
            category   : winner.rule.category,
            probability: winnerHits / total,
        };
    }
}
