/**
 * @fileoverview Classifier Rules Loader
 *
 * Loads keyword rules for the KeywordClassifier from YAML. The file maps
 * each context to its categories and each category to its keywords:
 *
 * ```yaml
 * emotion:
 *   joy: [happy, glad]
 *   anger: [furious]
 * language:
 *   english: [the, and]
 * ```
 *
 * @module config/loadClassifierRules
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isCategoryOf, isClassifierContext, type Category, type ClassifierContext } from "@entrypipe/engine";
import { isRecord, isStringArray } from "./values.js";

/**
 * Keywords of one category.
 */
export interface CategoryRule {
    readonly category: Category;
    readonly keywords: readonly string[];
}

/**
 * Rules per context, categories in declaration order.
 */
export type KeywordRules = Partial<Record<ClassifierContext, readonly CategoryRule[]>>;

/**
 * Validate parsed rules.
 *
 * @throws Error on an unknown context or category, or a malformed keyword list
 */
export function parseClassifierRules(parsed: unknown): KeywordRules {
    if (!isRecord(parsed)) {
        throw new Error("Invalid classifier rules format: expected a mapping of contexts");
    }

    const rules: KeywordRules = {};

    for (const [context, categories] of Object.entries(parsed)) {
        if (!isClassifierContext(context)) {
            throw new Error(`Invalid classifier rules: unknown context '${context}'`);
        }
        if (!isRecord(categories)) {
            throw new Error(`Invalid classifier rules: '${context}' must map categories to keywords`);
        }

        const contextRules: CategoryRule[] = [];

        for (const [category, keywords] of Object.entries(categories)) {
            if (!isCategoryOf(context, category) || category === "none") {
                throw new Error(`Invalid classifier rules: unknown category '${category}' in '${context}'`);
            }
            if (!isStringArray(keywords)) {
                throw new Error(`Invalid classifier rules: '${context}.${category}' must be a list of keywords`);
            }

            contextRules.push({
                category,
                keywords: keywords.map((keyword) => keyword.toLowerCase()),
            });
        }

        rules[context] = contextRules;
    }

    return rules;
}

/**
 * Load keyword rules from a YAML file.
 *
 * @throws Error if the file doesn't exist or is invalid
 */
export function loadClassifierRules(filePath: string): KeywordRules {
    if (!existsSync(filePath)) {
        throw new Error(`Classifier rules file not found: ${filePath}`);
    }

    return parseClassifierRules(parseYaml(readFileSync(filePath, "utf-8")));
}

/**
 * Load keyword rules, falling back to no rules (every message classifies
 * as "none").
 */
export function loadClassifierRulesWithFallback(filePath: string): KeywordRules {
    try {
        return loadClassifierRules(filePath);
    }
    catch (error) {
        console.warn(`Failed to load classifier rules from ${filePath}:`, error instanceof Error ? error.message : String(error));
        return {};
    }
}
