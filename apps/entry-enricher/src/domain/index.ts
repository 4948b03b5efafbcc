/**
 * @fileoverview Domain barrel exports
 *
 * Providers, sinks and enrichment collaborators of the entry enricher.
 *
 * @module domain
 */

export * from "./providers/index.js";
export * from "./sinks/index.js";
export * from "./classifiers/index.js";
export * from "./geo/index.js";
