/**
 * @fileoverview Implementation barrel exports
 *
 * @module @entrypipe/engine/impl
 */

export { InMemoryEventBus, type InMemoryEventBusOptions } from "./InMemoryEventBus.js";
export { consoleLogger } from "./consoleLogger.js";
