/**
 * @fileoverview Console logger used when no logger is configured.
 *
 * @module @entrypipe/engine/impl/consoleLogger
 */

import type { PluginLogger } from "../contracts/PluginLogger.js";

export const consoleLogger: PluginLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};
