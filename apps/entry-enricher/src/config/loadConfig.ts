/**
 * @fileoverview Enricher Configuration Loader
 *
 * Loads `enricher.yml` and applies environment overrides. Data file paths
 * in the YAML are resolved relative to the YAML file itself.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { dirname, resolve } from "path";
import { parse as parseYaml } from "yaml";
import type { EncodeOptions } from "@entrypipe/engine";
import { isFiniteNumber, isRecord, type RawRecord } from "./values.js";

/**
 * Longest delay `setInterval` honors; larger values fire after 1 ms.
 */
const kMAX_POLLING_INTERVAL = 2147483647;

/**
 * Resolved application configuration.
 */
export interface EnricherConfig {
    /** JSON-lines capture file to read */
    input: string;

    /** JSON-lines file encoded entries are appended to */
    output: string;

    /** Polling interval in milliseconds */
    pollingInterval: number;

    /** Documents per poll */
    batchSize: number;

    /** Decode legacy HTML escapes in captured text */
    decodeHtmlEntities: boolean;

    encode: Required<EncodeOptions>;

    /** Paths of the classifier rules and gazetteer files */
    data: {
        classifier: string;
        places: string;
        countries: string;
    };
}

/**
 * Environment variables that override the YAML file.
 */
export interface EnricherEnv {
    ENRICHER_INPUT?: string;
    ENRICHER_OUTPUT?: string;
    ENRICHER_SHORTLINK_STUB?: string;
    ENRICHER_LINK_THRESHOLD?: string;
    ENRICHER_POLLING_INTERVAL?: string;
}

/**
 * Defaults, with data files expected next to the configuration file.
 *
 * @param configDir - Directory holding the data files
 */
export function getDefaultConfig(configDir: string): EnricherConfig {
    return {
        input             : "data/capture.jsonl",
        output            : "data/enriched.jsonl",
        pollingInterval   : 30000,
        batchSize         : 10,
        decodeHtmlEntities: false,
        encode            : {
            includeDerived     : true,
            linkLengthThreshold: Number.POSITIVE_INFINITY,
            shortlinkStub      : "",
            counterSeparator   : "-",
        },
        data: {
            classifier: resolve(configDir, "classifier.yml"),
            places    : resolve(configDir, "places.json"),
            countries : resolve(configDir, "countries.json"),
        },
    };
}

function readString(section: RawRecord, key: string, fallback: string, where: string): string {
    const value = section[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "string" || value.length === 0) {
        throw new Error(`Invalid config: '${where}${key}' must be a non-empty string`);
    }
    return value;
}

function readPositiveNumber(section: RawRecord, key: string, fallback: number, where: string): number {
    const value = section[key];
    if (value === undefined) {
        return fallback;
    }
    if (!isFiniteNumber(value) || value <= 0) {
        throw new Error(`Invalid config: '${where}${key}' must be a positive number`);
    }
    return value;
}

function readPositiveInteger(section: RawRecord, key: string, fallback: number, max: number, where: string): number {
    const value = section[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0 || value > max) {
        throw new Error(`Invalid config: '${where}${key}' must be a positive integer no greater than ${max}`);
    }
    return value;
}

function readBoolean(section: RawRecord, key: string, fallback: boolean, where: string): boolean {
    const value = section[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "boolean") {
        throw new Error(`Invalid config: '${where}${key}' must be true or false`);
    }
    return value;
}

function readSection(raw: RawRecord, key: string): RawRecord {
    const value = raw[key];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw new Error(`Invalid config: '${key}' must be a mapping`);
    }
    return value;
}

function parseEnvNumber(name: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new Error(`Invalid environment: ${name} must be a positive number, got '${value}'`);
    }
    return parsed;
}

function parseEnvInteger(name: string, value: string, max: number): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0 || parsed > max) {
        throw new Error(`Invalid environment: ${name} must be a positive integer no greater than ${max}, got '${value}'`);
    }
    return parsed;
}

/**
 * Apply environment overrides on top of a loaded configuration.
 */
export function applyEnvOverrides(config: EnricherConfig, env: EnricherEnv): EnricherConfig {
    return {
        ...config,
        ...(env.ENRICHER_INPUT && { input: env.ENRICHER_INPUT }),
        ...(env.ENRICHER_OUTPUT && { output: env.ENRICHER_OUTPUT }),
        ...(env.ENRICHER_POLLING_INTERVAL && {
            pollingInterval: parseEnvInteger(
                "ENRICHER_POLLING_INTERVAL", env.ENRICHER_POLLING_INTERVAL, kMAX_POLLING_INTERVAL
            ),
        }),
        encode: {
            ...config.encode,
            ...(env.ENRICHER_SHORTLINK_STUB && { shortlinkStub: env.ENRICHER_SHORTLINK_STUB }),
            ...(env.ENRICHER_LINK_THRESHOLD && {
                linkLengthThreshold: parseEnvNumber("ENRICHER_LINK_THRESHOLD", env.ENRICHER_LINK_THRESHOLD),
            }),
        },
    };
}

/**
 * Load the enricher configuration from a YAML file.
 *
 * @param filePath - Path to enricher.yml
 * @param env - Environment overrides (default: process.env)
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadEnricherConfig("./config/enricher.yml");
 * config.encode.linkLengthThreshold; // 100
 * ```
 */
export function loadEnricherConfig(filePath: string, env: EnricherEnv = process.env): EnricherConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Config file not found: ${filePath}`);
    }

    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));
    const raw = parsed ?? {};

    if (!isRecord(raw)) {
        throw new Error("Invalid config file format: expected a mapping at the top level");
    }

    const configDir = dirname(filePath);
    const defaults  = getDefaultConfig(configDir);
    const encode    = readSection(raw, "encode");
    const data      = readSection(raw, "data");

    const config: EnricherConfig = {
        input             : readString(raw, "input", defaults.input, ""),
        output            : readString(raw, "output", defaults.output, ""),
        pollingInterval   : readPositiveInteger(
            raw, "pollingInterval", defaults.pollingInterval, kMAX_POLLING_INTERVAL, ""
        ),
        batchSize         : readPositiveInteger(raw, "batchSize", defaults.batchSize, Number.MAX_SAFE_INTEGER, ""),
        decodeHtmlEntities: readBoolean(raw, "decodeHtmlEntities", defaults.decodeHtmlEntities, ""),
        encode            : {
            includeDerived     : readBoolean(encode, "includeDerived", defaults.encode.includeDerived, "encode."),
            linkLengthThreshold: readPositiveNumber(
                encode, "linkLengthThreshold", defaults.encode.linkLengthThreshold, "encode."
            ),
            shortlinkStub      : readString(encode, "shortlinkStub", defaults.encode.shortlinkStub, "encode."),
            counterSeparator   : readString(encode, "counterSeparator", defaults.encode.counterSeparator, "encode."),
        },
        data: {
            classifier: resolve(configDir, readString(data, "classifier", defaults.data.classifier, "data.")),
            places    : resolve(configDir, readString(data, "places", defaults.data.places, "data.")),
            countries : resolve(configDir, readString(data, "countries", defaults.data.countries, "data.")),
        },
    };

    return applyEnvOverrides(config, env);
}

/**
 * Load the configuration, falling back to defaults (with environment
 * overrides) when the file is missing or invalid.
 */
export function loadEnricherConfigWithFallback(filePath: string, env: EnricherEnv = process.env): EnricherConfig {
    try {
        return loadEnricherConfig(filePath, env);
    }
    catch (error) {
        console.warn(`Failed to load config from ${filePath}:`, error instanceof Error ? error.message : String(error));
        return applyEnvOverrides(getDefaultConfig(dirname(filePath)), env);
    }
}
