/**
 * @fileoverview Unit tests for the enricher configuration loader
 *
 * Tests cover:
 * - loadEnricherConfig function
 * - loadEnricherConfigWithFallback function
 * - Environment overrides
 * - Validation errors
 *
 * @module config/__tests__/loadConfig
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
    applyEnvOverrides,
    getDefaultConfig,
    loadEnricherConfig,
    loadEnricherConfigWithFallback,
} from "../config/loadConfig.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

const kCONFIG_PATH = "/etc/enricher/enricher.yml";

describe("loadConfig", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("loadEnricherConfig", () => {
        // Scenario: Every setting given in the file
        it("should load all settings and resolve data paths next to the file", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
input: /var/capture.jsonl
output: /var/enriched.jsonl
pollingInterval: 5000
batchSize: 25
decodeHtmlEntities: true
encode:
  includeDerived: false
  linkLengthThreshold: 80
  shortlinkStub: http://localhost:9000
  counterSeparator: "_"
data:
  classifier: rules/classifier.yml
  places: /srv/places.json
`);

            const config = loadEnricherConfig(kCONFIG_PATH, {});

            expect(config).toEqual({
                input             : "/var/capture.jsonl",
                output            : "/var/enriched.jsonl",
                pollingInterval   : 5000,
                batchSize         : 25,
                decodeHtmlEntities: true,
                encode            : {
                    includeDerived     : false,
                    linkLengthThreshold: 80,
                    shortlinkStub      : "http://localhost:9000",
                    counterSeparator   : "_",
                },
                data: {
                    classifier: "/etc/enricher/rules/classifier.yml",
                    places    : "/srv/places.json",
                    countries : "/etc/enricher/countries.json",
                },
            });
        });

        // Scenario: Empty file
        it("should use defaults for an empty file", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("");

            const config = loadEnricherConfig(kCONFIG_PATH, {});

            expect(config).toEqual(getDefaultConfig("/etc/enricher"));
            expect(config.encode.linkLengthThreshold).toBe(Number.POSITIVE_INFINITY);
        });

        // Scenario: Missing file
        it("should throw if file does not exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadEnricherConfig(kCONFIG_PATH, {})).toThrow(
                "Config file not found: /etc/enricher/enricher.yml"
            );
        });

        // Scenario: Top level is a list
        it("should throw if the top level is not a mapping", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("- input\n- output\n");

            expect(() => loadEnricherConfig(kCONFIG_PATH, {})).toThrow(
                "Invalid config file format: expected a mapping at the top level"
            );
        });

        // Scenario: Wrong value types
        it("should name the offending key for invalid values", () => {
            mockExistsSync.mockReturnValue(true);

            mockReadFileSync.mockReturnValue("encode:\n  linkLengthThreshold: -1\n");
            expect(() => loadEnricherConfig(kCONFIG_PATH, {})).toThrow(
                "Invalid config: 'encode.linkLengthThreshold' must be a positive number"
            );

            mockReadFileSync.mockReturnValue("decodeHtmlEntities: maybe\n");
            expect(() => loadEnricherConfig(kCONFIG_PATH, {})).toThrow(
                "Invalid config: 'decodeHtmlEntities' must be true or false"
            );

            mockReadFileSync.mockReturnValue("encode: fast\n");
            expect(() => loadEnricherConfig(kCONFIG_PATH, {})).toThrow("Invalid config: 'encode' must be a mapping");
        });

        // Scenario: Batch sizes and intervals are whole milliseconds within timer range
        it("should reject a fractional batch size or an out-of-range polling interval", () => {
            mockExistsSync.mockReturnValue(true);

            mockReadFileSync.mockReturnValue("batchSize: 2.5\n");
            expect(() => loadEnricherConfig(kCONFIG_PATH, {})).toThrow(
                "Invalid config: 'batchSize' must be a positive integer no greater than 9007199254740991"
            );

            mockReadFileSync.mockReturnValue("pollingInterval: 3000000000\n");
            expect(() => loadEnricherConfig(kCONFIG_PATH, {})).toThrow(
                "Invalid config: 'pollingInterval' must be a positive integer no greater than 2147483647"
            );

            mockReadFileSync.mockReturnValue("pollingInterval: 2147483647\nbatchSize: 1\n");
            const config = loadEnricherConfig(kCONFIG_PATH, {});
            expect(config.pollingInterval).toBe(2147483647);
            expect(config.batchSize).toBe(1);
        });

        // Scenario: Environment overrides the file
        it("should apply environment overrides", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("input: /var/capture.jsonl\nencode:\n  linkLengthThreshold: 80\n");

            const config = loadEnricherConfig(kCONFIG_PATH, {
                ENRICHER_INPUT           : "/tmp/in.jsonl",
                ENRICHER_LINK_THRESHOLD  : "120",
                ENRICHER_SHORTLINK_STUB  : "http://s",
                ENRICHER_POLLING_INTERVAL: "1000",
            });

            expect(config.input).toBe("/tmp/in.jsonl");
            expect(config.output).toBe("data/enriched.jsonl");
            expect(config.pollingInterval).toBe(1000);
            expect(config.encode.linkLengthThreshold).toBe(120);
            expect(config.encode.shortlinkStub).toBe("http://s");
        });
    });

    describe("applyEnvOverrides", () => {
        // Scenario: Non-numeric override
        it("should reject a non-numeric threshold", () => {
            expect(() => applyEnvOverrides(getDefaultConfig("/etc/enricher"), {
                ENRICHER_LINK_THRESHOLD: "abc",
            })).toThrow("Invalid environment: ENRICHER_LINK_THRESHOLD must be a positive number, got 'abc'");
        });

        // Scenario: Interval override beyond the timer range or fractional
        it("should reject a polling interval override that is not a timer-safe integer", () => {
            const defaults = getDefaultConfig("/etc/enricher");

            expect(() => applyEnvOverrides(defaults, { ENRICHER_POLLING_INTERVAL: "3000000000" })).toThrow(
                "Invalid environment: ENRICHER_POLLING_INTERVAL must be a positive integer no greater than 2147483647, got '3000000000'"
            );
            expect(() => applyEnvOverrides(defaults, { ENRICHER_POLLING_INTERVAL: "1500.5" })).toThrow(
                "Invalid environment: ENRICHER_POLLING_INTERVAL must be a positive integer no greater than 2147483647, got '1500.5'"
            );
        });
    });

    describe("loadEnricherConfigWithFallback", () => {
        // Scenario: Missing file falls back to defaults
        it("should return defaults with a warning when the file is missing", () => {
            const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
            mockExistsSync.mockReturnValue(false);

            const config = loadEnricherConfigWithFallback(kCONFIG_PATH, { ENRICHER_OUTPUT: "/tmp/out.jsonl" });

            expect(config).toEqual({
                ...getDefaultConfig("/etc/enricher"),
                output: "/tmp/out.jsonl",
            });
            expect(warnSpy).toHaveBeenCalledWith(
                "Failed to load config from /etc/enricher/enricher.yml:",
                "Config file not found: /etc/enricher/enricher.yml"
            );
        });
    });
});
