/**
 * @fileoverview Unit tests for JsonLinesEntryProvider
 *
 * Tests cover:
 * - Reading complete lines only
 * - Resuming from the line cursor
 * - Batch limits and hasMore
 * - Skipping blank and unparsable lines
 * - Optional HTML entity decoding
 *
 * @module domain/__tests__/JsonLinesEntryProvider
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { JsonLinesEntryProvider } from "../domain/providers/JsonLinesEntryProvider.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

const kPATH = "/data/capture.jsonl";

/**
 * Five complete lines (one blank, one broken) and an unfinished sixth.
 */
const kCAPTURE = [
    "{\"id_str\":\"1\"}",
    "",
    "{\"id_str\":\"2\"}",
    "not json",
    "{\"id_str\":\"3\"}",
    "{\"id_str\":\"4\"",
].join("\n");

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("JsonLinesEntryProvider", () => {
    let logger: ReturnType<typeof createMockLogger>;
    let provider: JsonLinesEntryProvider;

    beforeEach(() => {
        vi.clearAllMocks();
        logger   = createMockLogger();
        provider = new JsonLinesEntryProvider({ path: kPATH, logger });
        mockExistsSync.mockReturnValue(true);
        mockReadFileSync.mockReturnValue(kCAPTURE);
    });

    // Scenario: Read all complete lines
    it("should return parsed documents from complete lines", async () => {
        const result = await provider.getDocuments({ limit: 10 });

        expect(result).toEqual({
            documents: [{ id_str: "1" }, { id_str: "2" }, { id_str: "3" }],
            cursor   : "5",
            hasMore  : false,
        });
    });

    // Scenario: Broken line
    it("should log and skip unparsable lines", async () => {
        await provider.getDocuments({ limit: 10 });

        expect(logger.warn).toHaveBeenCalledTimes(1);
        expect(logger.warn).toHaveBeenCalledWith(
            "Skipping unparsable line",
            expect.objectContaining({ path: kPATH, line: 4 })
        );
    });

    // Scenario: Line completed between polls
    it("should resume after the last consumed line", async () => {
        await provider.getDocuments({ limit: 10 });

        expect((await provider.getDocuments({ limit: 10 })).documents).toEqual([]);

        mockReadFileSync.mockReturnValue(`${kCAPTURE}}\n`);
        const result = await provider.getDocuments({ limit: 10 });

        expect(result.documents).toEqual([{ id_str: "4" }]);
        expect(result.cursor).toBe("6");
    });

    // Scenario: Batch smaller than the file
    it("should stop at the limit and report more", async () => {
        const first = await provider.getDocuments({ limit: 2 });

        expect(first).toEqual({
            documents: [{ id_str: "1" }, { id_str: "2" }],
            cursor   : "3",
            hasMore  : true,
        });

        const second = await provider.getDocuments({ limit: 2 });

        expect(second.documents).toEqual([{ id_str: "3" }]);
        expect(second.hasMore).toBe(false);
    });

    // Scenario: Explicit cursor
    it("should restart from a given cursor", async () => {
        await provider.getDocuments({ limit: 10 });

        const result = await provider.getDocuments({ limit: 10, since: "2" });

        expect(result.documents).toEqual([{ id_str: "2" }, { id_str: "3" }]);
    });

    // Scenario: Capture file not created yet
    it("should return nothing when the file does not exist", async () => {
        mockExistsSync.mockReturnValue(false);

        expect(await provider.getDocuments()).toEqual({ documents: [], cursor: "0", hasMore: false });
        expect(await provider.isHealthy()).toBe(false);
        expect(mockReadFileSync).not.toHaveBeenCalled();
    });

    // Scenario: Legacy HTML escapes in captured text
    it("should decode HTML entities in text when enabled", async () => {
        mockReadFileSync.mockReturnValue("{\"text\":\"Fish &amp; Chips\",\"id_str\":\"9\"}\n");

        const decoding = new JsonLinesEntryProvider({ path: kPATH, logger, decodeHtmlEntities: true });

        expect((await decoding.getDocuments()).documents).toEqual([{ text: "Fish & Chips", id_str: "9" }]);
        expect((await provider.getDocuments()).documents).toEqual([{ text: "Fish &amp; Chips", id_str: "9" }]);
    });
});
