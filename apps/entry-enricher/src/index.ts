/**
 * @fileoverview Entry Enricher - Main Entry Point
 *
 * Polls a JSON-lines capture file, enriches every entry (entities, hosts,
 * media, classification, location) and appends the encoded documents to
 * an output file.
 *
 * Usage:
 *   entry-enricher            poll until interrupted
 *   entry-enricher --once     process what is there, then exit
 *
 * `ENRICHER_CONFIG` points at an alternative enricher.yml.
 *
 * @module entry-enricher
 */

// Load .env before anything reads the environment
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { consoleLogger, type EnrichmentEngine } from "@entrypipe/engine";
import { loadEnricherConfigWithFallback } from "./config/index.js";
import { createEnricher } from "./wiring.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const logger = consoleLogger;

function subscribeToEvents(engine: EnrichmentEngine, pollingInterval: number): void {
    engine.eventBus.subscribe("engine:started", () => {
        logger.info(`[ENGINE] Started - polling every ${pollingInterval}ms`);
    });

    engine.eventBus.subscribe("engine:stopped", () => {
        logger.info("[ENGINE] Stopped");
    });

    engine.eventBus.subscribe("entry:processed", (event) => {
        logger.info("[PROCESSED]", { ...event.data, traceId: event.traceId });
    });

    engine.eventBus.subscribe("entry:written", (event) => {
        if (event.data?.success === false) {
            logger.warn("[SINK] Write failed", event.data);
        }
    });

    engine.eventBus.subscribe("entry:error", (event) => {
        logger.error("[ENTRY ERROR]", { ...event.data, traceId: event.traceId });
    });

    engine.eventBus.subscribe("engine:error", (event) => {
        logger.error("[ENGINE ERROR]", event.data);
    });
}

async function main(): Promise<void> {
    const once       = process.argv.slice(2).includes("--once");
    const configPath = process.env.ENRICHER_CONFIG ?? join(__dirname, "..", "config", "enricher.yml");
    const config     = loadEnricherConfigWithFallback(configPath);

    logger.info("Configuration loaded", {
        configPath,
        input : config.input,
        output: config.output,
        once,
    });

    const engine = createEnricher(config, logger);
    subscribeToEvents(engine, config.pollingInterval);

    if (once) {
        await engine.poll();
        return;
    }

    const shutdown = (): void => {
        logger.info("Shutting down...");
        engine.stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) });
                process.exit(1);
            });
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    await engine.start();
    logger.info("Entry enricher is running. Press Ctrl+C to stop.");
}

main().catch((error: unknown) => {
    logger.error("[FATAL] Failed to start application", {
        error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
});
