/**
 * @fileoverview Gazetteer Loader
 *
 * Loads the place list (`places.json`) and country table
 * (`countries.json`) used by the GazetteerGeoInferencer.
 *
 * @module config/loadGazetteer
 */

import { readFileSync, existsSync } from "fs";
import type { LonLat } from "@entrypipe/engine";
import { normalizeCountryCode } from "@entrypipe/engine";
import { isFiniteNumber, isRecord, isStringArray, type RawRecord } from "./values.js";

/**
 * A named place.
 */
export interface GazetteerPlace {
    readonly name: string;
    readonly alternates: readonly string[];
    readonly countryCode: string;
    readonly lon: number;
    readonly lat: number;
    readonly population: number;
}

/**
 * Country name and center keyed by ISO alpha-2 code.
 */
export interface GazetteerCountry {
    readonly name: string;
    readonly center: LonLat;
}

export interface Gazetteer {
    readonly places: readonly GazetteerPlace[];
    readonly countries: ReadonlyMap<string, GazetteerCountry>;
}

function readJson(filePath: string, label: string): unknown {
    if (!existsSync(filePath)) {
        throw new Error(`${label} file not found: ${filePath}`);
    }

    return JSON.parse(readFileSync(filePath, "utf-8"));
}

function parseLonLat(value: unknown): LonLat | null {
    if (!Array.isArray(value) || value.length !== 2) {
        return null;
    }

    const [lon, lat]: unknown[] = value;
    return isFiniteNumber(lon) && isFiniteNumber(lat) ? [lon, lat] : null;
}

/**
 * Validate a parsed place list.
 *
 * @throws Error naming the first malformed place
 */
export function parsePlaces(parsed: unknown): GazetteerPlace[] {
    if (!Array.isArray(parsed)) {
        throw new Error("Invalid places file format: expected an array");
    }

    return parsed.map((raw: unknown, index): GazetteerPlace => {
        const place: RawRecord = isRecord(raw) ? raw : {};
        const name  = place.name;

        if (typeof name !== "string" || name.length === 0) {
            throw new Error(`Invalid place at index ${index}: missing or invalid 'name'`);
        }

        const countryCode = normalizeCountryCode(place.countryCode);
        if (countryCode === null) {
            throw new Error(`Invalid place '${name}': 'countryCode' must be a two-letter code`);
        }

        const { lon, lat } = place;
        if (!isFiniteNumber(lon) || !isFiniteNumber(lat)) {
            throw new Error(`Invalid place '${name}': 'lon' and 'lat' must be numbers`);
        }

        const alternates = place.alternates ?? [];
        if (!isStringArray(alternates)) {
            throw new Error(`Invalid place '${name}': 'alternates' must be a list of names`);
        }

        return {
            name,
            alternates,
            countryCode: countryCode.toUpperCase(),
            lon,
            lat,
            population : isFiniteNumber(place.population) ? place.population : 0,
        };
    });
}

/**
 * Validate a parsed country table.
 */
export function parseCountries(parsed: unknown): Map<string, GazetteerCountry> {
    if (!isRecord(parsed)) {
        throw new Error("Invalid countries file format: expected a mapping of country codes");
    }

    const countries = new Map<string, GazetteerCountry>();

    for (const [key, raw] of Object.entries(parsed)) {
        const code = normalizeCountryCode(key);
        if (code === null) {
            throw new Error(`Invalid country code '${key}'`);
        }
        const country: RawRecord = isRecord(raw) ? raw : {};
        const name    = country.name;

        if (typeof name !== "string") {
            throw new Error(`Invalid country '${key}': missing or invalid 'name'`);
        }

        const center = parseLonLat(country.center);
        if (!center) {
            throw new Error(`Invalid country '${key}': 'center' must be [lon, lat]`);
        }

        countries.set(code.toUpperCase(), { name, center });
    }

    return countries;
}

/**
 * Load the gazetteer.
 *
 * @param placesPath - Path to places.json
 * @param countriesPath - Path to countries.json
 * @throws Error if either file is missing or invalid
 */
export function loadGazetteer(placesPath: string, countriesPath: string): Gazetteer {
    return {
        places   : parsePlaces(readJson(placesPath, "Places")),
        countries: parseCountries(readJson(countriesPath, "Countries")),
    };
}

/**
 * Load the gazetteer, falling back to an empty one (no location is ever
 * inferred).
 */
export function loadGazetteerWithFallback(placesPath: string, countriesPath: string): Gazetteer {
    try {
        return loadGazetteer(placesPath, countriesPath);
    }
    catch (error) {
        console.warn("Failed to load gazetteer:", error instanceof Error ? error.message : String(error));
        return { places: [], countries: new Map() };
    }
}
