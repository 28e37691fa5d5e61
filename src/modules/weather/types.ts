/**
 * @fileoverview Type definitions for the Weather module.
 * @module modules/weather/types
 * @version 1.0.0
 */

/**
 * Decoded METAR fields. Each is a formatted string or `"Unavailable"`.
 */
export interface DecodedMetar {
    wind: string;
    visibility: string;
    ceiling: string;
    temperature: string;
    dewPoint: string;
    pressure: string;
}

/**
 * Cache slot for raw reports, keyed by upper-cased ICAO.
 * Owned by whoever constructs the WeatherClient.
 */
export interface MetarCache {
    get(icao: string): string | undefined;
    set(icao: string, report: string): unknown;
}

/**
 * Result of fetching a report.
 */
export interface MetarReport {
    icao: string;
    /** Raw report text, or the placeholder when the fetch failed */
    raw: string;
    /** False when `raw` is the placeholder */
    available: boolean;
    decoded: DecodedMetar;
}
