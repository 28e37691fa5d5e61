/**
 * @fileoverview Constants for the Weather module.
 * @module modules/weather/constants
 * @version 1.0.0
 */

import type { DecodedMetar } from './types';

/** Sentinel for a field that could not be decoded */
export const UNAVAILABLE = 'Unavailable';

/** Raw text used when a report could not be fetched */
export const METAR_PLACEHOLDER = 'METAR unavailable';

/** Aviation Weather Center data API */
export const DEFAULT_METAR_ENDPOINT = 'https://aviationweather.gov/api/data/metar';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

// ============================================
// Unit Conversion
// ============================================

export const KM_PER_STATUTE_MILE = 1.60934;

export const HPA_PER_INHG = 33.8639;

/** Cloud heights and vertical visibility are reported in hundreds of feet */
export const FEET_PER_HEIGHT_UNIT = 100;

export const CLOUD_COVER_NAMES: Readonly<Record<string, string>> = {
    BKN: 'Broken',
    OVC: 'Overcast',
    SCT: 'Scattered',
    FEW: 'Few',
};

/** Field order and labels used when rendering a decoded report */
export const METAR_FIELD_LABELS: ReadonlyArray<readonly [keyof DecodedMetar, string]> = [
    ['wind', 'Wind'],
    ['visibility', 'Visibility'],
    ['ceiling', 'Ceiling'],
    ['temperature', 'Temperature'],
    ['dewPoint', 'Dew Point'],
    ['pressure', 'Pressure'],
];
