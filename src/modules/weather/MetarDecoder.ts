/**
 * @fileoverview METAR decoder.
 * Turns a raw aviation weather report into display-ready fields. Each field is
 * matched independently against the whole report, so a malformed group only
 * degrades its own field to "Unavailable".
 * @module modules/weather/MetarDecoder
 * @version 1.0.0
 */

import {
    CLOUD_COVER_NAMES,
    FEET_PER_HEIGHT_UNIT,
    HPA_PER_INHG,
    KM_PER_STATUTE_MILE,
    METAR_FIELD_LABELS,
    UNAVAILABLE,
} from './constants';
import type { DecodedMetar } from './types';

// ============================================
// Patterns
// ============================================

const WIND_PATTERN = /\b(\d{3})(\d{2})(?:G(\d{2}))?KT\b/;
const UNLIMITED_VISIBILITY_PATTERN = /\b9999\b/;
const METRIC_VISIBILITY_PATTERN = /\b(\d{4})\b/;
const STATUTE_VISIBILITY_PATTERN = /(?:^|\s)P?(\d+)SM\b/;
const VERTICAL_VISIBILITY_PATTERN = /\bVV(\d{3})/;
const CLOUD_LAYER_PATTERN = /\b(BKN|OVC|SCT|FEW)(\d{3})/;
const TEMPERATURE_PATTERN = /(?:^|\s)([-M]?\d{1,2})\/([-M]?\d{1,2})(?=\s|$)/;
const QNH_PATTERN = /\bQ(\d{4})\b/;
const ALTIMETER_PATTERN = /\bA(\d{4})\b/;

// ============================================
// Field Decoders
// ============================================

function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}

/**
 * `18015G25KT` → "180° at 15 knots, gusting to 25 knots"
 */
export function decodeWind(raw: string): string {
    const match = WIND_PATTERN.exec(raw);
    if (!match) {
        return UNAVAILABLE;
    }
    const [, direction = '', speed = '', gust] = match;
    const base = `${direction}° at ${parseInt(speed, 10)} knots`;
    return gust !== undefined
        ? `${base}, gusting to ${parseInt(gust, 10)} knots`
        : base;
}

/**
 * Order matters: `9999`, then any other 4-digit metre group, then statute miles.
 */
export function decodeVisibility(raw: string): string {
    if (UNLIMITED_VISIBILITY_PATTERN.test(raw)) {
        return '10+ km (Unlimited)';
    }

    const metric = METRIC_VISIBILITY_PATTERN.exec(raw);
    if (metric?.[1] !== undefined) {
        return `${Math.floor(parseInt(metric[1], 10) / 1000)} km`;
    }

    const statute = STATUTE_VISIBILITY_PATTERN.exec(raw);
    if (statute?.[1] !== undefined) {
        const km = roundTo(parseInt(statute[1], 10) * KM_PER_STATUTE_MILE, 3);
        return `${km} km`;
    }

    return UNAVAILABLE;
}

/**
 * Vertical visibility wins over cloud layers; otherwise the first layer in the report.
 */
export function decodeCeiling(raw: string): string {
    const vertical = VERTICAL_VISIBILITY_PATTERN.exec(raw);
    if (vertical?.[1] !== undefined) {
        return `Vertical Visibility at ${parseInt(vertical[1], 10) * FEET_PER_HEIGHT_UNIT} ft`;
    }

    const layer = CLOUD_LAYER_PATTERN.exec(raw);
    if (layer?.[1] !== undefined && layer[2] !== undefined) {
        const cover = CLOUD_COVER_NAMES[layer[1]] ?? layer[1];
        return `${cover} at ${parseInt(layer[2], 10) * FEET_PER_HEIGHT_UNIT} ft`;
    }

    return UNAVAILABLE;
}

/**
 * `M05`, `-05` → -5; `-00` and `M00` → 0 (never "-0").
 */
function parseSignedCelsius(token: string): number {
    const negative = token.startsWith('M') || token.startsWith('-');
    const magnitude = parseInt(negative ? token.slice(1) : token, 10);
    return negative && magnitude !== 0 ? -magnitude : magnitude;
}

/**
 * Temperature and dew point share one match: both decode or neither does.
 */
export function decodeTemperatures(raw: string): Pick<DecodedMetar, 'temperature' | 'dewPoint'> {
    const match = TEMPERATURE_PATTERN.exec(raw);
    if (match?.[1] === undefined || match[2] === undefined) {
        return { temperature: UNAVAILABLE, dewPoint: UNAVAILABLE };
    }
    return {
        temperature: `${parseSignedCelsius(match[1])}°C`,
        dewPoint: `${parseSignedCelsius(match[2])}°C`,
    };
}

/**
 * QNH in hPa as reported, else altimeter setting in inHg hundredths converted to hPa.
 */
export function decodePressure(raw: string): string {
    const qnh = QNH_PATTERN.exec(raw);
    if (qnh?.[1] !== undefined) {
        return `${parseInt(qnh[1], 10)} hPa`;
    }

    const altimeter = ALTIMETER_PATTERN.exec(raw);
    if (altimeter?.[1] !== undefined) {
        const hpa = (parseInt(altimeter[1], 10) / 100) * HPA_PER_INHG;
        return `${hpa.toFixed(1)} hPa`;
    }

    return UNAVAILABLE;
}

// ============================================
// Public API
// ============================================

/**
 * Decode a raw METAR report. Never throws.
 *
 * @example
 * ```typescript
 * decodeMetar('KJFK 121651Z 18015G25KT 10SM BKN015 OVC030 22/18 A2992').pressure;
 * // "1013.2 hPa"
 * ```
 */
export function decodeMetar(raw: string): DecodedMetar {
    return {
        wind: decodeWind(raw),
        visibility: decodeVisibility(raw),
        ceiling: decodeCeiling(raw),
        ...decodeTemperatures(raw),
        pressure: decodePressure(raw),
    };
}

/**
 * Render decoded fields as aligned `Label: value` lines.
 */
export function formatMetarReport(decoded: DecodedMetar): string {
    const width = Math.max(...METAR_FIELD_LABELS.map(([, label]) => label.length));
    return METAR_FIELD_LABELS
        .map(([field, label]) => `${`${label}:`.padEnd(width + 1)} ${decoded[field]}`)
        .join('\n');
}
