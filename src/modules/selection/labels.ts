/**
 * @fileoverview Display labels and airport grouping for the selection paths.
 * @module modules/selection/labels
 * @version 1.0.0
 */

import { lexicalCompare, normalizeKey } from '../catalog/normalize';
import type { ChannelRecord } from '../catalog/types';
import { WEBCAM_ANNOTATION } from './constants';
import type { AirportGroup, ChoiceOption } from './types';

function webcamSuffix(hasWebcam: boolean): string {
    return hasWebcam ? WEBCAM_ANNOTATION : '';
}

/**
 * Single-line channel label used by the fuzzy and favorites paths.
 *
 * @example
 * ```typescript
 * formatChannelLabel(record);
 * // "[New York, United States] John F. Kennedy International (KJFK/JFK) | Tower [webcam available]"
 * ```
 */
export function formatChannelLabel(record: ChannelRecord): string {
    const codes = record.iata ? `${record.icao}/${record.iata}` : record.icao;
    return `[${record.city}, ${record.country}] ${record.airportName} (${codes}) | ` +
        `${record.channelDescription}${webcamSuffix(record.webcamUrl !== undefined)}`;
}

/**
 * Group records by (city, airportName), compared case-insensitively.
 * Groups are sorted by label; member records keep source order.
 */
export function groupByAirport(records: readonly ChannelRecord[]): AirportGroup[] {
    const groups = new Map<string, AirportGroup>();

    for (const record of records) {
        const key = `${normalizeKey(record.city)}\u0000${normalizeKey(record.airportName)}`;
        const group = groups.get(key);
        if (group) {
            group.records.push(record);
            group.hasWebcam = group.hasWebcam || record.webcamUrl !== undefined;
        } else {
            groups.set(key, {
                city: record.city,
                airportName: record.airportName,
                label: '',
                hasWebcam: record.webcamUrl !== undefined,
                records: [record],
            });
        }
    }

    const result = [...groups.values()];
    for (const group of result) {
        group.label = `${group.city} - ${group.airportName}${webcamSuffix(group.hasWebcam)}`;
    }
    return result.sort((a, b) => lexicalCompare(a.label, b.label));
}

/**
 * One option per distinct channel description, sorted lexically.
 * The first record with a given description wins.
 */
export function channelOptions(records: readonly ChannelRecord[]): ChoiceOption<ChannelRecord>[] {
    const byDescription = new Map<string, ChannelRecord>();
    for (const record of records) {
        const key = normalizeKey(record.channelDescription);
        if (!byDescription.has(key)) {
            byDescription.set(key, record);
        }
    }

    return [...byDescription.values()]
        .sort((a, b) => lexicalCompare(a.channelDescription, b.channelDescription))
        .map((record) => ({
            label: `${record.channelDescription}${webcamSuffix(record.webcamUrl !== undefined)}`,
            value: record,
        }));
}
