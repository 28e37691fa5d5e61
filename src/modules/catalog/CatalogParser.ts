/**
 * @fileoverview Delimited-text catalog parser.
 * Turns the raw catalog table into ChannelRecords plus validation warnings.
 * @module modules/catalog/CatalogParser
 * @version 1.0.0
 */

import Papa from 'papaparse';
import { CATALOG_COLUMNS, HEADER_ROW_NUMBER, NEARBY_ICAO_SEPARATOR } from './constants';
import { normalizeKey } from './normalize';
import type { CatalogWarning, ChannelRecord, ParsedCatalog } from './types';

type RawRow = Record<string, string | undefined>;

/**
 * Normalize a header cell so "Stream URL", "stream_url" and "StreamURL" agree.
 */
export function normalizeHeader(header: string): string {
    const key = header.trim().toLowerCase().replace(/[^a-z0-9]/g, '');
    return CATALOG_COLUMNS[key] ?? key;
}

function parseNearbyIcaos(cell: string | undefined): string[] {
    if (!cell) {
        return [];
    }
    return cell
        .split(NEARBY_ICAO_SEPARATOR)
        .map((code) => code.trim().toUpperCase())
        .filter((code) => code.length > 0);
}

function optional(cell: string | undefined): string | undefined {
    return cell ? cell : undefined;
}

/**
 * Map one parsed row onto a record, or explain why it is not well-formed.
 */
function toRecord(row: RawRow, rowNumber: number): ChannelRecord | CatalogWarning {
    const icao = (row['icao'] ?? '').toUpperCase();
    const streamUrl = row['streamUrl'] ?? '';

    if (!icao) {
        return {
            code: 'MISSING_ICAO',
            rowNumber,
            message: `Row ${rowNumber} skipped: ICAO code is empty`,
        };
    }
    if (!streamUrl) {
        return {
            code: 'MISSING_STREAM_URL',
            rowNumber,
            message: `Row ${rowNumber} skipped: stream URL is empty for ${icao}`,
        };
    }

    const record: ChannelRecord = {
        continent: row['continent'] ?? '',
        country: row['country'] ?? '',
        city: row['city'] ?? '',
        stateProvince: optional(row['stateProvince']),
        airportName: row['airportName'] ?? '',
        icao,
        iata: optional(row['iata']),
        channelDescription: row['channelDescription'] ?? '',
        streamUrl,
        webcamUrl: optional(row['webcamUrl']),
        nearbyIcaos: Object.freeze(parseNearbyIcaos(row['nearbyIcaos'])),
    };
    return Object.freeze(record);
}

function isRecord(value: ChannelRecord | CatalogWarning): value is ChannelRecord {
    return 'streamUrl' in value;
}

/**
 * Parse a delimited catalog table.
 * The delimiter is detected from the header row; cells are trimmed.
 *
 * @param text - Full catalog source including the header row
 * @returns One record per well-formed row, in source order, plus warnings
 */
export function parseCatalogText(text: string): ParsedCatalog {
    const result = Papa.parse<RawRow>(text, {
        header: true,
        skipEmptyLines: 'greedy',
        transformHeader: normalizeHeader,
        transform: (value: string) => value.trim(),
    });

    const records: ChannelRecord[] = [];
    const warnings: CatalogWarning[] = [];
    const firstRowByChannel = new Map<string, { rowNumber: number; streamUrl: string }>();

    result.data.forEach((row, index) => {
        const rowNumber = index + HEADER_ROW_NUMBER + 1;
        const mapped = toRecord(row, rowNumber);
        if (!isRecord(mapped)) {
            warnings.push(mapped);
            return;
        }

        const channelKey = `${mapped.icao}|${normalizeKey(mapped.channelDescription)}`;
        const earlier = firstRowByChannel.get(channelKey);
        if (earlier) {
            const conflict = earlier.streamUrl !== mapped.streamUrl
                ? 'with a different stream URL'
                : 'with the same stream URL';
            warnings.push({
                code: 'DUPLICATE_CHANNEL',
                rowNumber,
                relatedRowNumber: earlier.rowNumber,
                message: `Row ${rowNumber} duplicates ${mapped.icao} "${mapped.channelDescription}" ` +
                    `from row ${earlier.rowNumber} ${conflict}`,
            });
        } else {
            firstRowByChannel.set(channelKey, { rowNumber, streamUrl: mapped.streamUrl });
        }
        records.push(mapped);
    });

    return { records, warnings };
}
