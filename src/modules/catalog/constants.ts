/**
 * @fileoverview Constants for the Catalog module.
 * @module modules/catalog/constants
 * @version 1.0.0
 */

import type { ChannelRecord } from './types';

/** Bundled catalog, relative to the package root */
export const DEFAULT_CATALOG_PATH = 'data/channels.csv';

/** Header row number; data rows start on the next line */
export const HEADER_ROW_NUMBER = 1;

// ============================================
// Column Mapping
// ============================================

type TextField = Exclude<keyof ChannelRecord, 'nearbyIcaos'>;

/**
 * Normalized header name → record field.
 * Headers are normalized by lower-casing and dropping everything but letters and digits.
 */
export const CATALOG_COLUMNS: Readonly<Record<string, TextField | 'nearbyIcaos'>> = {
    continent: 'continent',
    country: 'country',
    city: 'city',
    stateprovince: 'stateProvince',
    state: 'stateProvince',
    province: 'stateProvince',
    airportname: 'airportName',
    airport: 'airportName',
    icao: 'icao',
    iata: 'iata',
    channeldescription: 'channelDescription',
    channel: 'channelDescription',
    streamurl: 'streamUrl',
    webcamurl: 'webcamUrl',
    nearbyicaos: 'nearbyIcaos',
};

/** Separators accepted inside the NearbyICAOs cell */
export const NEARBY_ICAO_SEPARATOR = /[\s,;|]+/;

// ============================================
// Error Messages
// ============================================

export const CATALOG_ERROR_MESSAGES = {
    CATALOG_NOT_FOUND: 'Channel catalog not found',
    CATALOG_EMPTY: 'Channel catalog contains no playable channels',
    NO_CHANNELS_FOR_REGION: 'No channels found for the selected region',
    ICAO_NOT_FOUND: 'No channels found for ICAO code',
} as const;
