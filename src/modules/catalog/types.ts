/**
 * @fileoverview Type definitions for the Catalog module.
 * @module modules/catalog/types
 * @version 1.0.0
 */

// ============================================
// Channel Record
// ============================================

/**
 * One row of the channel catalog. Immutable once loaded.
 */
export interface ChannelRecord {
    readonly continent: string;
    readonly country: string;
    readonly city: string;
    /** Empty cells are stored as undefined */
    readonly stateProvince?: string;
    readonly airportName: string;
    /** Upper-cased 4-character airport code */
    readonly icao: string;
    readonly iata?: string;
    /** e.g. "Tower", "Ground/Delivery" */
    readonly channelDescription: string;
    readonly streamUrl: string;
    readonly webcamUrl?: string;
    /** Upper-cased ICAO codes of nearby airports; `[]` when the column is absent */
    readonly nearbyIcaos: readonly string[];
}

// ============================================
// Validation
// ============================================

export type CatalogWarningCode =
    | 'MISSING_ICAO'        // row skipped
    | 'MISSING_STREAM_URL'  // row skipped
    | 'DUPLICATE_CHANNEL';  // both rows kept

/**
 * Data-quality finding raised while parsing the catalog.
 */
export interface CatalogWarning {
    code: CatalogWarningCode;
    /** 1-based row number counting the header as row 1; blank lines are not counted */
    rowNumber: number;
    /** For duplicates: the earlier row with the same (icao, channelDescription) */
    relatedRowNumber?: number;
    message: string;
}

/**
 * Output of parsing a catalog source.
 */
export interface ParsedCatalog {
    records: ChannelRecord[];
    warnings: CatalogWarning[];
}
