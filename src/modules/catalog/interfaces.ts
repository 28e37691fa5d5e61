/**
 * @fileoverview Interface definitions for the Catalog module.
 * @module modules/catalog/interfaces
 * @version 1.0.0
 */

import type { ILogger } from '../../utils/interfaces';
import type { CatalogWarning, ChannelRecord } from './types';

/**
 * Read-only view over the loaded catalog.
 * All comparisons are case-insensitive and whitespace-trimmed; returned
 * labels keep their original casing.
 */
export interface ICatalogStore {
    /** Number of records */
    readonly size: number;

    /**
     * All records in source order.
     */
    getAll(): readonly ChannelRecord[];

    /**
     * Validation findings collected while loading.
     */
    getWarnings(): readonly CatalogWarning[];

    /**
     * Distinct continent names, naturally sorted.
     */
    distinctContinents(): string[];

    /**
     * Distinct countries within a continent, naturally sorted.
     */
    countriesIn(continent: string): string[];

    /**
     * Records within a continent and country, in source order.
     * @throws CatalogError NO_CHANNELS_FOR_REGION when nothing matches
     */
    channelsIn(continent: string, country: string): ChannelRecord[];

    /**
     * Records for an airport code. Empty when the code is unknown.
     */
    channelsForIcao(icao: string): ChannelRecord[];

    /**
     * The record with this code and channel description, or null.
     */
    findChannel(icao: string, channelDescription: string): ChannelRecord | null;
}

/**
 * Options for building a CatalogStore.
 */
export interface CatalogStoreOptions {
    /**
     * Optional logger for validation warnings.
     */
    logger?: Pick<ILogger, 'warn'>;
}
