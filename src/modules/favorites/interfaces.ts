/**
 * @fileoverview Interface definitions for the Favorites module.
 * @module modules/favorites/interfaces
 * @version 1.0.0
 */

import type { ILogger } from '../../utils/interfaces';
import type { FavoriteEntry, FavoritesRecordResult } from './types';

/**
 * Bounded, usage-ranked record of resolved channels.
 */
export interface IFavoritesStore {
    /**
     * Count one more use of a channel, re-rank, truncate and persist.
     * @returns Ranked entries and whether the write succeeded
     */
    record(icao: string, channelDescription: string): FavoritesRecordResult;

    /**
     * Entries ranked by (playCount desc, lastUsedTimestamp desc).
     */
    list(): FavoriteEntry[];

    /**
     * Remove every entry and persist the empty list.
     */
    clear(): FavoritesRecordResult;
}

/**
 * Configuration for FavoritesStore constructor.
 */
export interface FavoritesStoreConfig {
    /** JSON file holding the entries */
    filePath: string;
    /** Maximum entries kept (default 10) */
    maxEntries?: number;
    /** Clock, for tests */
    now?: () => number;
    logger?: Pick<ILogger, 'warn'>;
}
