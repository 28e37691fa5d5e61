/**
 * @fileoverview Type definitions for the Favorites module.
 * @module modules/favorites/types
 * @version 1.0.0
 */

import type { FavoritesError } from './FavoritesStore';

/**
 * One ranked favorite. Identity is `(icao, channelDescription)`.
 */
export interface FavoriteEntry {
    /** Upper-cased airport code */
    icao: string;
    channelDescription: string;
    /** Number of resolutions, always >= 1 */
    playCount: number;
    /** Epoch milliseconds of the latest resolution */
    lastUsedTimestamp: number;
}

/**
 * On-disk shape of the favorites file.
 */
export interface StoredFavorites {
    version: number;
    entries: FavoriteEntry[];
}

/**
 * Outcome of `record()`. Write failures are reported here, never thrown.
 */
export interface FavoritesRecordResult {
    /** Ranked entries after the update */
    entries: FavoriteEntry[];
    persisted: boolean;
    error?: FavoritesError;
}
