/**
 * @fileoverview Constants for the Favorites module.
 * @module modules/favorites/constants
 * @version 1.0.0
 */

/** Default number of favorites kept */
export const DEFAULT_MAX_FAVORITES = 10;

/** Storage schema version */
export const FAVORITES_STORAGE_VERSION = 1;

export const FAVORITES_ERROR_MESSAGES = {
    PERSISTENCE_FAILURE: 'Could not write favorites file',
    CORRUPTED: 'Favorites file is not valid JSON; starting with an empty list',
} as const;
