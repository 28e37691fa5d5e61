/**
 * @fileoverview Shared application types and constants.
 */

export { AppErrorCode, getErrorCode } from './app-errors';
export type { AppError } from './app-errors';

/** Strategy that produced a selection. */
export type SelectionStrategy = 'guided' | 'fuzzy' | 'favorites' | 'icao' | 'random';

/** Where the favorites path goes when no stored favorite resolves. */
export type FallbackMode = 'guided' | 'fuzzy';

export const FILE_NAMES = {
    APP_DIR: '.atc-tuner',
    FAVORITES: 'favorites.json',
    CONFIG: 'config.json',
} as const;
