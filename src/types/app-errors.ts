/**
 * @fileoverview Canonical application error taxonomy and base error shape.
 * @module types/app-errors
 * @version 1.0.0
 */

/**
 * Unified error codes for consistent error handling across the app.
 */
export enum AppErrorCode {
    // Catalog Errors
    CATALOG_NOT_FOUND = 'CATALOG_NOT_FOUND',
    CATALOG_EMPTY = 'CATALOG_EMPTY',
    NO_CHANNELS_FOR_REGION = 'NO_CHANNELS_FOR_REGION',
    ICAO_NOT_FOUND = 'ICAO_NOT_FOUND',

    // Selection Errors
    NO_MATCH_SELECTED = 'NO_MATCH_SELECTED',
    AMBIGUOUS_FUZZY_MATCH = 'AMBIGUOUS_FUZZY_MATCH',
    FUZZY_MATCHER_UNAVAILABLE = 'FUZZY_MATCHER_UNAVAILABLE',

    // Storage Errors
    FAVORITES_PERSISTENCE_FAILURE = 'FAVORITES_PERSISTENCE_FAILURE',

    // Playback Errors
    PLAYER_LAUNCH_FAILED = 'PLAYER_LAUNCH_FAILED',

    // Configuration Errors
    CONFIG_INVALID = 'CONFIG_INVALID',

    // Session
    SESSION_INTERRUPTED = 'SESSION_INTERRUPTED',

    // Generic
    UNKNOWN = 'UNKNOWN',
}

/**
 * Base application error structure.
 */
export interface AppError {
    /** Error code from canonical taxonomy */
    code: AppErrorCode;
    /** Technical error message */
    message: string;
    /** Whether recovery might succeed */
    recoverable: boolean;
    /** Additional context for debugging */
    context?: Record<string, unknown>;
}

/**
 * Extract AppErrorCode from any error type that has a code property.
 * Works with CatalogError, SelectionError, FavoritesError, etc.
 */
export function getErrorCode(error: unknown): AppErrorCode | null {
    if (error && typeof error === 'object' && 'code' in error) {
        const code = error.code;
        if (typeof code === 'string' && isAppErrorCode(code)) {
            return code;
        }
    }
    return null;
}

function isAppErrorCode(value: string): value is AppErrorCode {
    return Object.values(AppErrorCode).some((code) => code === value);
}
