/**
 * @fileoverview Maps error codes to session exit codes and user hints.
 * @module core/error-recovery/ErrorOutcomes
 * @version 1.0.0
 */

import { AppErrorCode } from '../../types/app-errors';
import { ENV_KEYS } from '../../config/envKeys';
import { EXIT_CODES } from './types';
import type { ErrorOutcome } from './types';

export function getErrorOutcome(errorCode: AppErrorCode | null): ErrorOutcome {
    switch (errorCode) {
        // User chose nothing -> clean exit
        case AppErrorCode.NO_MATCH_SELECTED:
            return { exitCode: EXIT_CODES.OK, hint: null, quiet: true };

        case AppErrorCode.SESSION_INTERRUPTED:
            return { exitCode: EXIT_CODES.INTERRUPTED, hint: null, quiet: true };

        // Catalog errors -> point at the catalog setting
        case AppErrorCode.CATALOG_NOT_FOUND:
        case AppErrorCode.CATALOG_EMPTY:
            return {
                exitCode: EXIT_CODES.FAILURE,
                hint: `Pass --catalog <path> or set ${ENV_KEYS.CATALOG}`,
                quiet: false,
            };

        case AppErrorCode.NO_CHANNELS_FOR_REGION:
            return { exitCode: EXIT_CODES.FAILURE, hint: null, quiet: false };

        case AppErrorCode.ICAO_NOT_FOUND:
            return {
                exitCode: EXIT_CODES.FAILURE,
                hint: 'Run without --icao to browse the catalog',
                quiet: false,
            };

        // Catalog holds two rows with the same label
        case AppErrorCode.AMBIGUOUS_FUZZY_MATCH:
            return {
                exitCode: EXIT_CODES.AMBIGUOUS_SELECTION,
                hint: 'Check the catalog warnings for duplicate channels',
                quiet: false,
            };

        // Missing external tools
        case AppErrorCode.FUZZY_MATCHER_UNAVAILABLE:
            return {
                exitCode: EXIT_CODES.FAILURE,
                hint: 'Install fzf or run without --fuzzy',
                quiet: false,
            };

        case AppErrorCode.PLAYER_LAUNCH_FAILED:
            return {
                exitCode: EXIT_CODES.FAILURE,
                hint: `Install mpv, or pass --player <cmd> / set ${ENV_KEYS.PLAYER}`,
                quiet: false,
            };

        case AppErrorCode.CONFIG_INVALID:
            return {
                exitCode: EXIT_CODES.FAILURE,
                hint: 'Fix the named setting and run again',
                quiet: false,
            };

        default:
            return { exitCode: EXIT_CODES.FAILURE, hint: null, quiet: false };
    }
}
