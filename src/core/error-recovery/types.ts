/**
 * @fileoverview Type definitions for error recovery module.
 * @module core/error-recovery/types
 * @version 1.0.0
 */

/** Process exit codes for a session. */
export const EXIT_CODES = {
    OK: 0,
    FAILURE: 1,
    AMBIGUOUS_SELECTION: 2,
    /** 128 + SIGINT */
    INTERRUPTED: 130,
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

/** How a session ends after an error. */
export interface ErrorOutcome {
    exitCode: ExitCode;
    /** Printed under the error message; null when there is nothing to suggest */
    hint: string | null;
    /** End quietly, without an error message */
    quiet: boolean;
}
