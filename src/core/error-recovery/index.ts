/**
 * @fileoverview Public exports for the error recovery module.
 * @module core/error-recovery
 * @version 1.0.0
 */

export { getErrorOutcome } from './ErrorOutcomes';
export { EXIT_CODES } from './types';
export type { ErrorOutcome, ExitCode } from './types';
