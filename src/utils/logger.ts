/**
 * @fileoverview Console-backed logger used when no logger is injected.
 * @module utils/logger
 * @version 1.0.0
 */

import type { ILogger } from './interfaces';

/**
 * Create a console logger. Debug output is dropped unless enabled.
 */
export function createConsoleLogger(debugEnabled: boolean = false): ILogger {
    return {
        debug: debugEnabled ? console.debug.bind(console) : (): void => undefined,
        warn: console.warn.bind(console),
        error: console.error.bind(console),
    };
}

/** Logger that discards everything (tests, quiet mode). */
export const silentLogger: ILogger = {
    debug: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
