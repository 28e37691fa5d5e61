/**
 * @fileoverview Interface definitions for the Prompt module.
 * @module modules/prompt/interfaces
 * @version 1.0.0
 */

import type { SpawnOptions } from 'node:child_process';
import type { ILogger } from '../../utils/interfaces';

// ============================================
// Terminal Prompter
// ============================================

/**
 * The part of a `readline/promises` Interface the prompter uses.
 */
export interface LineReader {
    question(query: string, options: { signal: AbortSignal }): Promise<string>;
    close(): void;
    on(event: 'close', listener: () => void): unknown;
    removeListener(event: 'close', listener: () => void): unknown;
}

export interface TerminalPrompterConfig {
    /** Line source; a readline interface over stdin/stdout is created on first use */
    reader?: LineReader;
    /** Menu output (default process.stdout) */
    write?: (text: string) => void;
    logger?: Pick<ILogger, 'debug'>;
}

// ============================================
// Fuzzy Matcher
// ============================================

/**
 * The part of a spawned ChildProcess the matcher uses.
 */
export interface MatcherProcess {
    stdin: {
        end(chunk: string): unknown;
        on(event: 'error', listener: (error: Error) => void): unknown;
    } | null;
    stdout: {
        setEncoding(encoding: BufferEncoding): unknown;
        on(event: 'data', listener: (chunk: string) => void): unknown;
    } | null;
    on(event: 'error', listener: (error: NodeJS.ErrnoException) => void): unknown;
    on(event: 'close', listener: (code: number | null) => void): unknown;
}

export type SpawnMatcher = (
    command: string,
    args: readonly string[],
    options: SpawnOptions
) => MatcherProcess;

export interface FzfMatcherConfig {
    /** Executable name (default fzf) */
    command?: string;
    /** Process factory (default child_process.spawn) */
    spawn?: SpawnMatcher;
    logger?: Pick<ILogger, 'debug'>;
}
