/**
 * @fileoverview Adapter over the `fzf` exact-substring filter.
 * Labels go to the child's stdin; the chosen line comes back on stdout while
 * fzf draws its own interface on the terminal.
 * @module modules/prompt/FzfMatcher
 * @version 1.0.0
 */

import { spawn } from 'node:child_process';
import { AppErrorCode } from '../../types/app-errors';
import type { ILogger } from '../../utils/interfaces';
import { SelectionError } from '../selection/SelectionEngine';
import type { IFuzzyMatcher } from '../selection/interfaces';
import {
    DEFAULT_FUZZY_COMMAND,
    FUZZY_NO_SELECTION_EXIT_CODES,
    PROMPT_ERROR_MESSAGES,
} from './constants';
import type { FzfMatcherConfig, SpawnMatcher } from './interfaces';

/**
 * @implements {IFuzzyMatcher}
 */
export class FzfMatcher implements IFuzzyMatcher {
    private readonly _command: string;
    private readonly _spawn: SpawnMatcher;
    private readonly _logger: Pick<ILogger, 'debug'>;

    constructor(config: FzfMatcherConfig = {}) {
        this._command = config.command ?? DEFAULT_FUZZY_COMMAND;
        this._spawn = config.spawn ?? spawn;
        this._logger = config.logger ?? console;
    }

    /**
     * @throws SelectionError FUZZY_MATCHER_UNAVAILABLE when fzf is missing or fails
     */
    public pick(lines: string[], prompt: string): Promise<string | null> {
        return new Promise((resolve, reject) => {
            const child = this._spawn(this._command, ['--exact', '--prompt', prompt], {
                stdio: ['pipe', 'pipe', 'inherit'],
            });
            let output = '';

            child.stdout?.setEncoding('utf8');
            child.stdout?.on('data', (chunk: string) => {
                output += chunk;
            });

            child.on('error', (error: NodeJS.ErrnoException) => {
                const message = error.code === 'ENOENT'
                    ? `${PROMPT_ERROR_MESSAGES.MATCHER_NOT_FOUND}: ${this._command}`
                    : `${this._command}: ${error.message}`;
                reject(new SelectionError(AppErrorCode.FUZZY_MATCHER_UNAVAILABLE, message, false));
            });

            child.on('close', (code: number | null) => {
                if (code === 0) {
                    const [line = ''] = output.split('\n');
                    resolve(line.trim() || null);
                    return;
                }
                if (code !== null && FUZZY_NO_SELECTION_EXIT_CODES.includes(code)) {
                    resolve(null);
                    return;
                }
                reject(new SelectionError(
                    AppErrorCode.FUZZY_MATCHER_UNAVAILABLE,
                    `${PROMPT_ERROR_MESSAGES.MATCHER_FAILED} ${String(code)}`,
                    false
                ));
            });

            // The child may exit before reading everything; that is reported through 'close'.
            child.stdin?.on('error', (error: Error) => {
                this._logger.debug(`[FzfMatcher] stdin closed early: ${error.message}`);
            });
            child.stdin?.end(`${lines.join('\n')}\n`);
        });
    }
}
