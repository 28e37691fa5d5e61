/**
 * @fileoverview Numbered-menu prompter for the terminal.
 * @module modules/prompt/TerminalPrompter
 * @version 1.0.0
 */

import readline from 'node:readline/promises';
import { AppErrorCode } from '../../types/app-errors';
import type { IDisposable, ILogger } from '../../utils/interfaces';
import { SelectionError } from '../selection/SelectionEngine';
import type { ChoiceOutcome, ChoiceRequest } from '../selection/types';
import type { IPrompter } from '../selection/interfaces';
import { BACK_OPTION_LABEL, CHOICE_QUERY, PROMPT_ERROR_MESSAGES } from './constants';
import type { LineReader, TerminalPrompterConfig } from './interfaces';

function createStdioReader(): LineReader {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    // Ctrl-C at a menu closes the interface; the pending question is aborted on close.
    rl.on('SIGINT', () => rl.close());
    return rl;
}

/**
 * Shows options as `1. label` lines, with `0. Go back` when backing out is allowed,
 * and asks until a valid number is entered.
 * @implements {IPrompter}
 */
export class TerminalPrompter implements IPrompter, IDisposable {
    private _reader: LineReader | null = null;
    private _closed: boolean = false;
    private readonly _write: (text: string) => void;
    private readonly _logger: Pick<ILogger, 'debug'>;

    constructor(config: TerminalPrompterConfig = {}) {
        if (config.reader) {
            this._attach(config.reader);
        }
        this._write = config.write ?? ((text: string): void => {
            process.stdout.write(text);
        });
        this._logger = config.logger ?? console;
    }

    public async choose<T>(request: ChoiceRequest<T>): Promise<ChoiceOutcome<T>> {
        if (request.options.length === 0 && !request.allowBack) {
            throw new SelectionError(
                AppErrorCode.NO_MATCH_SELECTED,
                `${PROMPT_ERROR_MESSAGES.NO_OPTIONS}: ${request.title}`
            );
        }

        this._write(this._render(request));
        const lowest = request.allowBack ? 0 : 1;

        for (;;) {
            const answer = await this._ask();
            const choice = /^\d+$/.test(answer) ? parseInt(answer, 10) : NaN;

            if (request.allowBack && choice === 0) {
                return { kind: 'back' };
            }
            const option = choice >= 1 ? request.options[choice - 1] : undefined;
            if (option) {
                return { kind: 'selected', value: option.value };
            }
            this._write(`Invalid choice, enter a number from ${lowest} to ${request.options.length}\n`);
        }
    }

    public dispose(): void {
        this._reader?.close();
        this._reader = null;
        this._closed = false;
    }

    private _attach(reader: LineReader): LineReader {
        this._reader = reader;
        this._closed = false;
        reader.on('close', () => {
            if (this._reader === reader) {
                this._closed = true;
            }
        });
        return reader;
    }

    private _render<T>(request: ChoiceRequest<T>): string {
        const width = String(request.options.length).length;
        const lines = request.options.map(
            (option, index) => `  ${String(index + 1).padStart(width)}. ${option.label}`
        );
        if (request.allowBack) {
            lines.push(`  ${'0'.padStart(width)}. ${BACK_OPTION_LABEL}`);
        }
        return `\n${request.title}\n${lines.join('\n')}\n`;
    }

    /**
     * Ask once. Closing the reader (Ctrl-C, end of input, dispose) aborts the
     * pending question.
     */
    private async _ask(): Promise<string> {
        const reader = this._reader ?? this._attach(createStdioReader());
        if (this._closed) {
            throw this._inputClosed();
        }

        const controller = new AbortController();
        const abort = (): void => controller.abort();
        reader.on('close', abort);
        try {
            return (await reader.question(CHOICE_QUERY, { signal: controller.signal })).trim();
        } catch (error) {
            this._logger.debug('[TerminalPrompter] Input closed:', error);
            throw this._inputClosed();
        } finally {
            reader.removeListener('close', abort);
        }
    }

    private _inputClosed(): SelectionError {
        return new SelectionError(AppErrorCode.NO_MATCH_SELECTED, PROMPT_ERROR_MESSAGES.INPUT_CLOSED);
    }
}
