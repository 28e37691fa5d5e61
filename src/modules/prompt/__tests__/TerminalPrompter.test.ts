/**
 * @fileoverview Unit tests for TerminalPrompter.
 * @module modules/prompt/__tests__/TerminalPrompter.test
 */

import readline from 'node:readline/promises';
import { PassThrough } from 'node:stream';
import { TerminalPrompter } from '../TerminalPrompter';
import type { LineReader } from '../interfaces';
import type { ChoiceRequest } from '../../selection/types';
import { AppErrorCode } from '../../../types/app-errors';
import { silentLogger } from '../../../utils/logger';

function createReader(answers: string[]): LineReader & { question: jest.Mock; close: jest.Mock } {
    const queue = [...answers];
    return {
        question: jest.fn(async () => {
            const next = queue.shift();
            if (next === undefined) {
                throw new Error('readline was closed');
            }
            return next;
        }),
        close: jest.fn(),
        on: jest.fn(),
        removeListener: jest.fn(),
    };
}

const countries: ChoiceRequest<string> = {
    step: 'country',
    title: 'Select a country in Europe',
    options: [
        { label: 'Netherlands', value: 'NL' },
        { label: 'United Kingdom', value: 'UK' },
    ],
    allowBack: true,
};

describe('TerminalPrompter', () => {
    let output: string;
    const write = (text: string): void => {
        output += text;
    };

    beforeEach(() => {
        output = '';
    });

    it('should render a numbered menu with a back entry', async () => {
        const prompter = new TerminalPrompter({ reader: createReader(['2']), write, logger: silentLogger });

        const outcome = await prompter.choose(countries);

        expect(outcome).toEqual({ kind: 'selected', value: 'UK' });
        expect(output).toBe(
            '\nSelect a country in Europe\n  1. Netherlands\n  2. United Kingdom\n  0. Go back\n'
        );
    });

    it('should return back for 0 when backing out is allowed', async () => {
        const prompter = new TerminalPrompter({ reader: createReader([' 0 ']), write, logger: silentLogger });

        await expect(prompter.choose(countries)).resolves.toEqual({ kind: 'back' });
    });

    it('should re-ask until the input is a listed number', async () => {
        const reader = createReader(['abc', '0', '3', '1']);
        const prompter = new TerminalPrompter({ reader, write, logger: silentLogger });

        const outcome = await prompter.choose({ ...countries, allowBack: false });

        expect(outcome).toEqual({ kind: 'selected', value: 'NL' });
        expect(reader.question).toHaveBeenCalledTimes(4);
        expect(output.split('\n').filter((line) => line.startsWith('Invalid choice'))).toEqual([
            'Invalid choice, enter a number from 1 to 2',
            'Invalid choice, enter a number from 1 to 2',
            'Invalid choice, enter a number from 1 to 2',
        ]);
        expect(output).not.toContain('Go back');
    });

    it('should pad numbers when there are ten or more options', async () => {
        const options = Array.from({ length: 10 }, (_, i) => ({ label: `Option ${i + 1}`, value: i }));
        const prompter = new TerminalPrompter({ reader: createReader(['10']), write, logger: silentLogger });

        const outcome = await prompter.choose({ step: 'airport', title: 'Pick', options, allowBack: false });

        expect(outcome).toEqual({ kind: 'selected', value: 9 });
        expect(output.split('\n')[2]).toBe('   1. Option 1');
        expect(output.split('\n')[11]).toBe('  10. Option 10');
    });

    it('should raise NO_MATCH_SELECTED when input closes', async () => {
        const prompter = new TerminalPrompter({ reader: createReader([]), write, logger: silentLogger });

        await expect(prompter.choose(countries)).rejects.toMatchObject({
            code: AppErrorCode.NO_MATCH_SELECTED,
            message: 'Input closed before a choice was made',
        });
    });

    it('should raise NO_MATCH_SELECTED for an empty menu without back', async () => {
        const reader = createReader(['1']);
        const prompter = new TerminalPrompter({ reader, write, logger: silentLogger });

        await expect(
            prompter.choose({ step: 'favorites', title: 'Select a favorite', options: [], allowBack: false })
        ).rejects.toMatchObject({ code: AppErrorCode.NO_MATCH_SELECTED });
        expect(reader.question).not.toHaveBeenCalled();
    });

    describe('with a readline interface', () => {
        let input: PassThrough;
        let rl: readline.Interface;
        let closed: boolean;

        beforeEach(() => {
            input = new PassThrough();
            rl = readline.createInterface({ input, output: new PassThrough() });
            closed = false;
            rl.on('close', () => {
                closed = true;
            });
        });

        afterEach(() => {
            if (!closed) {
                rl.close();
            }
        });

        it('should resolve with the typed number', async () => {
            const prompter = new TerminalPrompter({ reader: rl, write, logger: silentLogger });

            const pending = prompter.choose(countries);
            input.write('1\n');

            await expect(pending).resolves.toEqual({ kind: 'selected', value: 'NL' });
        });

        it('should raise NO_MATCH_SELECTED when the interface closes mid-question', async () => {
            const prompter = new TerminalPrompter({ reader: rl, write, logger: silentLogger });

            const pending = prompter.choose(countries);
            rl.close();

            await expect(pending).rejects.toMatchObject({
                code: AppErrorCode.NO_MATCH_SELECTED,
                message: 'Input closed before a choice was made',
            });
        });

        it('should raise NO_MATCH_SELECTED when input already ended', async () => {
            const prompter = new TerminalPrompter({ reader: rl, write, logger: silentLogger });
            rl.close();

            await expect(prompter.choose(countries)).rejects.toMatchObject({
                code: AppErrorCode.NO_MATCH_SELECTED,
            });
        });

        it('should abort a pending question on dispose', async () => {
            const prompter = new TerminalPrompter({ reader: rl, write, logger: silentLogger });

            const pending = prompter.choose(countries);
            prompter.dispose();

            await expect(pending).rejects.toMatchObject({ code: AppErrorCode.NO_MATCH_SELECTED });
        });
    });

    it('should close the reader on dispose', () => {
        const reader = createReader([]);
        const prompter = new TerminalPrompter({ reader, write, logger: silentLogger });

        prompter.dispose();
        prompter.dispose();

        expect(reader.close).toHaveBeenCalledTimes(1);
    });
});
