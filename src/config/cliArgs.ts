/**
 * @fileoverview Command-line argument parsing.
 * @module config/cliArgs
 * @version 1.0.0
 */

import type { SelectionRequest } from '../modules/selection/types';
import { AppErrorCode } from '../types/app-errors';
import type { ConfigOverrides } from './AppConfig';

export const USAGE = `Usage: atc-tuner [--fuzzy | --favorites | --icao <ICAO> [--random] | --random]
                 [--catalog <path>] [--no-music] [--no-weather] [--player <cmd>]
                 [--debug] [--help]

Browse live air-traffic-control feeds and play one with ambient music.

Selection (default: guided menus by continent, country, airport and channel):
  --fuzzy            Search every channel with fzf
  --favorites        Pick from your most played channels
  --icao <ICAO>      Go straight to an airport
  --random           Play a random channel (of the --icao airport, if given)

Options:
  --catalog <path>   Channel catalog file
  --player <cmd>     Media player command (default mpv)
  --no-music         Do not start the music stream
  --no-weather       Do not fetch the METAR report
  --debug            Verbose logging
  -h, --help         Show this help
`;

export interface CliOptions {
    request: SelectionRequest;
    overrides: ConfigOverrides;
    help: boolean;
}

/**
 * Bad command line. Reported with the usage text.
 */
export class CliUsageError extends Error {
    public readonly code = AppErrorCode.CONFIG_INVALID;
    public readonly recoverable = false;

    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

type ModeFlag = '--fuzzy' | '--favorites' | '--icao';

function combineMode(current: ModeFlag | null, flag: ModeFlag): ModeFlag {
    if (current !== null && current !== flag) {
        throw new CliUsageError(`${flag} cannot be combined with ${current}`);
    }
    return flag;
}

/**
 * Parse argv (without the node and script entries).
 * Values may follow as the next word or after `=`.
 *
 * @throws CliUsageError for unknown flags, missing values or conflicting modes
 */
export function parseArgs(argv: readonly string[]): CliOptions {
    const overrides: ConfigOverrides = {};
    const pending = [...argv];
    let mode: ModeFlag | null = null;
    let icao = '';
    let random = false;
    let help = false;

    for (let arg = pending.shift(); arg !== undefined; arg = pending.shift()) {
        const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag = eq > 0 ? arg.slice(0, eq) : arg;
        const inline = eq > 0 ? arg.slice(eq + 1) : undefined;

        const takeValue = (): string => {
            const value = inline ?? pending.shift();
            if (value === undefined || value === '' || (inline === undefined && value.startsWith('--'))) {
                throw new CliUsageError(`${flag} needs a value`);
            }
            return value;
        };
        const noValue = (): void => {
            if (inline !== undefined) {
                throw new CliUsageError(`${flag} does not take a value`);
            }
        };

        switch (flag) {
            case '--fuzzy':
            case '--favorites':
                noValue();
                mode = combineMode(mode, flag);
                break;
            case '--icao':
                mode = combineMode(mode, flag);
                icao = takeValue().trim().toUpperCase();
                break;
            case '--random':
                noValue();
                random = true;
                break;
            case '--catalog':
                overrides.catalogPath = takeValue();
                break;
            case '--player':
                overrides.playerCommand = takeValue();
                break;
            case '--no-music':
                noValue();
                overrides.musicEnabled = false;
                break;
            case '--no-weather':
                noValue();
                overrides.weatherEnabled = false;
                break;
            case '--debug':
                noValue();
                overrides.debug = true;
                break;
            case '-h':
            case '--help':
                help = true;
                break;
            default:
                throw new CliUsageError(
                    arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`
                );
        }
    }

    if (random && mode !== null && mode !== '--icao') {
        throw new CliUsageError(`--random cannot be combined with ${mode}`);
    }

    let request: SelectionRequest;
    switch (mode) {
        case '--fuzzy':
            request = { mode: 'fuzzy' };
            break;
        case '--favorites':
            request = { mode: 'favorites' };
            break;
        case '--icao':
            request = { mode: 'icao', icao, random };
            break;
        default:
            request = random ? { mode: 'random' } : { mode: 'guided' };
    }

    return { request, overrides, help };
}
