/**
 * @fileoverview Unit tests for command-line parsing.
 * @module config/__tests__/cliArgs.test
 * @version 1.0.0
 */

import { CliUsageError, parseArgs } from '../cliArgs';

describe('parseArgs', () => {
    it('should default to guided selection with no overrides', () => {
        expect(parseArgs([])).toEqual({ request: { mode: 'guided' }, overrides: {}, help: false });
    });

    it('should upper-case the ICAO code and keep the random flag', () => {
        expect(parseArgs(['--icao', 'kjfk', '--random']).request).toEqual({
            mode: 'icao',
            icao: 'KJFK',
            random: true,
        });
    });

    it('should accept values after an equals sign', () => {
        const options = parseArgs(['--icao=egll', '--catalog=/tmp/feeds.csv', '--player=vlc']);

        expect(options.request).toEqual({ mode: 'icao', icao: 'EGLL', random: false });
        expect(options.overrides).toEqual({ catalogPath: '/tmp/feeds.csv', playerCommand: 'vlc' });
    });

    it('should request a random channel when --random stands alone', () => {
        expect(parseArgs(['--random']).request).toEqual({ mode: 'random' });
    });

    it('should map the fuzzy and favorites flags to their modes', () => {
        expect(parseArgs(['--fuzzy']).request).toEqual({ mode: 'fuzzy' });
        expect(parseArgs(['--favorites']).request).toEqual({ mode: 'favorites' });
    });

    it('should turn the switches into config overrides', () => {
        expect(parseArgs(['--no-music', '--no-weather', '--debug']).overrides).toEqual({
            musicEnabled: false,
            weatherEnabled: false,
            debug: true,
        });
    });

    it('should report help for both spellings', () => {
        expect(parseArgs(['-h']).help).toBe(true);
        expect(parseArgs(['--help']).help).toBe(true);
    });

    describe('usage errors', () => {
        it('should reject an unknown option', () => {
            expect(() => parseArgs(['--x'])).toThrow(new CliUsageError('Unknown option: --x'));
        });

        it('should reject a stray argument', () => {
            expect(() => parseArgs(['KJFK'])).toThrow('Unexpected argument: KJFK');
        });

        it('should require a value for --icao', () => {
            expect(() => parseArgs(['--icao'])).toThrow('--icao needs a value');
            expect(() => parseArgs(['--icao', '--random'])).toThrow('--icao needs a value');
        });

        it('should reject a value on a switch', () => {
            expect(() => parseArgs(['--fuzzy=yes'])).toThrow('--fuzzy does not take a value');
        });

        it('should reject two selection modes', () => {
            expect(() => parseArgs(['--fuzzy', '--favorites'])).toThrow(
                '--favorites cannot be combined with --fuzzy'
            );
        });

        it('should reject --random with a mode other than --icao', () => {
            expect(() => parseArgs(['--random', '--fuzzy'])).toThrow(
                '--random cannot be combined with --fuzzy'
            );
        });

        it('should carry the config error code', () => {
            try {
                parseArgs(['--bogus']);
                throw new Error('expected a usage error');
            } catch (error) {
                expect(error).toBeInstanceOf(CliUsageError);
                expect(error).toMatchObject({ code: 'CONFIG_INVALID', recoverable: false });
            }
        });
    });
});
