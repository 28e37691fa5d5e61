/**
 * @fileoverview Unit tests for AppOrchestrator.
 * @module __tests__/Orchestrator.test
 * @version 1.0.0
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AppOrchestrator, type OrchestratorDeps } from '../Orchestrator';
import { defaultConfig, type AppConfig } from '../config/AppConfig';
import type { IPlaybackCoordinator } from '../modules/playback';
import { decodeMetar, type IWeatherClient } from '../modules/weather';
import type { LineReader } from '../modules/prompt';
import { silentLogger } from '../utils/logger';
import { CATALOG_CSV, CATALOG_HEADER, CATALOG_ROWS } from './fixtures/catalog';
import { ScriptedPrompter, createFuzzyMatcher } from './fixtures/selection';

const KORD_METAR = 'KORD 121651Z 27010KT 9999 FEW030 15/05 Q1015';

// ============================================
// Test Doubles
// ============================================

function createPlayback(): IPlaybackCoordinator & {
    start: jest.Mock;
    waitForAtcExit: jest.Mock;
    stopAll: jest.Mock;
} {
    return {
        start: jest.fn().mockResolvedValue(undefined),
        waitForAtcExit: jest.fn().mockResolvedValue(0),
        stopAll: jest.fn(() => 0),
        dispose: jest.fn(),
        on: jest.fn(() => ({ dispose: jest.fn() })),
    };
}

function createWeather(): IWeatherClient & { getReport: jest.Mock } {
    return {
        getReport: jest.fn(async (icao: string) => ({
            icao,
            raw: KORD_METAR,
            available: true,
            decoded: decodeMetar(KORD_METAR),
        })),
    };
}

describe('AppOrchestrator', () => {
    let dir: string;
    let config: AppConfig;
    let output: string;
    let errors: string;
    let playback: ReturnType<typeof createPlayback>;
    let weather: ReturnType<typeof createWeather>;

    function createOrchestrator(deps: OrchestratorDeps = {}): AppOrchestrator {
        return new AppOrchestrator(config, {
            prompter: new ScriptedPrompter([]),
            fuzzyMatcher: createFuzzyMatcher(null),
            weather,
            playback,
            write: (text) => {
                output += text;
            },
            writeError: (text) => {
                errors += text;
            },
            logger: silentLogger,
            ...deps,
        });
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-test-'));
        const catalogPath = path.join(dir, 'channels.csv');
        fs.writeFileSync(catalogPath, CATALOG_CSV);
        config = {
            ...defaultConfig(dir),
            catalogPath,
            favoritesPath: path.join(dir, 'favorites.json'),
        };
        output = '';
        errors = '';
        playback = createPlayback();
        weather = createWeather();
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('run', () => {
        it('should select, report weather and play until the player exits', async () => {
            const orchestrator = createOrchestrator();

            const exitCode = await orchestrator.run({ mode: 'icao', icao: 'KORD' });

            expect(exitCode).toBe(0);
            expect(output.split('\n').slice(0, 3)).toEqual([
                '',
                "Selected: [Chicago, United States] O'Hare International (KORD/ORD) | Tower",
                'Stream:   https://streams.example/kord-twr',
            ]);
            expect(output).toContain(`METAR KORD: ${KORD_METAR}\n`);
            expect(output).toContain('Ceiling:     Few at 3000 ft\n');
            expect(output).toContain('Pressure:    1015 hPa\n');
            expect(weather.getReport).toHaveBeenCalledWith('KORD');
            expect(playback.start).toHaveBeenCalledWith(
                expect.objectContaining({ streamUrl: 'https://streams.example/kord-twr', strategy: 'icao' })
            );
            expect(playback.waitForAtcExit).toHaveBeenCalled();
            expect(playback.stopAll).toHaveBeenCalled();
        });

        it('should print the webcam and nearby airports when the channel has them', async () => {
            const orchestrator = createOrchestrator({ prompter: new ScriptedPrompter(['Tower [webcam available]']) });

            await orchestrator.run({ mode: 'icao', icao: 'KJFK' });

            expect(output).toContain('Webcam:   https://cams.example/kjfk\nNearby:   KLGA, KEWR\n');
        });

        it('should record the selection in the favorites file', async () => {
            await createOrchestrator().run({ mode: 'icao', icao: 'EHAM' });

            const stored: unknown = JSON.parse(fs.readFileSync(config.favoritesPath, 'utf8'));
            expect(stored).toMatchObject({
                version: 1,
                entries: [{ icao: 'EHAM', channelDescription: 'Tower', playCount: 1 }],
            });
        });

        it('should skip the weather report when weather is disabled', async () => {
            config = { ...config, weatherEnabled: false };
            const orchestrator = createOrchestrator();

            await orchestrator.run({ mode: 'icao', icao: 'KORD' });

            expect(weather.getReport).not.toHaveBeenCalled();
            expect(output).not.toContain('METAR');
            expect(orchestrator.getModuleStatus().get('weather')?.status).toBe('disabled');
        });

        it('should announce the favorites fallback', async () => {
            const orchestrator = createOrchestrator({
                prompter: new ScriptedPrompter(['Asia', 'Japan', 'Tokyo - Haneda']),
            });

            const exitCode = await orchestrator.run({ mode: 'favorites' });

            expect(exitCode).toBe(0);
            expect(output.startsWith('No saved favorites found, starting guided selection.\n')).toBe(true);
        });

        it('should count stale favorites in the fallback notice', async () => {
            fs.writeFileSync(config.favoritesPath, JSON.stringify({
                version: 1,
                entries: [{ icao: 'ZZZZ', channelDescription: 'Tower', playCount: 2, lastUsedTimestamp: 1000 }],
            }));
            const orchestrator = createOrchestrator({
                prompter: new ScriptedPrompter(['Asia', 'Japan', 'Tokyo - Haneda']),
            });

            await orchestrator.run({ mode: 'favorites' });

            expect(output.split('\n')[0]).toBe(
                'None of your 1 saved favorites are in the catalog, starting guided selection.'
            );
        });

        it('should close the terminal reader before the player takes the terminal', async () => {
            const reader: LineReader & { close: jest.Mock } = {
                question: jest.fn().mockResolvedValue('1'),
                close: jest.fn(),
                on: jest.fn(),
                removeListener: jest.fn(),
            };
            let closesAtStart = -1;
            playback.start.mockImplementation(async () => {
                closesAtStart = reader.close.mock.calls.length;
            });
            const orchestrator = createOrchestrator({
                prompter: undefined,
                terminal: { reader, write: () => undefined },
            });

            const exitCode = await orchestrator.run({ mode: 'icao', icao: 'KJFK' });

            expect(exitCode).toBe(0);
            expect(closesAtStart).toBe(1);
            expect(playback.start).toHaveBeenCalledWith(
                expect.objectContaining({ streamUrl: 'https://streams.example/kjfk-app' })
            );
        });
    });

    describe('error handling', () => {
        it('should exit with 1 and a hint when the catalog is missing', async () => {
            config = { ...config, catalogPath: path.join(dir, 'missing.csv') };
            const orchestrator = createOrchestrator();

            const exitCode = await orchestrator.run({ mode: 'guided' });

            expect(exitCode).toBe(1);
            expect(errors).toBe(
                `Error: Channel catalog not found: ${config.catalogPath}\n` +
                'Hint: Pass --catalog <path> or set ATC_TUNER_CATALOG\n'
            );
            expect(orchestrator.isReady()).toBe(false);
            expect(orchestrator.getModuleStatus().get('catalog')?.status).toBe('error');
        });

        it('should exit with 1 for an unknown ICAO code', async () => {
            const exitCode = await createOrchestrator().run({ mode: 'icao', icao: 'ZZZZ' });

            expect(exitCode).toBe(1);
            expect(errors).toBe(
                'Error: No channels found for ICAO code: ZZZZ\n' +
                'Hint: Run without --icao to browse the catalog\n'
            );
            expect(playback.start).not.toHaveBeenCalled();
        });

        it('should end quietly with 0 when nothing is selected', async () => {
            const exitCode = await createOrchestrator().run({ mode: 'fuzzy' });

            expect(exitCode).toBe(0);
            expect(output).toBe('No channel was selected.\n');
            expect(errors).toBe('');
        });

        it('should exit with 2 for an ambiguous fuzzy match', async () => {
            fs.writeFileSync(config.catalogPath, [CATALOG_HEADER, CATALOG_ROWS[3], CATALOG_ROWS[3]].join('\n'));
            const orchestrator = createOrchestrator({
                fuzzyMatcher: createFuzzyMatcher("[Chicago, United States] O'Hare International (KORD/ORD) | Tower"),
            });

            await expect(orchestrator.run({ mode: 'fuzzy' })).resolves.toBe(2);
        });

        it('should exit with 1 when the player cannot start', async () => {
            playback.start.mockRejectedValue(
                Object.assign(new Error('Could not start player (mpv): spawn mpv ENOENT'), {
                    code: 'PLAYER_LAUNCH_FAILED',
                })
            );

            const exitCode = await createOrchestrator().run({ mode: 'random' });

            expect(exitCode).toBe(1);
            expect(errors).toBe(
                'Error: Could not start player (mpv): spawn mpv ENOENT\n' +
                'Hint: Install mpv, or pass --player <cmd> / set ATC_TUNER_PLAYER\n'
            );
            expect(playback.stopAll).toHaveBeenCalled();
        });
    });

    describe('interrupt', () => {
        it('should not start playback when interrupted before the player launches', async () => {
            const orchestrator = createOrchestrator();
            weather.getReport.mockImplementationOnce(async (icao: string) => {
                orchestrator.interrupt();
                return { icao, raw: KORD_METAR, available: true, decoded: decodeMetar(KORD_METAR) };
            });

            const exitCode = await orchestrator.run({ mode: 'icao', icao: 'KORD' });

            expect(exitCode).toBe(130);
            expect(playback.start).not.toHaveBeenCalled();
            expect(output.endsWith('\nInterrupted.\n')).toBe(true);
            expect(errors).toBe('');
        });

        it('should end a pending menu as interrupted', async () => {
            let abortQuestion: (error: Error) => void = () => undefined;
            const reader: LineReader = {
                question: jest.fn(() => new Promise<string>((_, reject) => {
                    abortQuestion = reject;
                })),
                close: jest.fn(() => abortQuestion(new Error('aborted'))),
                on: jest.fn(),
                removeListener: jest.fn(),
            };
            const orchestrator = createOrchestrator({
                prompter: undefined,
                terminal: { reader, write: () => undefined },
            });

            const running = orchestrator.run({ mode: 'guided' });
            await new Promise((resolve) => setImmediate(resolve));
            orchestrator.interrupt();

            await expect(running).resolves.toBe(130);
            expect(output).toBe('Interrupted.\n');
            expect(playback.start).not.toHaveBeenCalled();
        });
    });

    describe('initialize', () => {
        it('should mark every enabled module ready', () => {
            const orchestrator = createOrchestrator();

            orchestrator.initialize();

            expect(orchestrator.isReady()).toBe(true);
            expect([...orchestrator.getModuleStatus().values()].map((m) => m.status)).toEqual([
                'ready', 'ready', 'ready', 'ready', 'ready',
            ]);
            expect(orchestrator.getCatalog()?.size).toBe(8);
        });
    });
});
