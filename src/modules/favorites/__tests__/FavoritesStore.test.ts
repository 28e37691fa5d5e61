/**
 * @fileoverview Unit tests for FavoritesStore.
 * @module modules/favorites/__tests__/FavoritesStore.test
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FavoritesStore, compareFavorites } from '../FavoritesStore';
import { AppErrorCode } from '../../../types/app-errors';
import { createMulberry32 } from '../../../utils/prng';

describe('FavoritesStore', () => {
    let dir: string;
    let filePath: string;
    let clock: number;
    let logger: { warn: jest.Mock };

    const now = (): number => clock;

    function createStore(maxEntries?: number): FavoritesStore {
        return new FavoritesStore({ filePath, maxEntries, now, logger });
    }

    /** Record at the next clock tick. */
    function tick(store: FavoritesStore, icao: string, description: string): void {
        clock += 1000;
        store.record(icao, description);
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'favorites-test-'));
        filePath = path.join(dir, 'nested', 'favorites.json');
        clock = 1_000_000;
        logger = { warn: jest.fn() };
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('record', () => {
        it('should insert a new entry with playCount 1', () => {
            const store = createStore();

            const result = store.record('kjfk', ' Tower ');

            expect(result.persisted).toBe(true);
            expect(result.entries).toEqual([
                { icao: 'KJFK', channelDescription: 'Tower', playCount: 1, lastUsedTimestamp: 1_000_000 },
            ]);
        });

        it('should increment and refresh an existing entry, matching case-insensitively', () => {
            const store = createStore();
            store.record('KJFK', 'Tower');
            clock = 2_000_000;

            store.record('kjfk', 'TOWER');

            expect(store.list()).toEqual([
                { icao: 'KJFK', channelDescription: 'Tower', playCount: 2, lastUsedTimestamp: 2_000_000 },
            ]);
        });

        it('should persist the versioned record list', () => {
            createStore().record('EGLL', 'Director');

            const stored = JSON.parse(fs.readFileSync(filePath, 'utf8'));
            expect(stored).toEqual({
                version: 1,
                entries: [
                    { icao: 'EGLL', channelDescription: 'Director', playCount: 1, lastUsedTimestamp: 1_000_000 },
                ],
            });
        });

        it('should rank by playCount then recency', () => {
            const store = createStore();
            tick(store, 'KJFK', 'Tower');
            tick(store, 'EGLL', 'Director');
            tick(store, 'KJFK', 'Tower');
            tick(store, 'RJTT', 'Tower');

            expect(store.list().map((e) => `${e.icao}:${e.playCount}`)).toEqual([
                'KJFK:2',
                'RJTT:1',
                'EGLL:1',
            ]);
        });

        it('should evict the lowest-ranked entries beyond maxEntries', () => {
            const store = createStore(2);
            tick(store, 'KJFK', 'Tower');
            tick(store, 'KJFK', 'Tower');
            tick(store, 'EGLL', 'Director');
            tick(store, 'RJTT', 'Tower');

            expect(store.list().map((e) => e.icao)).toEqual(['KJFK', 'RJTT']);
        });

        it('should never exceed maxEntries and stay sorted for any sequence', () => {
            const store = createStore(4);
            const random = createMulberry32(42);
            const channels = ['KJFK', 'EGLL', 'RJTT', 'KORD', 'CYYZ', 'EHAM', 'LFPG'];

            for (let i = 0; i < 60; i++) {
                const icao = channels[Math.floor(random() * channels.length)] ?? 'KJFK';
                tick(store, icao, 'Tower');

                const entries = store.list();
                expect(entries.length).toBeLessThanOrEqual(4);
                for (let j = 1; j < entries.length; j++) {
                    const previous = entries[j - 1];
                    const current = entries[j];
                    if (previous && current) {
                        expect(compareFavorites(previous, current)).toBeLessThanOrEqual(0);
                    }
                }
            }
        });

        it('should report an unwritable store without throwing', () => {
            const blocker = path.join(dir, 'blocker');
            fs.writeFileSync(blocker, 'not a directory');
            filePath = path.join(blocker, 'favorites.json');
            const store = createStore();

            const result = store.record('KJFK', 'Tower');

            expect(result.persisted).toBe(false);
            expect(result.error?.code).toBe(AppErrorCode.FAVORITES_PERSISTENCE_FAILURE);
            expect(result.error?.recoverable).toBe(true);
            expect(result.entries).toHaveLength(1);
            expect(logger.warn).toHaveBeenCalledWith(
                `[FavoritesStore] Could not write favorites file: ${filePath}`
            );
        });
    });

    describe('list', () => {
        it('should return an empty list when no file exists', () => {
            expect(createStore().list()).toEqual([]);
        });

        it('should fill in missing counters and drop unusable records', () => {
            fs.mkdirSync(path.dirname(filePath), { recursive: true });
            fs.writeFileSync(filePath, JSON.stringify([
                { icao: 'egll', channelDescription: 'Director' },
                { icao: 'KJFK', channelDescription: 'Tower', playCount: 4, lastUsedTimestamp: '2026-01-02T00:00:00.000Z' },
                { icao: '', channelDescription: 'Ground' },
                { icao: 'KJFK', channelDescription: 'tower', playCount: 9 },
                'junk',
            ]));

            expect(createStore().list()).toEqual([
                {
                    icao: 'KJFK',
                    channelDescription: 'Tower',
                    playCount: 4,
                    lastUsedTimestamp: Date.parse('2026-01-02T00:00:00.000Z'),
                },
                { icao: 'EGLL', channelDescription: 'Director', playCount: 1, lastUsedTimestamp: 1_000_000 },
            ]);
        });

        it('should treat a corrupt file as empty and warn', () => {
            fs.mkdirSync(path.dirname(filePath), { recursive: true });
            fs.writeFileSync(filePath, '{ not json');

            expect(createStore().list()).toEqual([]);
            expect(logger.warn).toHaveBeenCalledTimes(1);
        });
    });

    describe('clear', () => {
        it('should remove every entry', () => {
            const store = createStore();
            store.record('KJFK', 'Tower');

            expect(store.clear().persisted).toBe(true);
            expect(store.list()).toEqual([]);
        });
    });
});
