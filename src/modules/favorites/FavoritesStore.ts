/**
 * @fileoverview Favorites Store implementation.
 * Keeps a bounded, usage-ranked list of resolved channels in a JSON file.
 * @module modules/favorites/FavoritesStore
 * @version 1.0.0
 */

import { AppErrorCode } from '../../types/app-errors';
import type { ILogger } from '../../utils/interfaces';
import { safeReadJsonFile, safeWriteTextFile } from '../../utils/storage';
import { normalizeKey } from '../catalog/normalize';
import {
    DEFAULT_MAX_FAVORITES,
    FAVORITES_ERROR_MESSAGES,
    FAVORITES_STORAGE_VERSION,
} from './constants';
import type { FavoritesStoreConfig, IFavoritesStore } from './interfaces';
import type { FavoriteEntry, FavoritesRecordResult, StoredFavorites } from './types';

// ============================================
// FavoritesError Class
// ============================================

/**
 * Favorites-specific error with AppErrorCode. Always recoverable.
 */
export class FavoritesError extends Error {
    public readonly code: AppErrorCode;
    public readonly recoverable: boolean;

    constructor(code: AppErrorCode, message: string, recoverable = true) {
        super(message);
        this.name = 'FavoritesError';
        this.code = code;
        this.recoverable = recoverable;
    }
}

// ============================================
// Ranking Helpers
// ============================================

/**
 * Order by playCount desc, then lastUsedTimestamp desc. Stable for ties.
 */
export function compareFavorites(a: FavoriteEntry, b: FavoriteEntry): number {
    if (a.playCount !== b.playCount) {
        return b.playCount - a.playCount;
    }
    return b.lastUsedTimestamp - a.lastUsedTimestamp;
}

function sameChannel(entry: FavoriteEntry, icao: string, channelDescription: string): boolean {
    return entry.icao === icao.trim().toUpperCase() &&
        normalizeKey(entry.channelDescription) === normalizeKey(channelDescription);
}

function parseTimestamp(value: unknown): number | null {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === 'string') {
        const parsed = Date.parse(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

/**
 * Read one stored entry, filling in missing counters.
 * Missing playCount defaults to 1; missing or unreadable timestamp to `now`.
 */
function toEntry(value: unknown, now: number): FavoriteEntry | null {
    if (!value || typeof value !== 'object') {
        return null;
    }
    const obj: Record<string, unknown> = { ...value };
    const icao = obj['icao'];
    const channelDescription = obj['channelDescription'];
    if (typeof icao !== 'string' || !icao.trim() ||
        typeof channelDescription !== 'string' || !channelDescription.trim()) {
        return null;
    }

    const rawCount = obj['playCount'];
    const playCount = typeof rawCount === 'number' && Number.isFinite(rawCount) && rawCount >= 1
        ? Math.floor(rawCount)
        : 1;

    return {
        icao: icao.trim().toUpperCase(),
        channelDescription: channelDescription.trim(),
        playCount,
        lastUsedTimestamp: parseTimestamp(obj['lastUsedTimestamp']) ?? now,
    };
}

// ============================================
// Favorites Store Class
// ============================================

/**
 * File-backed favorites. Every call reads the file, so several processes
 * sharing one file see each other's writes.
 * @implements {IFavoritesStore}
 */
export class FavoritesStore implements IFavoritesStore {
    private readonly _filePath: string;
    private readonly _maxEntries: number;
    private readonly _now: () => number;
    private readonly _logger: Pick<ILogger, 'warn'>;

    constructor(config: FavoritesStoreConfig) {
        this._filePath = config.filePath;
        this._maxEntries = Math.max(1, Math.floor(config.maxEntries ?? DEFAULT_MAX_FAVORITES));
        this._now = config.now ?? Date.now;
        this._logger = config.logger ?? { warn: console.warn.bind(console) };
    }

    public get maxEntries(): number {
        return this._maxEntries;
    }

    public list(): FavoriteEntry[] {
        return this._rank(this._load());
    }

    public record(icao: string, channelDescription: string): FavoritesRecordResult {
        const now = this._now();
        const entries = this._load();
        const existing = entries.find((e) => sameChannel(e, icao, channelDescription));

        if (existing) {
            existing.playCount += 1;
            existing.lastUsedTimestamp = now;
        } else {
            entries.push({
                icao: icao.trim().toUpperCase(),
                channelDescription: channelDescription.trim(),
                playCount: 1,
                lastUsedTimestamp: now,
            });
        }

        return this._save(this._rank(entries));
    }

    public clear(): FavoritesRecordResult {
        return this._save([]);
    }

    private _rank(entries: FavoriteEntry[]): FavoriteEntry[] {
        return [...entries].sort(compareFavorites).slice(0, this._maxEntries);
    }

    private _load(): FavoriteEntry[] {
        const read = safeReadJsonFile(this._filePath);
        if (read.status === 'missing') {
            return [];
        }
        if (read.status === 'corrupt') {
            this._logger.warn(`[FavoritesStore] ${FAVORITES_ERROR_MESSAGES.CORRUPTED}: ${this._filePath}`);
            return [];
        }

        const value = read.value;
        let rawEntries: unknown[] = [];
        if (Array.isArray(value)) {
            rawEntries = value;
        } else if (value && typeof value === 'object' && 'entries' in value && Array.isArray(value.entries)) {
            rawEntries = value.entries;
        }

        const now = this._now();
        const entries: FavoriteEntry[] = [];
        for (const raw of rawEntries) {
            const entry = toEntry(raw, now);
            // First occurrence wins when a hand-edited file repeats a channel.
            if (entry && !entries.some((e) => sameChannel(e, entry.icao, entry.channelDescription))) {
                entries.push(entry);
            }
        }
        return entries;
    }

    private _save(entries: FavoriteEntry[]): FavoritesRecordResult {
        const stored: StoredFavorites = { version: FAVORITES_STORAGE_VERSION, entries };
        if (safeWriteTextFile(this._filePath, JSON.stringify(stored, null, 2))) {
            return { entries, persisted: true };
        }

        const error = new FavoritesError(
            AppErrorCode.FAVORITES_PERSISTENCE_FAILURE,
            `${FAVORITES_ERROR_MESSAGES.PERSISTENCE_FAILURE}: ${this._filePath}`
        );
        this._logger.warn(`[FavoritesStore] ${error.message}`);
        return { entries, persisted: false, error };
    }
}
