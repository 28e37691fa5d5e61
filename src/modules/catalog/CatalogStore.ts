/**
 * @fileoverview Catalog Store implementation.
 * Loads the flat channel catalog once and answers read-only queries over it.
 * @module modules/catalog/CatalogStore
 * @version 1.0.0
 */

import { AppErrorCode } from '../../types/app-errors';
import { safeReadTextFile } from '../../utils/storage';
import { parseCatalogText } from './CatalogParser';
import { CATALOG_ERROR_MESSAGES } from './constants';
import type { CatalogStoreOptions, ICatalogStore } from './interfaces';
import {
    distinctPreservingCase,
    naturalCompare,
    normalizeKey,
    sameKey,
} from './normalize';
import type { CatalogWarning, ChannelRecord, ParsedCatalog } from './types';

// ============================================
// CatalogError Class
// ============================================

/**
 * Catalog-specific error with AppErrorCode.
 */
export class CatalogError extends Error {
    public readonly code: AppErrorCode;
    public readonly recoverable: boolean;

    constructor(code: AppErrorCode, message: string, recoverable = false) {
        super(message);
        this.name = 'CatalogError';
        this.code = code;
        this.recoverable = recoverable;
    }
}

// ============================================
// Catalog Store Class
// ============================================

/**
 * Immutable, indexed view over the channel catalog.
 * @implements {ICatalogStore}
 *
 * @example
 * ```typescript
 * const catalog = CatalogStore.load('./data/channels.csv');
 * catalog.channelsForIcao('kjfk'); // same as 'KJFK'
 * ```
 */
export class CatalogStore implements ICatalogStore {
    private readonly _records: readonly ChannelRecord[];
    private readonly _warnings: readonly CatalogWarning[];
    private readonly _byIcao: Map<string, ChannelRecord[]> = new Map();

    /**
     * Load and parse a catalog file.
     * @param filePath - Path to the delimited catalog
     * @throws CatalogError CATALOG_NOT_FOUND if the file cannot be read
     * @throws CatalogError CATALOG_EMPTY if no well-formed row remains
     */
    public static load(filePath: string, options: CatalogStoreOptions = {}): CatalogStore {
        const text = safeReadTextFile(filePath);
        if (text === null) {
            throw new CatalogError(
                AppErrorCode.CATALOG_NOT_FOUND,
                `${CATALOG_ERROR_MESSAGES.CATALOG_NOT_FOUND}: ${filePath}`
            );
        }
        return CatalogStore.fromText(text, options);
    }

    /**
     * Parse an in-memory catalog source.
     * @throws CatalogError CATALOG_EMPTY if no well-formed row remains
     */
    public static fromText(text: string, options: CatalogStoreOptions = {}): CatalogStore {
        return new CatalogStore(parseCatalogText(text), options);
    }

    private constructor(parsed: ParsedCatalog, options: CatalogStoreOptions) {
        const logger = options.logger ?? { warn: console.warn.bind(console) };
        for (const warning of parsed.warnings) {
            logger.warn(`[CatalogStore] ${warning.message}`);
        }

        if (parsed.records.length === 0) {
            throw new CatalogError(
                AppErrorCode.CATALOG_EMPTY,
                CATALOG_ERROR_MESSAGES.CATALOG_EMPTY
            );
        }

        this._records = Object.freeze([...parsed.records]);
        this._warnings = Object.freeze([...parsed.warnings]);

        for (const record of this._records) {
            const bucket = this._byIcao.get(record.icao);
            if (bucket) {
                bucket.push(record);
            } else {
                this._byIcao.set(record.icao, [record]);
            }
        }
    }

    public get size(): number {
        return this._records.length;
    }

    public getAll(): readonly ChannelRecord[] {
        return this._records;
    }

    public getWarnings(): readonly CatalogWarning[] {
        return this._warnings;
    }

    public distinctContinents(): string[] {
        return distinctPreservingCase(this._records.map((r) => r.continent))
            .sort(naturalCompare);
    }

    public countriesIn(continent: string): string[] {
        return distinctPreservingCase(
            this._records
                .filter((r) => sameKey(r.continent, continent))
                .map((r) => r.country)
        ).sort(naturalCompare);
    }

    public channelsIn(continent: string, country: string): ChannelRecord[] {
        const matches = this._records.filter(
            (r) => sameKey(r.continent, continent) && sameKey(r.country, country)
        );
        if (matches.length === 0) {
            throw new CatalogError(
                AppErrorCode.NO_CHANNELS_FOR_REGION,
                `${CATALOG_ERROR_MESSAGES.NO_CHANNELS_FOR_REGION}: ${country.trim()}, ${continent.trim()}`,
                true
            );
        }
        return matches;
    }

    public channelsForIcao(icao: string): ChannelRecord[] {
        return [...(this._byIcao.get(icao.trim().toUpperCase()) ?? [])];
    }

    public findChannel(icao: string, channelDescription: string): ChannelRecord | null {
        const wanted = normalizeKey(channelDescription);
        return this.channelsForIcao(icao)
            .find((r) => normalizeKey(r.channelDescription) === wanted) ?? null;
    }
}
