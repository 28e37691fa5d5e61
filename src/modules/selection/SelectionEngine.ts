/**
 * @fileoverview Selection Engine implementation.
 * Resolves exactly one playable channel through the guided drill-down, a
 * fuzzy query, the favorites list, or a direct/random airport lookup.
 * @module modules/selection/SelectionEngine
 * @version 1.0.0
 */

import type { FallbackMode, SelectionStrategy } from '../../types';
import { AppErrorCode } from '../../types/app-errors';
import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable, ILogger } from '../../utils/interfaces';
import { pickRandom } from '../../utils/prng';
import type { RandomSource } from '../../utils/prng';
import { CatalogError } from '../catalog/CatalogStore';
import { CATALOG_ERROR_MESSAGES } from '../catalog/constants';
import type { ICatalogStore } from '../catalog/interfaces';
import type { ChannelRecord } from '../catalog/types';
import type { IFavoritesStore } from '../favorites/interfaces';
import { FUZZY_PROMPT, PROMPT_TITLES, SELECTION_ERROR_MESSAGES } from './constants';
import type {
    IFuzzyMatcher,
    IPrompter,
    ISelectionEngine,
    SelectionEngineConfig,
} from './interfaces';
import { channelOptions, formatChannelLabel, groupByAirport } from './labels';
import type {
    AirportGroup,
    ChoiceOutcome,
    GuidedState,
    SelectionEngineEventMap,
    SelectionRequest,
    SelectionResult,
} from './types';

// ============================================
// SelectionError Class
// ============================================

/**
 * Selection-specific error with AppErrorCode.
 */
export class SelectionError extends Error {
    public readonly code: AppErrorCode;
    public readonly recoverable: boolean;

    constructor(code: AppErrorCode, message: string, recoverable = true) {
        super(message);
        this.name = 'SelectionError';
        this.code = code;
        this.recoverable = recoverable;
    }
}

// ============================================
// Selection Engine Class
// ============================================

/**
 * Channel resolution over a loaded catalog.
 * @implements {ISelectionEngine}
 *
 * @example
 * ```typescript
 * const engine = new SelectionEngine({ catalog, favorites, prompter, fuzzyMatcher });
 * const result = await engine.select({ mode: 'icao', icao: 'KJFK' });
 * ```
 */
export class SelectionEngine implements ISelectionEngine {
    private readonly _catalog: ICatalogStore;
    private readonly _favorites: IFavoritesStore;
    private readonly _prompter: IPrompter;
    private readonly _fuzzyMatcher: IFuzzyMatcher;
    private readonly _fallbackMode: FallbackMode;
    private readonly _random: RandomSource;
    private readonly _logger: Pick<ILogger, 'debug' | 'warn' | 'error'>;
    private readonly _emitter: EventEmitter<SelectionEngineEventMap>;

    constructor(config: SelectionEngineConfig) {
        this._catalog = config.catalog;
        this._favorites = config.favorites;
        this._prompter = config.prompter;
        this._fuzzyMatcher = config.fuzzyMatcher;
        this._fallbackMode = config.fallbackMode ?? 'guided';
        this._random = config.random ?? Math.random;
        this._logger = config.logger ?? console;
        this._emitter = new EventEmitter<SelectionEngineEventMap>(this._logger);
    }

    // ============================================
    // Public API
    // ============================================

    public select(request: SelectionRequest): Promise<SelectionResult> {
        switch (request.mode) {
            case 'guided':
                return this.selectGuided();
            case 'fuzzy':
                return this.selectFuzzy();
            case 'favorites':
                return this.selectFavorite();
            case 'icao':
                return this.selectByIcao(request.icao, request.random ?? false);
            case 'random':
                return Promise.resolve(this.selectRandom());
            default: {
                const unreachable: never = request;
                return Promise.reject(new Error(`Unknown selection request: ${JSON.stringify(unreachable)}`));
            }
        }
    }

    public async selectGuided(): Promise<SelectionResult> {
        let state: GuidedState = { step: 'continent' };
        for (;;) {
            if (state.step === 'resolved') {
                return this._finish(state.record, 'guided', true);
            }
            const next: GuidedState = await this._advance(state);
            this._emitter.emit('stateChanged', { from: state.step, to: next.step });
            state = next;
        }
    }

    public async selectFuzzy(): Promise<SelectionResult> {
        const record = await this._pickFuzzy();
        return this._finish(record, 'fuzzy', true);
    }

    public async selectFavorite(): Promise<SelectionResult> {
        const entries = this._favorites.list();
        const resolved: ChannelRecord[] = [];
        for (const entry of entries) {
            const record = this._catalog.findChannel(entry.icao, entry.channelDescription);
            if (record) {
                resolved.push(record);
            } else {
                this._logger.debug(
                    `[SelectionEngine] Dropping stale favorite ${entry.icao} "${entry.channelDescription}"`
                );
            }
        }

        if (resolved.length === 0) {
            const staleCount = entries.length;
            this._emitter.emit('favoritesFallback', { mode: this._fallbackMode, staleCount });
            this._logger.warn(
                `[SelectionEngine] No usable favorites, falling back to ${this._fallbackMode} selection`
            );
            return this._fallbackMode === 'fuzzy' ? this.selectFuzzy() : this.selectGuided();
        }

        const outcome = await this._prompter.choose({
            step: 'favorites',
            title: PROMPT_TITLES.favorites,
            options: resolved.map((record) => ({ label: formatChannelLabel(record), value: record })),
            allowBack: false,
        });
        return this._finish(this._requireSelected(outcome), 'favorites', true);
    }

    public async selectByIcao(icao: string, random = false): Promise<SelectionResult> {
        const records = this._catalog.channelsForIcao(icao);
        if (records.length === 0) {
            throw new CatalogError(
                AppErrorCode.ICAO_NOT_FOUND,
                `${CATALOG_ERROR_MESSAGES.ICAO_NOT_FOUND}: ${icao.trim().toUpperCase()}`,
                true
            );
        }

        if (random) {
            return this._finish(this._pick(records), 'random', false);
        }

        const [only] = records;
        if (only !== undefined && records.length === 1) {
            return this._finish(only, 'icao', true);
        }

        const outcome = await this._prompter.choose({
            step: 'channel',
            title: PROMPT_TITLES.channel,
            options: channelOptions(records),
            allowBack: false,
        });
        return this._finish(this._requireSelected(outcome), 'icao', true);
    }

    public selectRandom(): SelectionResult {
        return this._finish(this._pick(this._catalog.getAll()), 'random', false);
    }

    public on<K extends keyof SelectionEngineEventMap>(
        event: K,
        handler: (payload: SelectionEngineEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    // ============================================
    // Guided State Machine
    // ============================================

    /**
     * Prompt once for the current step and compute the next state.
     */
    private async _advance(
        state: Exclude<GuidedState, { step: 'resolved' }>
    ): Promise<GuidedState> {
        switch (state.step) {
            case 'continent': {
                const outcome = await this._prompter.choose({
                    step: 'continent',
                    title: PROMPT_TITLES.continent,
                    options: this._catalog.distinctContinents().map((c) => ({ label: c, value: c })),
                    allowBack: false,
                });
                return outcome.kind === 'selected'
                    ? { step: 'country', continent: outcome.value }
                    : state;
            }
            case 'country': {
                const outcome = await this._prompter.choose({
                    step: 'country',
                    title: `${PROMPT_TITLES.country} in ${state.continent}`,
                    options: this._catalog.countriesIn(state.continent).map((c) => ({ label: c, value: c })),
                    allowBack: true,
                });
                return outcome.kind === 'selected'
                    ? { step: 'airport', continent: state.continent, country: outcome.value }
                    : { step: 'continent' };
            }
            case 'airport': {
                const groups = groupByAirport(this._catalog.channelsIn(state.continent, state.country));
                const outcome = await this._prompter.choose<AirportGroup>({
                    step: 'airport',
                    title: `${PROMPT_TITLES.airport} in ${state.country}`,
                    options: groups.map((group) => ({ label: group.label, value: group })),
                    allowBack: true,
                });
                if (outcome.kind === 'back') {
                    return { step: 'country', continent: state.continent };
                }
                const group = outcome.value;
                const [only] = group.records;
                if (only !== undefined && group.records.length === 1) {
                    return { step: 'resolved', record: only };
                }
                return { step: 'channel', continent: state.continent, country: state.country, group };
            }
            case 'channel': {
                const outcome = await this._prompter.choose({
                    step: 'channel',
                    title: `${PROMPT_TITLES.channel} at ${state.group.airportName}`,
                    options: channelOptions(state.group.records),
                    allowBack: true,
                });
                return outcome.kind === 'selected'
                    ? { step: 'resolved', record: outcome.value }
                    : { step: 'airport', continent: state.continent, country: state.country };
            }
            default: {
                const unreachable: never = state;
                throw new Error(`Unknown guided state: ${JSON.stringify(unreachable)}`);
            }
        }
    }

    // ============================================
    // Helpers
    // ============================================

    private async _pickFuzzy(): Promise<ChannelRecord> {
        const records = this._catalog.getAll();
        const labels = records.map(formatChannelLabel);
        const line = await this._fuzzyMatcher.pick(labels, FUZZY_PROMPT);
        if (line === null) {
            throw new SelectionError(
                AppErrorCode.NO_MATCH_SELECTED,
                SELECTION_ERROR_MESSAGES.NO_MATCH_SELECTED
            );
        }

        const chosen = line.trim();
        const matches = records.filter((_, index) => labels[index] === chosen);
        const [match] = matches;
        if (match === undefined) {
            throw new SelectionError(
                AppErrorCode.NO_MATCH_SELECTED,
                `${SELECTION_ERROR_MESSAGES.NO_MATCH_SELECTED}: ${chosen}`
            );
        }
        if (matches.length > 1) {
            throw new SelectionError(
                AppErrorCode.AMBIGUOUS_FUZZY_MATCH,
                `${SELECTION_ERROR_MESSAGES.AMBIGUOUS_FUZZY_MATCH}: ${chosen}`,
                false
            );
        }
        return match;
    }

    private _requireSelected<T>(outcome: ChoiceOutcome<T>): T {
        if (outcome.kind !== 'selected') {
            throw new SelectionError(
                AppErrorCode.NO_MATCH_SELECTED,
                SELECTION_ERROR_MESSAGES.NO_MATCH_SELECTED
            );
        }
        return outcome.value;
    }

    private _pick(records: readonly ChannelRecord[]): ChannelRecord {
        const record = pickRandom(records, this._random);
        if (!record) {
            throw new CatalogError(AppErrorCode.CATALOG_EMPTY, CATALOG_ERROR_MESSAGES.CATALOG_EMPTY);
        }
        return record;
    }

    /**
     * Build the result, track it in favorites unless it came from a random pick.
     * A failed favorites write is logged by the store and does not fail the selection.
     */
    private _finish(record: ChannelRecord, strategy: SelectionStrategy, track: boolean): SelectionResult {
        const result: SelectionResult = {
            streamUrl: record.streamUrl,
            sourceRecord: record,
            strategy,
        };
        if (record.webcamUrl !== undefined) {
            result.webcamUrl = record.webcamUrl;
        }

        if (track) {
            this._favorites.record(record.icao, record.channelDescription);
        }

        this._emitter.emit('resolved', { result });
        return result;
    }
}
