/**
 * @fileoverview Interface definitions for the Selection module.
 * @module modules/selection/interfaces
 * @version 1.0.0
 */

import type { FallbackMode } from '../../types';
import type { IDisposable, ILogger } from '../../utils/interfaces';
import type { RandomSource } from '../../utils/prng';
import type { ICatalogStore } from '../catalog/interfaces';
import type { IFavoritesStore } from '../favorites/interfaces';
import type {
    ChoiceOutcome,
    ChoiceRequest,
    SelectionEngineEventMap,
    SelectionRequest,
    SelectionResult,
} from './types';

// ============================================
// Collaborators
// ============================================

/**
 * Interactive menu. Implementations re-prompt on invalid input and only
 * return once the user picked an option or asked to go back.
 */
export interface IPrompter {
    choose<T>(request: ChoiceRequest<T>): Promise<ChoiceOutcome<T>>;
}

/**
 * Exact-substring interactive filter over display lines.
 */
export interface IFuzzyMatcher {
    /**
     * @returns The chosen line, or null when the user chose nothing
     */
    pick(lines: string[], prompt: string): Promise<string | null>;
}

// ============================================
// Main Interface
// ============================================

/**
 * Resolves exactly one playable channel.
 */
export interface ISelectionEngine {
    /**
     * Run the strategy named by the request.
     */
    select(request: SelectionRequest): Promise<SelectionResult>;

    /**
     * Continent → country → airport → channel drill-down with back navigation.
     */
    selectGuided(): Promise<SelectionResult>;

    /**
     * One fuzzy query over every channel label.
     * @throws SelectionError NO_MATCH_SELECTED or AMBIGUOUS_FUZZY_MATCH
     */
    selectFuzzy(): Promise<SelectionResult>;

    /**
     * Pick from ranked favorites, falling back to the configured mode when none resolve.
     */
    selectFavorite(): Promise<SelectionResult>;

    /**
     * Resolve by airport code.
     * @param random - Pick uniformly instead of prompting; not tracked in favorites
     * @throws CatalogError ICAO_NOT_FOUND
     */
    selectByIcao(icao: string, random?: boolean): Promise<SelectionResult>;

    /**
     * Uniform pick from the whole catalog; not tracked in favorites.
     */
    selectRandom(): SelectionResult;

    on<K extends keyof SelectionEngineEventMap>(
        event: K,
        handler: (payload: SelectionEngineEventMap[K]) => void
    ): IDisposable;
}

// ============================================
// Configuration
// ============================================

/**
 * Configuration for SelectionEngine constructor.
 */
export interface SelectionEngineConfig {
    catalog: ICatalogStore;
    favorites: IFavoritesStore;
    prompter: IPrompter;
    fuzzyMatcher: IFuzzyMatcher;
    /** Where the favorites path goes when nothing resolves (default guided) */
    fallbackMode?: FallbackMode;
    /** Random source for the random paths (default Math.random) */
    random?: RandomSource;
    logger?: Pick<ILogger, 'debug' | 'warn' | 'error'>;
}
