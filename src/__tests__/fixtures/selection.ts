/**
 * @fileoverview In-memory fakes of the selection collaborators for unit tests.
 * @module __tests__/fixtures/selection
 */

import type { FavoriteEntry, FavoritesRecordResult, IFavoritesStore } from '../../modules/favorites';
import type {
    ChoiceOutcome,
    ChoiceRequest,
    IFuzzyMatcher,
    IPrompter,
} from '../../modules/selection';

/** Scripted answer meaning "go back". */
export const BACK = Symbol('back');

export type ScriptedAnswer = string | typeof BACK;

/**
 * Prompter that answers each menu with the next scripted option label.
 */
export class ScriptedPrompter implements IPrompter {
    public readonly requests: ChoiceRequest<unknown>[] = [];
    private readonly _answers: ScriptedAnswer[];

    constructor(answers: ScriptedAnswer[]) {
        this._answers = [...answers];
    }

    public async choose<T>(request: ChoiceRequest<T>): Promise<ChoiceOutcome<T>> {
        this.requests.push(request);
        const answer = this._answers.shift();
        if (answer === undefined) {
            throw new Error(`No scripted answer for "${request.title}"`);
        }
        if (answer === BACK) {
            return { kind: 'back' };
        }
        const option = request.options.find((o) => o.label === answer);
        if (!option) {
            throw new Error(`Option "${answer}" not offered for "${request.title}"`);
        }
        return { kind: 'selected', value: option.value };
    }

    /** Option labels of the n-th menu shown. */
    public labelsAt(index: number): string[] {
        return (this.requests[index]?.options ?? []).map((o) => o.label);
    }
}

/**
 * Fuzzy matcher that returns a fixed line.
 */
export function createFuzzyMatcher(line: string | null): IFuzzyMatcher & { pick: jest.Mock } {
    return { pick: jest.fn().mockResolvedValue(line) };
}

/**
 * Favorites store fake over a fixed entry list.
 */
export function createFavoritesFake(
    entries: FavoriteEntry[] = [],
    persisted = true
): IFavoritesStore & { record: jest.Mock; list: jest.Mock; clear: jest.Mock } {
    const result = (): FavoritesRecordResult => ({ entries, persisted });
    return {
        list: jest.fn(() => [...entries]),
        record: jest.fn(result),
        clear: jest.fn(result),
    };
}

export function favorite(icao: string, channelDescription: string, playCount = 1): FavoriteEntry {
    return { icao, channelDescription, playCount, lastUsedTimestamp: 1_000_000 };
}
