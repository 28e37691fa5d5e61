/**
 * @fileoverview Constants for the Selection module.
 * @module modules/selection/constants
 * @version 1.0.0
 */

/** Appended to labels of channels or airports that have a webcam */
export const WEBCAM_ANNOTATION = ' [webcam available]';

export const PROMPT_TITLES = {
    continent: 'Select a continent',
    country: 'Select a country',
    airport: 'Select an airport',
    channel: 'Select a channel',
    favorites: 'Select a favorite',
} as const;

/** Prompt handed to the fuzzy matcher */
export const FUZZY_PROMPT = 'Search channels> ';

export const SELECTION_ERROR_MESSAGES = {
    NO_MATCH_SELECTED: 'No channel was selected',
    AMBIGUOUS_FUZZY_MATCH: 'Selected line matches more than one channel',
} as const;
