/**
 * @fileoverview Constants for the Prompt module.
 * @module modules/prompt/constants
 * @version 1.0.0
 */

export const BACK_OPTION_LABEL = 'Go back';

export const CHOICE_QUERY = 'Enter choice: ';

export const DEFAULT_FUZZY_COMMAND = 'fzf';

/** fzf: 1 = no match, 130 = interrupted (Esc / Ctrl-C) */
export const FUZZY_NO_SELECTION_EXIT_CODES: readonly number[] = [1, 130];

export const PROMPT_ERROR_MESSAGES = {
    NO_OPTIONS: 'Nothing to choose from',
    INPUT_CLOSED: 'Input closed before a choice was made',
    MATCHER_NOT_FOUND: 'Fuzzy matcher not found on PATH',
    MATCHER_FAILED: 'Fuzzy matcher exited with code',
} as const;
