/**
 * @fileoverview Public exports for the Selection module.
 * @module modules/selection
 * @version 1.0.0
 */

export { SelectionEngine, SelectionError } from './SelectionEngine';
export { channelOptions, formatChannelLabel, groupByAirport } from './labels';
export { FUZZY_PROMPT, PROMPT_TITLES, WEBCAM_ANNOTATION } from './constants';
export type {
    IFuzzyMatcher,
    IPrompter,
    ISelectionEngine,
    SelectionEngineConfig,
} from './interfaces';
export type {
    AirportGroup,
    ChoiceOption,
    ChoiceOutcome,
    ChoiceRequest,
    GuidedState,
    GuidedStep,
    PromptStep,
    SelectionEngineEventMap,
    SelectionRequest,
    SelectionResult,
} from './types';
