/**
 * @fileoverview Type definitions for the Selection module.
 * @module modules/selection/types
 * @version 1.0.0
 */

import type { FallbackMode, SelectionStrategy } from '../../types';
import type { ChannelRecord } from '../catalog/types';

// ============================================
// Result
// ============================================

/**
 * Output contract of every selection strategy. Never partially filled.
 */
export interface SelectionResult {
    streamUrl: string;
    webcamUrl?: string;
    sourceRecord: ChannelRecord;
    strategy: SelectionStrategy;
}

/**
 * What the caller asks the engine to do.
 */
export type SelectionRequest =
    | { mode: 'guided' }
    | { mode: 'fuzzy' }
    | { mode: 'favorites' }
    | { mode: 'icao'; icao: string; random?: boolean }
    | { mode: 'random' };

// ============================================
// Guided State Machine
// ============================================

/**
 * A set of catalog records sharing one (city, airportName) pair.
 */
export interface AirportGroup {
    city: string;
    airportName: string;
    /** "<city> - <airportName>", annotated when any member has a webcam */
    label: string;
    hasWebcam: boolean;
    records: ChannelRecord[];
}

/**
 * Drill-down states. Each carries only the filters of the current branch.
 */
export type GuidedState =
    | { step: 'continent' }
    | { step: 'country'; continent: string }
    | { step: 'airport'; continent: string; country: string }
    | { step: 'channel'; continent: string; country: string; group: AirportGroup }
    | { step: 'resolved'; record: ChannelRecord };

export type GuidedStep = GuidedState['step'];

// ============================================
// Prompting
// ============================================

/** Prompt kinds, for prompters that render them differently */
export type PromptStep = Exclude<GuidedStep, 'resolved'> | 'favorites';

export interface ChoiceOption<T> {
    label: string;
    value: T;
}

/**
 * One menu shown to the user.
 */
export interface ChoiceRequest<T> {
    step: PromptStep;
    title: string;
    options: ChoiceOption<T>[];
    /** Offer the "go back" entry */
    allowBack: boolean;
}

/**
 * Typed prompt outcome; `back` is only produced when `allowBack` was set.
 */
export type ChoiceOutcome<T> =
    | { kind: 'selected'; value: T }
    | { kind: 'back' };

// ============================================
// Events
// ============================================

/**
 * Selection engine event map.
 */
export interface SelectionEngineEventMap {
    stateChanged: { from: GuidedStep; to: GuidedStep };
    resolved: { result: SelectionResult };
    favoritesFallback: { mode: FallbackMode; staleCount: number };
    [key: string]: unknown;
}
