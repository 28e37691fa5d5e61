/**
 * @fileoverview Type definitions for the Playback module.
 * @module modules/playback/types
 * @version 1.0.0
 */

/** Which stream a player process is playing */
export type PlayerRole = 'atc' | 'music';

/**
 * Playback event map.
 */
export interface PlaybackEventMap {
    started: { role: PlayerRole; command: string; args: string[] };
    exited: { role: PlayerRole; code: number | null };
    [key: string]: unknown;
}
