/**
 * @fileoverview Interface definitions for the Playback module.
 * @module modules/playback/interfaces
 * @version 1.0.0
 */

import type { SpawnOptions } from 'node:child_process';
import type { IDisposable, ILogger } from '../../utils/interfaces';
import type { SelectionResult } from '../selection/types';
import type { PlaybackEventMap } from './types';

/**
 * The part of a spawned ChildProcess the coordinator uses.
 */
export interface PlayerProcess {
    kill(signal?: NodeJS.Signals): boolean;
    on(event: 'spawn', listener: () => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
    on(event: 'exit', listener: (code: number | null) => void): unknown;
}

export type SpawnPlayer = (
    command: string,
    args: readonly string[],
    options: SpawnOptions
) => PlayerProcess;

/**
 * Starts and stops the external players for a resolved channel.
 */
export interface IPlaybackCoordinator extends IDisposable {
    /**
     * Start the ATC stream and, when enabled, the music stream.
     * Stops anything started earlier first.
     * @throws PlaybackError PLAYER_LAUNCH_FAILED if the ATC player cannot start
     */
    start(result: SelectionResult): Promise<void>;

    /**
     * Resolves with the ATC player's exit code, or null when nothing is playing.
     */
    waitForAtcExit(): Promise<number | null>;

    /**
     * Kill every started player.
     * @returns Number of processes signalled
     */
    stopAll(): number;

    on<K extends keyof PlaybackEventMap>(
        event: K,
        handler: (payload: PlaybackEventMap[K]) => void
    ): IDisposable;
}

export interface PlaybackCoordinatorConfig {
    playerCommand: string;
    atcArgs?: readonly string[];
    musicArgs?: readonly string[];
    atcVolume: number;
    musicVolume: number;
    /** Music plays only when enabled and a URL is set */
    musicEnabled: boolean;
    musicUrl?: string;
    spawn?: SpawnPlayer;
    logger?: Pick<ILogger, 'debug' | 'warn' | 'error'>;
}
