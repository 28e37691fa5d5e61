/**
 * @fileoverview Playback Coordinator implementation.
 * Runs the external media player for the ATC stream and, alongside it, a
 * looping music stream.
 * @module modules/playback/PlaybackCoordinator
 * @version 1.0.0
 */

import { spawn } from 'node:child_process';
import type { StdioOptions } from 'node:child_process';
import { AppErrorCode } from '../../types/app-errors';
import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable, ILogger } from '../../utils/interfaces';
import type { SelectionResult } from '../selection/types';
import {
    DEFAULT_ATC_PLAYER_ARGS,
    DEFAULT_MUSIC_PLAYER_ARGS,
    PLAYBACK_ERROR_MESSAGES,
    VOLUME_PLACEHOLDER,
} from './constants';
import type {
    IPlaybackCoordinator,
    PlaybackCoordinatorConfig,
    PlayerProcess,
    SpawnPlayer,
} from './interfaces';
import type { PlaybackEventMap, PlayerRole } from './types';

// ============================================
// PlaybackError Class
// ============================================

/**
 * Playback-specific error with AppErrorCode.
 */
export class PlaybackError extends Error {
    public readonly code: AppErrorCode;
    public readonly recoverable: boolean;

    constructor(code: AppErrorCode, message: string, recoverable = false) {
        super(message);
        this.name = 'PlaybackError';
        this.code = code;
        this.recoverable = recoverable;
    }
}

// ============================================
// Helpers
// ============================================

/**
 * Substitute the volume placeholder in every argument.
 */
export function buildPlayerArgs(args: readonly string[], volume: number, url: string): string[] {
    return [...args.map((arg) => arg.replaceAll(VOLUME_PLACEHOLDER, String(volume))), url];
}

interface RunningPlayer {
    role: PlayerRole;
    process: PlayerProcess;
    exited: Promise<number | null>;
}

// ============================================
// Playback Coordinator Class
// ============================================

/**
 * @implements {IPlaybackCoordinator}
 */
export class PlaybackCoordinator implements IPlaybackCoordinator {
    private readonly _config: PlaybackCoordinatorConfig;
    private readonly _spawn: SpawnPlayer;
    private readonly _logger: Pick<ILogger, 'debug' | 'warn' | 'error'>;
    private readonly _emitter: EventEmitter<PlaybackEventMap>;
    private _running: RunningPlayer[] = [];

    constructor(config: PlaybackCoordinatorConfig) {
        this._config = config;
        this._spawn = config.spawn ?? spawn;
        this._logger = config.logger ?? console;
        this._emitter = new EventEmitter<PlaybackEventMap>(this._logger);
    }

    public async start(result: SelectionResult): Promise<void> {
        this.stopAll();
        const config = this._config;

        const atc = await this._launch(
            'atc',
            buildPlayerArgs(config.atcArgs ?? DEFAULT_ATC_PLAYER_ARGS, config.atcVolume, result.streamUrl),
            'inherit'
        );
        this._running.push(atc);

        if (!config.musicEnabled || !config.musicUrl) {
            return;
        }
        try {
            const music = await this._launch(
                'music',
                buildPlayerArgs(config.musicArgs ?? DEFAULT_MUSIC_PLAYER_ARGS, config.musicVolume, config.musicUrl),
                'ignore'
            );
            this._running.push(music);
        } catch (error) {
            // ATC playback continues without music.
            this._logger.warn(`[PlaybackCoordinator] Music stream not started: ${String(error)}`);
        }
    }

    public async waitForAtcExit(): Promise<number | null> {
        const atc = this._running.find((player) => player.role === 'atc');
        return atc ? atc.exited : null;
    }

    public stopAll(): number {
        const running = this._running;
        this._running = [];
        for (const player of running) {
            this._logger.debug(`[PlaybackCoordinator] Stopping ${player.role} player`);
            player.process.kill('SIGTERM');
        }
        return running.length;
    }

    public dispose(): void {
        this.stopAll();
        this._emitter.removeAllListeners();
    }

    public on<K extends keyof PlaybackEventMap>(
        event: K,
        handler: (payload: PlaybackEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    /**
     * Spawn one player and settle once the OS reports it started or failed.
     */
    private _launch(role: PlayerRole, args: string[], stdio: StdioOptions): Promise<RunningPlayer> {
        const command = this._config.playerCommand;
        this._logger.debug(`[PlaybackCoordinator] ${role}: ${command} ${args.join(' ')}`);

        return new Promise((resolve, reject) => {
            let started = false;
            const fail = (cause: unknown): void => {
                const reason = cause instanceof Error ? cause.message : String(cause);
                const error = new PlaybackError(
                    AppErrorCode.PLAYER_LAUNCH_FAILED,
                    `${PLAYBACK_ERROR_MESSAGES.LAUNCH_FAILED} (${command}): ${reason}`
                );
                this._logger.error(`[PlaybackCoordinator] ${error.message}`);
                reject(error);
            };

            let child: PlayerProcess;
            try {
                child = this._spawn(command, args, { stdio });
            } catch (error) {
                fail(error);
                return;
            }

            const exited = new Promise<number | null>((resolveExit) => {
                child.on('exit', (code) => {
                    this._running = this._running.filter((player) => player.process !== child);
                    this._emitter.emit('exited', { role, code });
                    resolveExit(code);
                });
            });

            child.on('spawn', () => {
                started = true;
                this._emitter.emit('started', { role, command, args });
                resolve({ role, process: child, exited });
            });

            child.on('error', (error) => {
                if (started) {
                    this._logger.error(`[PlaybackCoordinator] ${role} player error: ${error.message}`);
                } else {
                    fail(error);
                }
            });
        });
    }
}
