/**
 * @fileoverview Constants for the Playback module.
 * @module modules/playback/constants
 * @version 1.0.0
 */

/** Replaced in player arguments by the configured volume */
export const VOLUME_PLACEHOLDER = '{volume}';

export const DEFAULT_PLAYER_COMMAND = 'mpv';

export const DEFAULT_ATC_PLAYER_ARGS: readonly string[] = ['--no-video', `--volume=${VOLUME_PLACEHOLDER}`];

export const DEFAULT_MUSIC_PLAYER_ARGS: readonly string[] = [
    '--no-video',
    '--really-quiet',
    '--loop-playlist=inf',
    `--volume=${VOLUME_PLACEHOLDER}`,
];

export const PLAYBACK_ERROR_MESSAGES = {
    LAUNCH_FAILED: 'Could not start player',
} as const;
