/**
 * @fileoverview Public exports for the Playback module.
 * @module modules/playback
 * @version 1.0.0
 */

export { PlaybackCoordinator, PlaybackError, buildPlayerArgs } from './PlaybackCoordinator';
export {
    DEFAULT_ATC_PLAYER_ARGS,
    DEFAULT_MUSIC_PLAYER_ARGS,
    DEFAULT_PLAYER_COMMAND,
    VOLUME_PLACEHOLDER,
} from './constants';
export type {
    IPlaybackCoordinator,
    PlaybackCoordinatorConfig,
    PlayerProcess,
    SpawnPlayer,
} from './interfaces';
export type { PlaybackEventMap, PlayerRole } from './types';
