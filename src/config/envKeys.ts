/**
 * @fileoverview Environment variable names read by the configuration loader.
 * @module config/envKeys
 * @version 1.0.0
 */

/**
 * Canonical environment keys. A `.env` file in the working directory is
 * loaded into the environment at startup.
 */
export const ENV_KEYS = {
    // Files
    CATALOG: 'ATC_TUNER_CATALOG',
    FAVORITES: 'ATC_TUNER_FAVORITES',
    CONFIG: 'ATC_TUNER_CONFIG',

    // Selection
    MAX_FAVORITES: 'ATC_TUNER_MAX_FAVORITES',
    FALLBACK_MODE: 'ATC_TUNER_FALLBACK_MODE',

    // Playback
    PLAYER: 'ATC_TUNER_PLAYER',
    ATC_VOLUME: 'ATC_TUNER_ATC_VOLUME',
    MUSIC_VOLUME: 'ATC_TUNER_MUSIC_VOLUME',
    MUSIC_URL: 'ATC_TUNER_MUSIC_URL',
    MUSIC: 'ATC_TUNER_MUSIC',

    // Weather
    WEATHER: 'ATC_TUNER_WEATHER',
    METAR_ENDPOINT: 'ATC_TUNER_METAR_ENDPOINT',

    // Developer / Debug
    DEBUG: 'ATC_TUNER_DEBUG',
} as const;

export type EnvKey = typeof ENV_KEYS[keyof typeof ENV_KEYS];
