/**
 * @fileoverview Layered application configuration.
 * Built-in defaults, then the JSON config file, then the environment, then
 * command-line overrides; every layer is validated the same way.
 * @module config/AppConfig
 * @version 1.0.0
 */

import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CATALOG_PATH } from '../modules/catalog/constants';
import { DEFAULT_MAX_FAVORITES } from '../modules/favorites/constants';
import {
    DEFAULT_ATC_PLAYER_ARGS,
    DEFAULT_MUSIC_PLAYER_ARGS,
    DEFAULT_PLAYER_COMMAND,
} from '../modules/playback/constants';
import { DEFAULT_METAR_ENDPOINT, DEFAULT_REQUEST_TIMEOUT_MS } from '../modules/weather/constants';
import type { FallbackMode } from '../types';
import { AppErrorCode } from '../types/app-errors';
import { FILE_NAMES } from '../types';
import type { ILogger } from '../utils/interfaces';
import { safeReadJsonFile } from '../utils/storage';
import { ENV_KEYS } from './envKeys';
import type { EnvKey } from './envKeys';

// ============================================
// Types
// ============================================

export interface AppConfig {
    catalogPath: string;
    favoritesPath: string;
    configPath: string;
    maxFavorites: number;
    fallbackMode: FallbackMode;
    playerCommand: string;
    atcPlayerArgs: string[];
    musicPlayerArgs: string[];
    atcVolume: number;
    musicVolume: number;
    /** Empty when no music stream is configured */
    musicUrl: string;
    musicEnabled: boolean;
    weatherEnabled: boolean;
    metarEndpoint: string;
    requestTimeoutMs: number;
    debug: boolean;
}

export type ConfigOverrides = Partial<AppConfig>;

export interface LoadConfigOptions {
    /** Environment to read (default process.env) */
    env?: NodeJS.ProcessEnv;
    /** Command-line values; highest precedence */
    overrides?: ConfigOverrides;
    /** Used to expand a leading `~` (default os.homedir()) */
    homeDir?: string;
    logger?: Pick<ILogger, 'debug'>;
}

/**
 * Configuration-specific error with AppErrorCode. Never recoverable.
 */
export class ConfigError extends Error {
    public readonly code = AppErrorCode.CONFIG_INVALID;
    public readonly recoverable = false;

    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

// ============================================
// Field Parsers
// ============================================

/** Parses a value from any layer; undefined means invalid. */
type FieldParser<T> = (value: unknown) => T | undefined;

interface FieldSpec<T> {
    env?: EnvKey;
    parse: FieldParser<T>;
}

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

const parseString: FieldParser<string> = (value) =>
    typeof value === 'string' && value.trim() ? value.trim() : undefined;

const parseOptionalString: FieldParser<string> = (value) =>
    typeof value === 'string' ? value.trim() : undefined;

function parseInteger(min: number, max: number): FieldParser<number> {
    return (value) => {
        let parsed: number;
        if (typeof value === 'number') {
            parsed = value;
        } else if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
            parsed = parseInt(value, 10);
        } else {
            return undefined;
        }
        return Number.isInteger(parsed) && parsed >= min && parsed <= max ? parsed : undefined;
    };
}

const parseBoolean: FieldParser<boolean> = (value) => {
    if (typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'string') {
        const word = value.trim().toLowerCase();
        if (TRUE_WORDS.includes(word)) return true;
        if (FALSE_WORDS.includes(word)) return false;
    }
    return undefined;
};

/** Arrays of strings from the file; whitespace-separated words from the environment. */
const parseStringList: FieldParser<string[]> = (value) => {
    if (typeof value === 'string') {
        return value.split(/\s+/).filter((word) => word.length > 0);
    }
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        return [...value];
    }
    return undefined;
};

const parseFallbackMode: FieldParser<FallbackMode> = (value) => {
    if (value === 'guided' || value === 'fuzzy') {
        return value;
    }
    return undefined;
};

const FIELDS: { [K in keyof AppConfig]: FieldSpec<AppConfig[K]> } = {
    catalogPath: { env: ENV_KEYS.CATALOG, parse: parseString },
    favoritesPath: { env: ENV_KEYS.FAVORITES, parse: parseString },
    configPath: { env: ENV_KEYS.CONFIG, parse: parseString },
    maxFavorites: { env: ENV_KEYS.MAX_FAVORITES, parse: parseInteger(1, 1000) },
    fallbackMode: { env: ENV_KEYS.FALLBACK_MODE, parse: parseFallbackMode },
    playerCommand: { env: ENV_KEYS.PLAYER, parse: parseString },
    atcPlayerArgs: { parse: parseStringList },
    musicPlayerArgs: { parse: parseStringList },
    atcVolume: { env: ENV_KEYS.ATC_VOLUME, parse: parseInteger(0, 100) },
    musicVolume: { env: ENV_KEYS.MUSIC_VOLUME, parse: parseInteger(0, 100) },
    musicUrl: { env: ENV_KEYS.MUSIC_URL, parse: parseOptionalString },
    musicEnabled: { env: ENV_KEYS.MUSIC, parse: parseBoolean },
    weatherEnabled: { env: ENV_KEYS.WEATHER, parse: parseBoolean },
    metarEndpoint: { env: ENV_KEYS.METAR_ENDPOINT, parse: parseString },
    requestTimeoutMs: { parse: parseInteger(1, 600_000) },
    debug: { env: ENV_KEYS.DEBUG, parse: parseBoolean },
};

function isConfigKey(key: string): key is keyof AppConfig {
    return Object.prototype.hasOwnProperty.call(FIELDS, key);
}

// ============================================
// Layers
// ============================================

/**
 * Built-in defaults. The bundled catalog sits at the package root.
 */
export function defaultConfig(homeDir: string = os.homedir()): AppConfig {
    const appDir = path.join(homeDir, FILE_NAMES.APP_DIR);
    return {
        catalogPath: path.resolve(__dirname, '..', '..', DEFAULT_CATALOG_PATH),
        favoritesPath: path.join(appDir, FILE_NAMES.FAVORITES),
        configPath: path.join(appDir, FILE_NAMES.CONFIG),
        maxFavorites: DEFAULT_MAX_FAVORITES,
        fallbackMode: 'guided',
        playerCommand: DEFAULT_PLAYER_COMMAND,
        atcPlayerArgs: [...DEFAULT_ATC_PLAYER_ARGS],
        musicPlayerArgs: [...DEFAULT_MUSIC_PLAYER_ARGS],
        atcVolume: 100,
        musicVolume: 50,
        musicUrl: '',
        musicEnabled: true,
        weatherEnabled: true,
        metarEndpoint: DEFAULT_METAR_ENDPOINT,
        requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
        debug: false,
    };
}

function assignField<K extends keyof AppConfig>(
    target: AppConfig,
    key: K,
    value: unknown,
    source: string
): void {
    const parsed = FIELDS[key].parse(value);
    if (parsed === undefined) {
        throw new ConfigError(`Invalid value for ${key} in ${source}: ${JSON.stringify(value)}`);
    }
    target[key] = parsed;
}

function applyLayer(
    target: AppConfig,
    layer: Readonly<Record<string, unknown>>,
    source: string,
    logger: Pick<ILogger, 'debug'>
): void {
    for (const [key, value] of Object.entries(layer)) {
        if (value === undefined) {
            continue;
        }
        if (!isConfigKey(key)) {
            logger.debug(`[AppConfig] Ignoring unknown key "${key}" in ${source}`);
            continue;
        }
        assignField(target, key, value, source);
    }
}

function readEnvLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const layer: Record<string, unknown> = {};
    for (const [key, spec] of Object.entries(FIELDS)) {
        const raw = spec.env !== undefined ? env[spec.env] : undefined;
        if (raw !== undefined && raw !== '') {
            layer[key] = raw;
        }
    }
    return layer;
}

function readFileLayer(configPath: string): Record<string, unknown> {
    const read = safeReadJsonFile(configPath);
    if (read.status === 'missing') {
        return {};
    }
    if (read.status === 'corrupt') {
        throw new ConfigError(`Config file is not valid JSON: ${configPath}`);
    }
    const value = read.value;
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
        throw new ConfigError(`Config file must contain a JSON object: ${configPath}`);
    }
    return { ...value };
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(filePath: string, homeDir: string): string {
    if (filePath === '~') {
        return homeDir;
    }
    if (filePath.startsWith('~/') || filePath.startsWith(`~${path.sep}`)) {
        return path.join(homeDir, filePath.slice(2));
    }
    return filePath;
}

// ============================================
// Public API
// ============================================

/**
 * Resolve the effective configuration.
 * A missing config file is not an error.
 *
 * @throws ConfigError CONFIG_INVALID naming the offending key
 *
 * @example
 * ```typescript
 * const config = loadConfig({ overrides: { musicEnabled: false } });
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
    const env = options.env ?? process.env;
    const overrides: Readonly<Record<string, unknown>> = { ...options.overrides };
    const homeDir = options.homeDir ?? os.homedir();
    const logger = options.logger ?? { debug: (): void => undefined };

    const config = defaultConfig(homeDir);
    const envLayer = readEnvLayer(env);

    // The file location itself comes from the environment or the command line.
    if (envLayer['configPath'] !== undefined) {
        assignField(config, 'configPath', envLayer['configPath'], 'environment');
    }
    if (overrides['configPath'] !== undefined) {
        assignField(config, 'configPath', overrides['configPath'], 'command line');
    }
    config.configPath = expandHome(config.configPath, homeDir);

    applyLayer(config, readFileLayer(config.configPath), config.configPath, logger);
    applyLayer(config, envLayer, 'environment', logger);
    applyLayer(config, overrides, 'command line', logger);

    config.catalogPath = expandHome(config.catalogPath, homeDir);
    config.favoritesPath = expandHome(config.favoritesPath, homeDir);
    config.configPath = expandHome(config.configPath, homeDir);
    return config;
}
