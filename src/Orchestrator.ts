/**
 * @fileoverview Application Orchestrator - runs one listening session.
 * @module Orchestrator
 * @version 1.0.0
 *
 * Responsibilities:
 * - Module initialization in dependency order
 * - Selection, weather report and playback for one channel
 * - Mapping errors to exit codes
 */

import type { AppConfig } from './config/AppConfig';
import { EXIT_CODES, getErrorOutcome, type ExitCode } from './core/error-recovery';
import { CatalogStore, type ICatalogStore } from './modules/catalog';
import { FavoritesStore } from './modules/favorites';
import { PlaybackCoordinator, type IPlaybackCoordinator } from './modules/playback';
import { FzfMatcher, TerminalPrompter, type TerminalPrompterConfig } from './modules/prompt';
import {
    SelectionEngine,
    formatChannelLabel,
    type IFuzzyMatcher,
    type IPrompter,
    type ISelectionEngine,
    type SelectionRequest,
    type SelectionResult,
} from './modules/selection';
import { WeatherClient, formatMetarReport, type IWeatherClient } from './modules/weather';
import { AppErrorCode, getErrorCode, type AppError } from './types';
import type { IDisposable, ILogger } from './utils/interfaces';
import { createConsoleLogger } from './utils/logger';
import type { RandomSource } from './utils/prng';

// ============================================
// Types
// ============================================

/**
 * Module health status
 */
export interface ModuleStatus {
    id: string;
    name: string;
    status: 'pending' | 'ready' | 'error' | 'disabled';
    loadTimeMs?: number;
    error?: AppError;
}

/**
 * Collaborators the orchestrator would otherwise build from the config.
 */
export interface OrchestratorDeps {
    prompter?: IPrompter;
    /** Reader and output for the terminal prompter built when no prompter is given */
    terminal?: Omit<TerminalPrompterConfig, 'logger'>;
    fuzzyMatcher?: IFuzzyMatcher;
    weather?: IWeatherClient;
    playback?: IPlaybackCoordinator;
    random?: RandomSource;
    /** Session output (default process.stdout) */
    write?: (text: string) => void;
    /** Error output (default process.stderr) */
    writeError?: (text: string) => void;
    logger?: ILogger;
}

/**
 * Application Orchestrator Interface
 */
export interface IAppOrchestrator {
    /**
     * Load the catalog and build the modules. Idempotent.
     * @throws CatalogError CATALOG_NOT_FOUND or CATALOG_EMPTY
     */
    initialize(): void;

    /**
     * Resolve a channel, show its weather and play it until the ATC player exits.
     * Never rejects.
     * @returns Process exit code
     */
    run(request: SelectionRequest): Promise<ExitCode>;

    /**
     * Stop players and release the terminal.
     */
    shutdown(): void;

    /**
     * Abandon the session (Ctrl-C). A pending run ends without starting playback.
     */
    interrupt(): void;

    /**
     * Report an error to the user and pick the exit code.
     */
    handleError(error: unknown): ExitCode;

    getModuleStatus(): Map<string, ModuleStatus>;
    isReady(): boolean;
}

/**
 * Session abandoned by a signal.
 */
export class SessionInterruptedError extends Error {
    public readonly code = AppErrorCode.SESSION_INTERRUPTED;
    public readonly recoverable = false;

    constructor() {
        super('Interrupted');
        this.name = 'SessionInterruptedError';
    }
}

const MODULES: ReadonlyArray<Pick<ModuleStatus, 'id' | 'name'>> = [
    { id: 'catalog', name: 'Channel Catalog' },
    { id: 'favorites', name: 'Favorites Store' },
    { id: 'selection', name: 'Selection Engine' },
    { id: 'weather', name: 'Weather Client' },
    { id: 'playback', name: 'Playback Coordinator' },
];

// ============================================
// Implementation
// ============================================

/**
 * AppOrchestrator - wires configuration, stores, engine, weather and playback.
 */
export class AppOrchestrator implements IAppOrchestrator {
    private readonly _config: AppConfig;
    private readonly _deps: OrchestratorDeps;
    private readonly _logger: ILogger;
    private readonly _write: (text: string) => void;
    private readonly _writeError: (text: string) => void;

    private _catalog: ICatalogStore | null = null;
    private _engine: ISelectionEngine | null = null;
    private _weather: IWeatherClient | null = null;
    private _playback: IPlaybackCoordinator | null = null;
    private _terminal: TerminalPrompter | null = null;
    private _interrupted: boolean = false;
    private _disposables: IDisposable[] = [];
    private _moduleStatus: Map<string, ModuleStatus> = new Map();
    private _ready: boolean = false;

    constructor(config: AppConfig, deps: OrchestratorDeps = {}) {
        this._config = config;
        this._deps = deps;
        this._logger = deps.logger ?? createConsoleLogger(config.debug);
        this._write = deps.write ?? ((text: string): void => {
            process.stdout.write(text);
        });
        this._writeError = deps.writeError ?? ((text: string): void => {
            process.stderr.write(text);
        });
        for (const entry of MODULES) {
            this._moduleStatus.set(entry.id, { ...entry, status: 'pending' });
        }
    }

    public initialize(): void {
        if (this._ready) {
            return;
        }
        const config = this._config;
        const logger = this._logger;

        const catalog = this._initModule('catalog', () =>
            CatalogStore.load(config.catalogPath, { logger })
        );
        logger.debug(`[Orchestrator] Loaded ${catalog.size} channels from ${config.catalogPath}`);

        const favorites = this._initModule('favorites', () => new FavoritesStore({
            filePath: config.favoritesPath,
            maxEntries: config.maxFavorites,
            logger,
        }));

        const engine = this._initModule('selection', () => {
            const prompter = this._deps.prompter ?? this._ownTerminal(
                new TerminalPrompter({ ...this._deps.terminal, logger })
            );
            return new SelectionEngine({
                catalog,
                favorites,
                prompter,
                fuzzyMatcher: this._deps.fuzzyMatcher ?? new FzfMatcher({ logger }),
                fallbackMode: config.fallbackMode,
                random: this._deps.random,
                logger,
            });
        });
        engine.on('favoritesFallback', ({ mode, staleCount }) => {
            const reason = staleCount > 0
                ? `None of your ${staleCount} saved favorites are in the catalog`
                : 'No saved favorites found';
            this._write(`${reason}, starting ${mode} selection.\n`);
        });

        if (config.weatherEnabled) {
            this._weather = this._initModule('weather', () => this._deps.weather ?? new WeatherClient({
                endpoint: config.metarEndpoint,
                timeoutMs: config.requestTimeoutMs,
                cache: new Map<string, string>(),
                logger,
            }));
        } else {
            this._updateModuleStatus('weather', 'disabled');
        }

        this._playback = this._initModule('playback', () => this._deps.playback ?? this._own(
            new PlaybackCoordinator({
                playerCommand: config.playerCommand,
                atcArgs: config.atcPlayerArgs,
                musicArgs: config.musicPlayerArgs,
                atcVolume: config.atcVolume,
                musicVolume: config.musicVolume,
                musicEnabled: config.musicEnabled,
                musicUrl: config.musicUrl,
                logger,
            })
        ));

        this._catalog = catalog;
        this._engine = engine;
        this._ready = true;
    }

    public async run(request: SelectionRequest): Promise<ExitCode> {
        try {
            this.initialize();
            const engine = this._engine;
            const playback = this._playback;
            if (!engine || !playback) {
                throw new Error('Orchestrator not initialized');
            }

            const result = await engine.select(request);
            // The player inherits the terminal; readline must stop reading it first.
            this._releaseTerminal();
            this._throwIfInterrupted();
            this._printSelection(result);
            await this._printWeather(result.sourceRecord.icao);

            this._throwIfInterrupted();
            await playback.start(result);
            this._write('Playing. Quit the player to end the session.\n');
            const code = await playback.waitForAtcExit();
            this._logger.debug(`[Orchestrator] ATC player exited with code ${String(code)}`);
            return EXIT_CODES.OK;
        } catch (error) {
            return this.handleError(this._interrupted ? new SessionInterruptedError() : error);
        } finally {
            this.shutdown();
        }
    }

    public shutdown(): void {
        this._playback?.stopAll();
        for (const disposable of this._disposables) {
            disposable.dispose();
        }
        this._disposables = [];
    }

    public interrupt(): void {
        this._interrupted = true;
        this.shutdown();
    }

    public handleError(error: unknown): ExitCode {
        const code = getErrorCode(error);
        const outcome = getErrorOutcome(code);
        const message = error instanceof Error ? error.message : String(error);

        if (outcome.quiet) {
            this._write(`${message}.\n`);
            return outcome.exitCode;
        }

        if (code === null || code === AppErrorCode.UNKNOWN) {
            this._logger.error('[Orchestrator] Unexpected error:', error);
        }
        this._writeError(`Error: ${message}\n`);
        if (outcome.hint) {
            this._writeError(`Hint: ${outcome.hint}\n`);
        }
        return outcome.exitCode;
    }

    public getModuleStatus(): Map<string, ModuleStatus> {
        return new Map(this._moduleStatus);
    }

    public isReady(): boolean {
        return this._ready;
    }

    /** The loaded catalog, once initialized. */
    public getCatalog(): ICatalogStore | null {
        return this._catalog;
    }

    // ============================================
    // Output
    // ============================================

    private _printSelection(result: SelectionResult): void {
        const record = result.sourceRecord;
        const lines = [
            '',
            `Selected: ${formatChannelLabel(record)}`,
            `Stream:   ${result.streamUrl}`,
        ];
        if (result.webcamUrl) {
            lines.push(`Webcam:   ${result.webcamUrl}`);
        }
        if (record.nearbyIcaos.length > 0) {
            lines.push(`Nearby:   ${record.nearbyIcaos.join(', ')}`);
        }
        this._write(`${lines.join('\n')}\n`);
    }

    private async _printWeather(icao: string): Promise<void> {
        if (!this._weather) {
            return;
        }
        const report = await this._weather.getReport(icao);
        this._write(`\nMETAR ${report.icao}: ${report.raw}\n${formatMetarReport(report.decoded)}\n\n`);
    }

    // ============================================
    // Module Lifecycle
    // ============================================

    private _initModule<T>(id: string, create: () => T): T {
        const startTime = Date.now();
        try {
            const instance = create();
            this._updateModuleStatus(id, 'ready', undefined, Date.now() - startTime);
            return instance;
        } catch (error) {
            this._updateModuleStatus(id, 'error', {
                code: getErrorCode(error) ?? AppErrorCode.UNKNOWN,
                message: error instanceof Error ? error.message : String(error),
                recoverable: false,
            });
            throw error;
        }
    }

    private _own<T extends IDisposable>(disposable: T): T {
        this._disposables.push(disposable);
        return disposable;
    }

    private _ownTerminal(prompter: TerminalPrompter): TerminalPrompter {
        this._terminal = this._own(prompter);
        return prompter;
    }

    private _releaseTerminal(): void {
        this._terminal?.dispose();
        this._terminal = null;
    }

    private _throwIfInterrupted(): void {
        if (this._interrupted) {
            throw new SessionInterruptedError();
        }
    }

    private _updateModuleStatus(
        id: string,
        status: ModuleStatus['status'],
        error?: AppError,
        loadTimeMs?: number
    ): void {
        const current = this._moduleStatus.get(id);
        if (!current) {
            return;
        }
        this._moduleStatus.set(id, {
            ...current,
            status,
            ...(error ? { error } : {}),
            ...(loadTimeMs !== undefined ? { loadTimeMs } : {}),
        });
    }
}
