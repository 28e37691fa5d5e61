/**
 * @fileoverview Library entry point.
 * @module index
 * @version 1.0.0
 */

export { AppOrchestrator } from './Orchestrator';
export type { IAppOrchestrator, ModuleStatus, OrchestratorDeps } from './Orchestrator';
export { loadConfig, defaultConfig, ConfigError } from './config/AppConfig';
export type { AppConfig, ConfigOverrides, LoadConfigOptions } from './config/AppConfig';
export { parseArgs, CliUsageError, USAGE } from './config/cliArgs';
export type { CliOptions } from './config/cliArgs';
export { EXIT_CODES, getErrorOutcome } from './core/error-recovery';
export type { ErrorOutcome, ExitCode } from './core/error-recovery';

export * from './modules/catalog';
export * from './modules/favorites';
export * from './modules/selection';
export * from './modules/weather';
export * from './modules/prompt';
export * from './modules/playback';
export * from './types';
export * from './utils';
