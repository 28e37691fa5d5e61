/**
 * @fileoverview Public exports for the utils module.
 * @module utils
 * @version 1.0.0
 */

export { EventEmitter } from './EventEmitter';
export { createConsoleLogger, silentLogger } from './logger';
export { createMulberry32, pickRandom } from './prng';
export type { RandomSource } from './prng';
export type { IEventEmitter, IDisposable, ILogger } from './interfaces';
