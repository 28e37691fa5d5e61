/**
 * @fileoverview Type-safe event emitter with error isolation.
 * One handler's error does not prevent other handlers from executing.
 * @module utils/EventEmitter
 * @version 1.0.0
 */

import type { IEventEmitter, IDisposable, ILogger } from './interfaces';

type ErrorSink = Pick<ILogger, 'error'>;

/**
 * Type-safe event emitter with error isolation.
 *
 * @template TEventMap - A record type mapping event names to payload types
 *
 * @example
 * ```typescript
 * interface EngineEvents {
 *   resolved: { icao: string };
 * }
 *
 * const emitter = new EventEmitter<EngineEvents>();
 * emitter.on('resolved', (payload) => console.log(payload.icao));
 * emitter.emit('resolved', { icao: 'KJFK' });
 * ```
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private _handlers: Map<keyof TEventMap, Set<(payload: unknown) => void>> =
        new Map();
    private readonly _errorSink: ErrorSink;

    /**
     * @param errorSink - Receives handler errors; defaults to console
     */
    constructor(errorSink?: ErrorSink) {
        this._errorSink = errorSink ?? { error: console.error.bind(console) };
    }

    public on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        let handlerSet = this._handlers.get(event);
        if (!handlerSet) {
            handlerSet = new Set();
            this._handlers.set(event, handlerSet);
        }
        handlerSet.add(handler as (payload: unknown) => void);

        return {
            dispose: (): void => this.off(event, handler),
        };
    }

    public off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void {
        this._handlers.get(event)?.delete(handler as (payload: unknown) => void);
    }

    /**
     * Emit an event to all registered handlers.
     * Errors in handlers are caught and reported to the error sink, NOT propagated.
     */
    public emit<K extends keyof TEventMap>(
        event: K,
        payload: TEventMap[K]
    ): void {
        const eventHandlers = this._handlers.get(event);
        if (!eventHandlers) {
            return;
        }

        // Copy so a handler that disposes itself does not disturb iteration.
        for (const handler of [...eventHandlers]) {
            try {
                handler(payload);
            } catch (error) {
                this._errorSink.error(
                    `[EventEmitter] Handler error for event '${String(event)}':`,
                    error
                );
            }
        }
    }

    public removeAllListeners(event?: keyof TEventMap): void {
        if (event !== undefined) {
            this._handlers.delete(event);
        } else {
            this._handlers.clear();
        }
    }

    public listenerCount(event: keyof TEventMap): number {
        return this._handlers.get(event)?.size ?? 0;
    }
}
