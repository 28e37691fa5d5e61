/**
 * @fileoverview Interface definitions for shared utilities.
 * @module utils/interfaces
 * @version 1.0.0
 */

/**
 * Disposable interface for cleanup.
 * Used to unsubscribe from event handlers.
 */
export interface IDisposable {
    /**
     * Dispose of the resource, cleaning up any subscriptions or references.
     */
    dispose(): void;
}

/**
 * Minimal logger injected into modules.
 * Messages are conventionally prefixed with `[ModuleName]`.
 */
export interface ILogger {
    debug: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
}

/**
 * Type-safe event emitter interface with error isolation.
 * One handler's error does not prevent other handlers from executing.
 *
 * @template TEventMap - A record type mapping event names to payload types
 */
export interface IEventEmitter<TEventMap extends Record<string, unknown>> {
    /**
     * Register an event handler.
     * @returns A disposable to remove the handler
     */
    on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable;

    /**
     * Unregister an event handler.
     */
    off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void;

    /**
     * Emit an event to all registered handlers.
     * Errors in handlers are logged, NOT propagated.
     */
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void;

    /**
     * Remove all handlers for a specific event or all events.
     */
    removeAllListeners(event?: keyof TEventMap): void;

    /**
     * Get the count of handlers for an event.
     */
    listenerCount(event: keyof TEventMap): number;
}
