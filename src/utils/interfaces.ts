/**
 * @fileoverview Shared utility interfaces: disposables, event emitter, logger.
 * @module utils/interfaces
 * @version 1.0.0
 */

/**
 * Disposable interface for cleanup.
 * Used to unsubscribe from event handlers.
 */
export interface IDisposable {
    dispose(): void;
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

    off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void;

    /**
     * Emit an event to all registered handlers.
     * Errors in handlers are logged, not propagated.
     */
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void;

    /**
     * Remove all handlers for one event, or for every event when omitted.
     */
    removeAllListeners(event?: keyof TEventMap): void;

    listenerCount(event: keyof TEventMap): number;
}

/**
 * Logger accepted by every component.
 * Defaults to the console; messages are prefixed with a bracketed component tag.
 */
export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}
