/**
 * @fileoverview Type-safe event emitter with error isolation.
 * One handler's error does not prevent other handlers from executing.
 * @module utils/EventEmitter
 * @version 1.0.0
 */

import { IEventEmitter, IDisposable, Logger } from './interfaces';
import { DEFAULT_LOGGER } from './logger';

/**
 * Type-safe event emitter with error isolation.
 *
 * @template TEventMap - A record type mapping event names to payload types
 *
 * @example
 * ```typescript
 * interface SessionEvents {
 *   tokenChange: { userId: string };
 *   sessionEnd: { reason: string };
 * }
 *
 * const emitter = new EventEmitter<SessionEvents>();
 * emitter.on('sessionEnd', (payload) => console.log(payload.reason));
 * emitter.emit('sessionEnd', { reason: 'logout' });
 * ```
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private _handlers: Map<keyof TEventMap, Set<(payload: unknown) => void>> =
        new Map();
    private readonly _logger: Logger;

    constructor(logger: Logger = DEFAULT_LOGGER) {
        this._logger = logger;
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
        const handlerSet = this._handlers.get(event);
        if (handlerSet) {
            handlerSet.delete(handler as (payload: unknown) => void);
        }
    }

    /**
     * Emit an event to all registered handlers.
     * Errors in handlers are caught and logged, NOT propagated, so a faulty
     * subscriber cannot break a refresh or logout in progress.
     */
    public emit<K extends keyof TEventMap>(
        event: K,
        payload: TEventMap[K]
    ): void {
        const eventHandlers = this._handlers.get(event);
        if (!eventHandlers) {
            return;
        }

        // Copy so handlers may unsubscribe while we iterate.
        for (const handler of Array.from(eventHandlers)) {
            try {
                handler(payload);
            } catch (error) {
                this._logger.error(`[EventEmitter] Handler error for event '${String(event)}':`, error);
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
        const handlerSet = this._handlers.get(event);
        return handlerSet ? handlerSet.size : 0;
    }
}
