/**
 * @fileoverview AbortSignal composition helpers.
 * @module utils/abort
 * @version 1.0.0
 */

/**
 * A controller that aborts when any parent signal aborts or its timer fires.
 */
export interface LinkedAbort {
    readonly signal: AbortSignal;
    /** True when the timer, not a parent, triggered the abort. */
    timedOut(): boolean;
    abort(): void;
    /** Detach from parents and clear the timer. Call in `finally`. */
    dispose(): void;
}

/**
 * Link parent signals (and an optional timeout) into one controller.
 * @param signals - Parent signals; undefined entries are skipped
 * @param timeoutMs - Abort after this many milliseconds, if given
 */
export function linkAbortSignals(
    signals: Array<AbortSignal | undefined>,
    timeoutMs?: number
): LinkedAbort {
    const controller = new AbortController();
    const detachers: Array<() => void> = [];
    let didTimeOut = false;
    let timeoutId: ReturnType<typeof setTimeout> | null = null;

    for (const parent of signals) {
        if (!parent) continue;
        if (parent.aborted) {
            controller.abort();
            break;
        }
        const onAbort = (): void => controller.abort();
        parent.addEventListener('abort', onAbort, { once: true });
        detachers.push(() => parent.removeEventListener('abort', onAbort));
    }

    if (timeoutMs !== undefined && !controller.signal.aborted) {
        timeoutId = setTimeout(() => {
            didTimeOut = true;
            controller.abort();
        }, timeoutMs);
    }

    return {
        signal: controller.signal,
        timedOut: (): boolean => didTimeOut,
        abort: (): void => controller.abort(),
        dispose: (): void => {
            if (timeoutId !== null) {
                clearTimeout(timeoutId);
                timeoutId = null;
            }
            for (const detach of detachers) detach();
            detachers.length = 0;
        },
    };
}

/**
 * Resolve with the promise, or reject with `onAbort()` as soon as the signal aborts.
 * The underlying promise keeps running; only this waiter detaches.
 */
export function raceWithSignal<T>(
    promise: Promise<T>,
    signal: AbortSignal | undefined,
    onAbort: () => Error
): Promise<T> {
    if (!signal) {
        return promise;
    }
    if (signal.aborted) {
        return Promise.reject(onAbort());
    }
    return new Promise<T>((resolve, reject) => {
        const abortListener = (): void => reject(onAbort());
        signal.addEventListener('abort', abortListener, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', abortListener);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', abortListener);
                reject(error);
            }
        );
    });
}
