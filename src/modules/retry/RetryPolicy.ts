/**
 * @fileoverview Retry policy: failure classification and exponential backoff with jitter.
 * @module modules/retry/RetryPolicy
 * @version 1.0.0
 */

import { AppErrorCode, createCancelledError } from '../../types/app-errors';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import { RETRY_CONSTANTS, RETRYABLE_STATUSES, BUSY_STATUSES } from './constants';
import { normalizeTransportError } from './errorMapping';
import type { IRetryPolicy, RetryPolicyConfig } from './interfaces';
import { ErrorClass, RetryOptions } from './types';

/**
 * Classifies failures and schedules retries.
 * Delays are timer continuations; nothing here blocks the event loop.
 * @implements {IRetryPolicy}
 */
export class RetryPolicy implements IRetryPolicy {
    private readonly _maxAttempts: number;
    private readonly _capMs: number;
    private readonly _defaultBaseMs: number;
    private readonly _busyBaseMs: number;
    private readonly _rateLimitedBaseMs: number;
    private readonly _jitterRatio: number;
    private readonly _random: () => number;
    private readonly _logger: Logger;

    constructor(config: RetryPolicyConfig = {}) {
        this._maxAttempts = Math.max(1, Math.floor(config.maxAttempts ?? RETRY_CONSTANTS.MAX_ATTEMPTS));
        this._capMs = config.capMs ?? RETRY_CONSTANTS.CAP_MS;
        this._defaultBaseMs = config.defaultBaseMs ?? RETRY_CONSTANTS.DEFAULT_BASE_MS;
        this._busyBaseMs = config.busyBaseMs ?? RETRY_CONSTANTS.BUSY_BASE_MS;
        this._rateLimitedBaseMs = config.rateLimitedBaseMs ?? RETRY_CONSTANTS.RATE_LIMITED_BASE_MS;
        this._jitterRatio = config.jitterRatio ?? RETRY_CONSTANTS.JITTER_RATIO;
        this._random = config.random ?? Math.random;
        this._logger = config.logger ?? DEFAULT_LOGGER;
    }

    public get maxAttempts(): number {
        return this._maxAttempts;
    }

    // ============================================
    // Classification
    // ============================================

    /**
     * Classify an HTTP status, a ServerApiError or a raw transport failure.
     * Auth outcomes and cancellations are never retryable, whatever status they carry.
     */
    public classify(input: number | unknown): ErrorClass {
        if (typeof input === 'number') {
            return this._classifyStatus(input);
        }

        const error = normalizeTransportError(input);

        // An auth outcome keeps the status of the exchange behind it; the code wins.
        switch (error.code) {
            case AppErrorCode.AUTH_EXPIRED:
            case AppErrorCode.AUTH_REQUIRED:
            case AppErrorCode.AUTH_INVALID_CREDENTIALS:
            case AppErrorCode.ACCESS_DENIED:
                return ErrorClass.NonRetryAuth;
            case AppErrorCode.CANCELLED:
                return ErrorClass.NonRetryClient;
            default:
                break;
        }

        if (error.httpStatus !== undefined) {
            return this._classifyStatus(error.httpStatus);
        }

        switch (error.code) {
            case AppErrorCode.TIMEOUT:
            case AppErrorCode.NETWORK_UNREACHABLE:
            case AppErrorCode.SERVER_ERROR:
                return ErrorClass.RetryIdempotent;
            case AppErrorCode.SERVER_BUSY:
                return ErrorClass.RetryBusy;
            case AppErrorCode.DNS_FAILURE:
                return ErrorClass.NonRetryDns;
            default:
                return ErrorClass.NonRetryClient;
        }
    }

    public isRetryable(errorClass: ErrorClass): boolean {
        return errorClass === ErrorClass.RetryIdempotent || errorClass === ErrorClass.RetryBusy;
    }

    // ============================================
    // Backoff
    // ============================================

    /**
     * Delay before the next attempt.
     *
     * @param attempt - Zero-based attempt that just failed
     * @param errorClass - Class of that failure
     * @param status - HTTP status, if any; 429 selects the rate-limited base
     * @param retryAfterMs - Server-requested delay; replaces the exponential term
     * @returns Milliseconds, jittered by up to the configured ratio and never above the cap
     */
    public backoff(
        attempt: number,
        errorClass: ErrorClass,
        status?: number,
        retryAfterMs?: number
    ): number {
        const exponent = Math.max(0, attempt);
        const raw = retryAfterMs !== undefined && retryAfterMs > 0
            ? retryAfterMs
            : this._baseDelay(errorClass, status) * Math.pow(2, exponent);
        const capped = Math.min(this._capMs, raw);

        // uniform in [-ratio, +ratio)
        const jitter = (this._random() * 2 - 1) * this._jitterRatio;
        return Math.round(Math.min(this._capMs, capped * (1 + jitter)));
    }

    public wait(delayMs: number, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            return Promise.reject(createCancelledError());
        }
        return new Promise<void>((resolve, reject) => {
            const onAbort = (): void => {
                clearTimeout(timerId);
                reject(createCancelledError());
            };
            const timerId = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            }, Math.max(0, delayMs));
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    // ============================================
    // Execution
    // ============================================

    /**
     * Run an operation, retrying retryable failures with backoff.
     *
     * @param operation - Called with the zero-based attempt number
     * @param options - Attempt limit, abort signal and diagnostics
     * @returns The operation's result
     * @throws ServerApiError stamped with hostname and attempts once the failure is
     *   non-retryable or attempts are spent; CANCELLED when the signal aborts
     */
    public async execute<T>(
        operation: (attempt: number) => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? this._maxAttempts));
        const label = options.operationName ?? 'operation';
        const hostname = options.hostname;

        for (let attempt = 0; ; attempt++) {
            if (options.signal?.aborted) {
                throw createCancelledError(hostname).withDiagnostics({ attempts: attempt });
            }

            try {
                return await operation(attempt);
            } catch (error) {
                const failure = normalizeTransportError(error, hostname);
                const attempts = attempt + 1;

                if (failure.code === AppErrorCode.CANCELLED) {
                    throw failure.withDiagnostics({ hostname, attempts });
                }

                const errorClass = this.classify(failure);
                if (!this.isRetryable(errorClass) || attempts >= maxAttempts) {
                    if (this.isRetryable(errorClass)) {
                        this._logger.warn(
                            `[RetryPolicy] ${label} failed after ${attempts} attempt(s): ${failure.code}`
                        );
                    }
                    throw failure.withDiagnostics({ hostname, attempts });
                }

                const delayMs = this.backoff(attempt, errorClass, failure.httpStatus, failure.retryAfterMs);
                this._logger.warn(
                    `[RetryPolicy] ${label} attempt ${attempts}/${maxAttempts} failed (${failure.code}), retrying in ${delayMs}ms`
                );
                options.onRetry?.({ attempt, delayMs, errorClass, error: failure });

                try {
                    await this.wait(delayMs, options.signal);
                } catch (waitError) {
                    throw normalizeTransportError(waitError, hostname).withDiagnostics({ hostname, attempts });
                }
            }
        }
    }

    // ============================================
    // Private helpers
    // ============================================

    private _classifyStatus(status: number): ErrorClass {
        if (status === 401 || status === 403) {
            return ErrorClass.NonRetryAuth;
        }
        if (BUSY_STATUSES.has(status)) {
            return ErrorClass.RetryBusy;
        }
        if (RETRYABLE_STATUSES.has(status)) {
            return ErrorClass.RetryIdempotent;
        }
        return ErrorClass.NonRetryClient;
    }

    private _baseDelay(errorClass: ErrorClass, status?: number): number {
        if (status === 429) {
            return this._rateLimitedBaseMs;
        }
        if (errorClass === ErrorClass.RetryBusy) {
            return this._busyBaseMs;
        }
        return this._defaultBaseMs;
    }
}
