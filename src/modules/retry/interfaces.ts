/**
 * @fileoverview Interface definitions for the retry policy.
 * @module modules/retry/interfaces
 * @version 1.0.0
 */

import type { Logger } from '../../utils/interfaces';
import type { ErrorClass, RetryOptions } from './types';

/**
 * Retry policy configuration. Every field is optional; defaults come from RETRY_CONSTANTS.
 */
export interface RetryPolicyConfig {
    maxAttempts?: number;
    capMs?: number;
    defaultBaseMs?: number;
    busyBaseMs?: number;
    rateLimitedBaseMs?: number;
    jitterRatio?: number;
    /** Random source in [0, 1); injectable for deterministic tests */
    random?: () => number;
    logger?: Logger;
}

/**
 * Failure classification and backoff scheduling.
 */
export interface IRetryPolicy {
    /**
     * Classify an HTTP status or a thrown error.
     */
    classify(input: number | unknown): ErrorClass;

    isRetryable(errorClass: ErrorClass): boolean;

    /**
     * Delay before retry number `attempt + 1`.
     * @param attempt - Zero-based index of the attempt that failed
     * @param status - HTTP status, used to tell 429 from 503
     * @param retryAfterMs - Server-requested delay, replaces the exponential term
     */
    backoff(attempt: number, errorClass: ErrorClass, status?: number, retryAfterMs?: number): number;

    /**
     * Timer-driven wait. Rejects with CANCELLED when the signal aborts.
     */
    wait(delayMs: number, signal?: AbortSignal): Promise<void>;

    /**
     * Run an operation, retrying retryable failures with backoff.
     * @throws ServerApiError stamped with attempts and hostname once exhausted
     */
    execute<T>(operation: (attempt: number) => Promise<T>, options?: RetryOptions): Promise<T>;

    readonly maxAttempts: number;
}
