/**
 * @fileoverview Type definitions for the retry policy.
 * @module modules/retry/types
 * @version 1.0.0
 */

import type { ServerApiError } from '../../types/app-errors';

/**
 * Failure classes used to decide whether and how long to wait before retrying.
 */
export enum ErrorClass {
    /** Transient failure; retry with the default base delay */
    RetryIdempotent = 'RETRY_IDEMPOTENT',
    /** Server under pressure (429/503); retry with a larger base delay */
    RetryBusy = 'RETRY_BUSY',
    /** 401/403; owned by the auth layer, never retried here */
    NonRetryAuth = 'NON_RETRY_AUTH',
    /** The request itself is wrong (404, other 4xx, pin mismatch) */
    NonRetryClient = 'NON_RETRY_CLIENT',
    /** Name resolution failed; waiting will not fix a wrong address */
    NonRetryDns = 'NON_RETRY_DNS',
}

/**
 * Details passed to the onRetry hook before each scheduled retry.
 */
export interface RetryAttemptInfo {
    /** Zero-based index of the attempt that just failed */
    attempt: number;
    delayMs: number;
    errorClass: ErrorClass;
    error: ServerApiError;
}

/**
 * Per-call options for RetryPolicy.execute().
 */
export interface RetryOptions {
    /** Total attempts including the first; defaults to the policy's value */
    maxAttempts?: number;
    /** Cancels the operation and any pending backoff */
    signal?: AbortSignal;
    /** Stamped on surfaced errors for diagnostics */
    hostname?: string;
    /** Label used in log lines */
    operationName?: string;
    onRetry?: (info: RetryAttemptInfo) => void;
}
