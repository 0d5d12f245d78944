/**
 * @fileoverview Public exports for the retry module.
 * @module modules/retry
 * @version 1.0.0
 */

export { RetryPolicy } from './RetryPolicy';
export { RETRY_CONSTANTS } from './constants';
export { errorForStatus, parseRetryAfter, normalizeTransportError } from './errorMapping';
export { ErrorClass } from './types';
export type { RetryAttemptInfo, RetryOptions } from './types';
export type { IRetryPolicy, RetryPolicyConfig } from './interfaces';
