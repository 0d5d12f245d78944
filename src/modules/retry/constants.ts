/**
 * @fileoverview Constants for the retry policy.
 * @module modules/retry/constants
 * @version 1.0.0
 */

/**
 * Retry policy defaults.
 * All timing values in milliseconds unless noted.
 */
export const RETRY_CONSTANTS = {
    /** Total attempts (first try included) */
    MAX_ATTEMPTS: 3,

    /** Upper bound for any computed delay */
    CAP_MS: 10000,

    /** Base delay for ordinary transient failures */
    DEFAULT_BASE_MS: 1000,

    /** Base delay when the server reports it is busy (503) */
    BUSY_BASE_MS: 2000,

    /** Base delay when the server rate-limits us (429) */
    RATE_LIMITED_BASE_MS: 5000,

    /** Jitter applied to every delay (+/- 10%) */
    JITTER_RATIO: 0.1,
} as const;

/** HTTP statuses worth retrying unchanged. */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 500, 502, 504]);

/** HTTP statuses signalling server-side pressure. */
export const BUSY_STATUSES: ReadonlySet<number> = new Set([429, 503]);

/** Node/undici error codes for a failed name lookup. */
export const DNS_ERROR_CODES: ReadonlySet<string> = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);

/** Node/undici error codes for connect/socket failures. */
export const CONNECT_ERROR_CODES: ReadonlySet<string> = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ECONNABORTED',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
    'UND_ERR_SOCKET',
    'UND_ERR_CLOSED',
]);

/** Node/undici error codes for timeouts. */
export const TIMEOUT_ERROR_CODES: ReadonlySet<string> = new Set([
    'ETIMEDOUT',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
]);

/** TLS validation failures reported by Node before our pin check runs. */
export const TLS_ERROR_CODES: ReadonlySet<string> = new Set([
    'CERT_HAS_EXPIRED',
    'CERT_NOT_YET_VALID',
    'DEPTH_ZERO_SELF_SIGNED_CERT',
    'SELF_SIGNED_CERT_IN_CHAIN',
    'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
    'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
    'ERR_TLS_CERT_ALTNAME_INVALID',
]);
