/**
 * @fileoverview Constants for the HTTP transport.
 * @module modules/transport/constants
 * @version 1.0.0
 */

export const TRANSPORT_CONSTANTS = {
    /** Per-dispatch timeout when the request sets none */
    DEFAULT_TIMEOUT_MS: 30000,

    /** User-Agent product token */
    USER_AGENT: 'media-session-core/1.0.0',

    /** Default Accept header */
    ACCEPT: 'application/json',

    /** Authenticated clients kept before the least recently used is evicted */
    CLIENT_CACHE_MAX_ENTRIES: 8,
} as const;
