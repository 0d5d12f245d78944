/**
 * @fileoverview Constants for endpoint discovery.
 * @module modules/discovery/constants
 * @version 1.0.0
 */

export const DISCOVERY_CONSTANTS = {
    /** Unauthenticated identification endpoint */
    IDENTIFICATION_PATH: '/System/Info/Public',

    /** Default Jellyfin HTTP port */
    JELLYFIN_HTTP_PORT: 8096,

    /** Default Jellyfin HTTPS port */
    JELLYFIN_HTTPS_PORT: 8920,

    /** Reverse-proxy sub-path commonly used for Jellyfin */
    JELLYFIN_PATH: '/jellyfin',

    /** Candidates probed concurrently */
    DEFAULT_BATCH_SIZE: 4,

    /** Per-probe timeout on unmetered networks */
    PROBE_TIMEOUT_MS: 5000,

    /** Probe timeout multiplier on metered networks */
    METERED_TIMEOUT_MULTIPLIER: 2,

    /** Attempts per probe (first try included) */
    PROBE_MAX_ATTEMPTS: 1,
} as const;

/** Default port per scheme; omitted from candidate URLs. */
export const DEFAULT_SCHEME_PORTS: Readonly<Record<'https' | 'http', number>> = {
    https: 443,
    http: 80,
};
