/**
 * @fileoverview Storage key constants for the encrypted preference store.
 * @module config/storageKeys
 * @version 1.0.0
 */

/**
 * Canonical keys used across modules.
 *
 * Keep this file free of module imports so every layer can depend on it safely.
 */
export const SESSION_STORAGE_KEYS = {
    /** Prefix shared by every key this core owns */
    PREFIX: 'msc_',

    /** Persisted session (token, issue time, validity), suffixed with the server host */
    SESSION_PREFIX: 'msc_session:',
    /** Stored login credentials for re-authentication, suffixed with the server host */
    CREDENTIALS_PREFIX: 'msc_credentials:',
    /** Certificate pin records, suffixed with the hostname */
    PIN_PREFIX: 'msc_cert_pin:',

    /** Retry/discovery configuration overrides (JSON) */
    CONFIG_OVERRIDES: 'msc_config_overrides',
    /** Persistent device identifier sent with every request */
    DEVICE_ID: 'msc_device_id',
} as const;
