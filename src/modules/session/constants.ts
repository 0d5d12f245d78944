/**
 * @fileoverview Constants for the session module.
 * @module modules/session/constants
 * @version 1.0.0
 */

export const SESSION_CONSTANTS = {
    /** Token exchange endpoint */
    AUTHENTICATE_PATH: '/Users/AuthenticateByName',

    /** Quick Connect endpoints */
    QUICK_CONNECT_INITIATE_PATH: '/QuickConnect/Initiate',
    QUICK_CONNECT_STATE_PATH: '/QuickConnect/Connect',
    QUICK_CONNECT_AUTHENTICATE_PATH: '/Users/AuthenticateWithQuickConnect',

    /** Validity assumed when the server gives no hint (50 minutes) */
    DEFAULT_TOKEN_VALIDITY_MS: 50 * 60 * 1000,

    /** Fraction of the validity window after which a proactive refresh starts */
    PROACTIVE_REFRESH_FRACTION: 0.8,

    /** Budget for a whole refresh episode, retries included */
    REFRESH_TIMEOUT_MS: 15000,

    /** Version written into persisted session records */
    STORAGE_VERSION: 1,
} as const;

/**
 * User-facing error messages.
 */
export const SESSION_ERROR_MESSAGES = {
    AUTH_REQUIRED: 'Not signed in. Please log in to the server.',
    AUTH_EXPIRED: 'Your session has expired. Please sign in again.',
    AUTH_INVALID_CREDENTIALS: 'Incorrect username or password.',
    ACCESS_DENIED: 'This account is not allowed to perform that action.',
    QUICK_CONNECT_DISABLED: 'Quick Connect is not enabled on this server.',
    QUICK_CONNECT_NOT_APPROVED: 'The Quick Connect request was not approved.',
} as const;
