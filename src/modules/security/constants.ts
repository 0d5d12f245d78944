/**
 * @fileoverview Constants for the security module.
 * @module modules/security/constants
 * @version 1.0.0
 */

/**
 * Encrypted preference store parameters.
 */
export const ENCRYPTION_CONSTANTS = {
    /** Cipher used for every stored value */
    CIPHER: 'aes-256-gcm',

    /** Required key length in bytes */
    KEY_BYTES: 32,

    /** GCM nonce length in bytes */
    IV_BYTES: 12,

    /** GCM authentication tag length in bytes */
    AUTH_TAG_BYTES: 16,

    /** Prefix marking the envelope format of a stored value */
    ENVELOPE_PREFIX: 'v1:',

    /** scrypt cost parameters for passphrase-derived keys */
    SCRYPT_COST: 16384,
    SCRYPT_BLOCK_SIZE: 8,
    SCRYPT_PARALLELIZATION: 1,
} as const;

/**
 * Certificate pinning parameters.
 */
export const PINNING_CONSTANTS = {
    /** Digest applied to the SubjectPublicKeyInfo DER */
    PIN_HASH_ALGORITHM: 'sha256',

    /** Upper bound when walking issuer links of a presented chain */
    MAX_CHAIN_DEPTH: 10,

    /** Version written into persisted pin records */
    PIN_RECORD_VERSION: 1,
} as const;
