/**
 * @fileoverview Interface definitions for the security module.
 * @module modules/security/interfaces
 * @version 1.0.0
 */

import type { PeerCertificate } from 'node:tls';
import type { Logger } from '../../utils/interfaces';
import type { StorageLike } from '../../utils/storage';
import type { Pin, PinCalculator, PinnableCertificate } from './types';

/**
 * Encrypted preference store configuration.
 */
export interface EncryptedPreferencesConfig {
    /** Backend holding the encrypted envelopes */
    storage: StorageLike;
    /** 32-byte AES key supplied by the host application */
    key: Uint8Array;
    logger?: Logger;
}

/**
 * Key-value store whose values are encrypted at rest.
 */
export interface IEncryptedPreferences {
    /**
     * Decrypt a stored value.
     * @returns The plaintext, or null when the key is absent
     * @throws ServerApiError with STORAGE_CORRUPTED when the envelope cannot be decrypted
     */
    get(key: string): string | null;

    /**
     * Decrypt and parse a JSON value.
     * @throws ServerApiError with STORAGE_CORRUPTED when decryption or parsing fails
     */
    getJson(key: string): unknown;

    /**
     * Encrypt and store a value.
     * @returns false if the backend rejected the write
     */
    set(key: string, value: string): boolean;

    setJson(key: string, value: unknown): boolean;

    remove(key: string): boolean;

    has(key: string): boolean;

    /**
     * Stored keys, optionally filtered by prefix.
     */
    keys(prefix?: string): string[];
}

/**
 * Certificate trust store configuration.
 */
export interface CertificateTrustStoreConfig {
    preferences: IEncryptedPreferences;
    logger?: Logger;
    /** Clock for firstSeenAt; defaults to Date.now */
    now?: () => number;
    /** Pin calculator; defaults to SHA-256 over the SPKI DER */
    computePin?: PinCalculator;
}

/**
 * TOFU certificate pin store enforced during TLS handshakes.
 */
export interface ICertificateTrustStore {
    /**
     * Load persisted pins. Must complete before the first handshake.
     */
    initialize(): Promise<void>;

    readonly isInitialized: boolean;

    /**
     * Check a presented chain against the hostname's pin, pinning the leaf on first use.
     * @throws ServerApiError with CERTIFICATE_PIN_MISMATCH when no certificate matches
     */
    verify(hostname: string, chain: PinnableCertificate): void;

    /**
     * Build a checkServerIdentity callback for Node TLS.
     * Runs the standard hostname check, then the pin check.
     */
    createServerIdentityCheck(): (hostname: string, certificate: PeerCertificate) => Error | undefined;

    getPin(hostname: string): Pin | null;

    getPinnedCertificates(): Pin[];

    /**
     * Forget the pin for one host. The next handshake pins again.
     * @returns true if a pin existed
     */
    revokePin(hostname: string): Promise<boolean>;

    clearAllPins(): Promise<void>;

    /**
     * Wait for pending pin writes.
     * @throws ServerApiError with STORAGE_CORRUPTED when a write failed
     */
    flush(): Promise<void>;
}
