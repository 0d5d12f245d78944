/**
 * @fileoverview Public exports for the security module.
 * @module modules/security
 * @version 1.0.0
 */

export { EncryptedPreferences } from './EncryptedPreferences';
export { CertificateTrustStore } from './CertificateTrustStore';
export { computeSpkiPin, hashPublicKey } from './pinning';
export { ENCRYPTION_CONSTANTS, PINNING_CONSTANTS } from './constants';
export type {
    IEncryptedPreferences,
    EncryptedPreferencesConfig,
    ICertificateTrustStore,
    CertificateTrustStoreConfig,
} from './interfaces';
export type { Pin, PinnableCertificate, PinCalculator } from './types';
