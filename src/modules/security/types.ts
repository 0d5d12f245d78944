/**
 * @fileoverview Type definitions for certificate pinning.
 * @module modules/security/types
 * @version 1.0.0
 */

/**
 * Trust-on-first-use pin for one hostname.
 */
export interface Pin {
    /** Lower-cased hostname the pin applies to */
    hostname: string;
    /** Base64 SHA-256 of the leaf certificate's SubjectPublicKeyInfo */
    publicKeyHash: string;
    /** Epoch ms when the key was first seen */
    firstSeenAt: number;
}

/**
 * The part of a TLS peer certificate needed for pinning.
 * Node's detailed peer certificate links each entry to its issuer.
 */
export interface PinnableCertificate {
    /** DER encoding of the certificate */
    raw: Buffer;
    issuerCertificate?: PinnableCertificate;
}

/**
 * Computes the pin value of one certificate.
 */
export type PinCalculator = (certificate: PinnableCertificate) => string;
