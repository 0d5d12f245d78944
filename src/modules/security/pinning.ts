/**
 * @fileoverview Public key pin calculation.
 * @module modules/security/pinning
 * @version 1.0.0
 */

import { createHash, X509Certificate } from 'node:crypto';
import { PINNING_CONSTANTS } from './constants';
import type { PinnableCertificate } from './types';

/**
 * Base64 SHA-256 of a DER-encoded SubjectPublicKeyInfo.
 */
export function hashPublicKey(spkiDer: Buffer): string {
    return createHash(PINNING_CONSTANTS.PIN_HASH_ALGORITHM).update(spkiDer).digest('base64');
}

/**
 * Pin of a certificate: the hash of its public key, so re-issued
 * certificates with the same key keep matching.
 */
export function computeSpkiPin(certificate: PinnableCertificate): string {
    const x509 = new X509Certificate(certificate.raw);
    const spki = x509.publicKey.export({ type: 'spki', format: 'der' });
    return hashPublicKey(spki);
}

/**
 * Flatten a linked chain, leaf first. Stops at self-issued roots.
 */
export function chainToList(leaf: PinnableCertificate): PinnableCertificate[] {
    const list: PinnableCertificate[] = [];
    const seen = new Set<PinnableCertificate>();
    let current: PinnableCertificate | undefined = leaf;
    while (current && !seen.has(current) && list.length < PINNING_CONSTANTS.MAX_CHAIN_DEPTH) {
        seen.add(current);
        list.push(current);
        current = current.issuerCertificate;
    }
    return list;
}
