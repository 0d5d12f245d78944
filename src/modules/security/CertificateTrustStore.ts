/**
 * @fileoverview Trust-on-first-use certificate pin store.
 * @module modules/security/CertificateTrustStore
 * @version 1.0.0
 */

import { checkServerIdentity, PeerCertificate } from 'node:tls';
import { SESSION_STORAGE_KEYS } from '../../config/storageKeys';
import { AppErrorCode, ServerApiError } from '../../types/app-errors';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import { PINNING_CONSTANTS } from './constants';
import type {
    CertificateTrustStoreConfig,
    ICertificateTrustStore,
    IEncryptedPreferences,
} from './interfaces';
import { chainToList, computeSpkiPin } from './pinning';
import type { Pin, PinCalculator, PinnableCertificate } from './types';

/**
 * Certificate trust store.
 *
 * A host is Unknown until its first handshake, then Pinned to the leaf
 * certificate's public key. A pinned host must present a chain containing the
 * pinned key or the handshake fails. Only `revokePin()` returns a host to Unknown.
 *
 * `verify()` runs inside the TLS handshake and is synchronous: it works against
 * the in-memory map and queues persistence.
 */
export class CertificateTrustStore implements ICertificateTrustStore {
    private readonly _preferences: IEncryptedPreferences;
    private readonly _logger: Logger;
    private readonly _now: () => number;
    private readonly _computePin: PinCalculator;
    private readonly _pins = new Map<string, Pin>();
    private _initialized = false;
    private _initPromise: Promise<void> | null = null;
    private _writeChain: Promise<void> = Promise.resolve();
    private _writeErrors: unknown[] = [];

    constructor(config: CertificateTrustStoreConfig) {
        this._preferences = config.preferences;
        this._logger = config.logger ?? DEFAULT_LOGGER;
        this._now = config.now ?? Date.now;
        this._computePin = config.computePin ?? computeSpkiPin;
    }

    public get isInitialized(): boolean {
        return this._initialized;
    }

    /**
     * Load persisted pins. Handshakes fail until this resolves.
     * @throws ServerApiError with STORAGE_CORRUPTED on a malformed pin record
     */
    public initialize(): Promise<void> {
        if (!this._initPromise) {
            this._initPromise = this._loadPins().catch((error: unknown) => {
                this._initPromise = null;
                throw error;
            });
        }
        return this._initPromise;
    }

    /**
     * Check a presented chain against the host's pin, pinning the leaf key on first use.
     *
     * @param hostname - Host the connection was opened to
     * @param chain - Peer certificate with its issuer chain
     * @throws ServerApiError with SERVER_SSL_ERROR before {@link initialize} completes
     *   or when no certificate is presented
     * @throws ServerApiError with CERTIFICATE_PIN_MISMATCH when no certificate in the chain matches
     */
    public verify(hostname: string, chain: PinnableCertificate): void {
        const host = normalizeHostname(hostname);
        if (!this._initialized) {
            throw new ServerApiError(AppErrorCode.SERVER_SSL_ERROR, 'Certificate trust store is not initialized', {
                hostname: host,
            });
        }
        const certificates = chainToList(chain);
        const leaf = certificates[0];
        if (!leaf) {
            throw new ServerApiError(AppErrorCode.SERVER_SSL_ERROR, 'No certificate presented', { hostname: host });
        }

        const existing = this._pins.get(host);
        if (!existing) {
            const pin: Pin = {
                hostname: host,
                publicKeyHash: this._computePin(leaf),
                firstSeenAt: this._now(),
            };
            this._pins.set(host, pin);
            this._logger.info(`[CertificateTrustStore] Pinned certificate for ${host}`);
            this._enqueueWrite(() => this._writePin(pin));
            return;
        }

        for (const certificate of certificates) {
            if (this._computePin(certificate) === existing.publicKeyHash) {
                return;
            }
        }

        this._logger.error(`[CertificateTrustStore] Certificate pin mismatch for ${host}`);
        throw new ServerApiError(
            AppErrorCode.CERTIFICATE_PIN_MISMATCH,
            `Server certificate for ${host} does not match the pinned key`,
            { hostname: host }
        );
    }

    public createServerIdentityCheck(): (hostname: string, certificate: PeerCertificate) => Error | undefined {
        return (hostname: string, certificate: PeerCertificate): Error | undefined => {
            const identityError = checkServerIdentity(hostname, certificate);
            if (identityError) {
                return identityError;
            }
            try {
                this.verify(hostname, certificate);
                return undefined;
            } catch (error) {
                return error instanceof Error ? error : new Error(String(error));
            }
        };
    }

    public getPin(hostname: string): Pin | null {
        const pin = this._pins.get(normalizeHostname(hostname));
        return pin ? { ...pin } : null;
    }

    public getPinnedCertificates(): Pin[] {
        return Array.from(this._pins.values(), (pin) => ({ ...pin }));
    }

    /**
     * Forget the pin for one host; its next full handshake pins again.
     *
     * @param hostname - Host to unpin
     * @returns true if a pin existed
     */
    public async revokePin(hostname: string): Promise<boolean> {
        const host = normalizeHostname(hostname);
        const existed = this._pins.delete(host);
        this._enqueueWrite(() => {
            this._preferences.remove(`${SESSION_STORAGE_KEYS.PIN_PREFIX}${host}`);
        });
        if (existed) {
            this._logger.info(`[CertificateTrustStore] Revoked pin for ${host}`);
        }
        await this.flush();
        return existed;
    }

    public async clearAllPins(): Promise<void> {
        this._pins.clear();
        this._enqueueWrite(() => {
            for (const key of this._preferences.keys(SESSION_STORAGE_KEYS.PIN_PREFIX)) {
                this._preferences.remove(key);
            }
        });
        this._logger.info('[CertificateTrustStore] Cleared all pins');
        await this.flush();
    }

    public async flush(): Promise<void> {
        await this._writeChain;
        const failures = this._writeErrors;
        this._writeErrors = [];
        if (failures.length > 0) {
            throw new ServerApiError(AppErrorCode.STORAGE_CORRUPTED, 'Failed to persist certificate pins', {
                cause: failures[0],
            });
        }
    }

    // ============================================
    // Private helpers
    // ============================================

    private async _loadPins(): Promise<void> {
        await this._writeChain;
        for (const key of this._preferences.keys(SESSION_STORAGE_KEYS.PIN_PREFIX)) {
            // A malformed record fails initialization instead of unpinning the host.
            const pin = parsePinRecord(this._preferences.getJson(key));
            if (!pin) {
                throw new ServerApiError(AppErrorCode.STORAGE_CORRUPTED, `Malformed pin record: ${key}`);
            }
            this._pins.set(pin.hostname, pin);
        }
        this._initialized = true;
        this._logger.debug(`[CertificateTrustStore] Loaded ${this._pins.size} pin(s)`);
    }

    private _writePin(pin: Pin): void {
        const ok = this._preferences.setJson(`${SESSION_STORAGE_KEYS.PIN_PREFIX}${pin.hostname}`, {
            version: PINNING_CONSTANTS.PIN_RECORD_VERSION,
            hostname: pin.hostname,
            publicKeyHash: pin.publicKeyHash,
            firstSeenAt: pin.firstSeenAt,
        });
        if (!ok) {
            throw new Error(`Storage rejected pin for ${pin.hostname}`);
        }
    }

    private _enqueueWrite(task: () => void): void {
        this._writeChain = this._writeChain.then(task).catch((error: unknown) => {
            this._logger.error('[CertificateTrustStore] Failed to persist pin change:', error);
            this._writeErrors.push(error);
        });
    }
}

function normalizeHostname(hostname: string): string {
    return hostname.trim().toLowerCase().replace(/\.$/, '');
}

function parsePinRecord(value: unknown): Pin | null {
    if (typeof value !== 'object' || value === null) {
        return null;
    }
    const hostname: unknown = Reflect.get(value, 'hostname');
    const publicKeyHash: unknown = Reflect.get(value, 'publicKeyHash');
    const firstSeenAt: unknown = Reflect.get(value, 'firstSeenAt');
    if (
        typeof hostname !== 'string' ||
        typeof publicKeyHash !== 'string' ||
        publicKeyHash.length === 0 ||
        typeof firstSeenAt !== 'number'
    ) {
        return null;
    }
    return { hostname: normalizeHostname(hostname), publicKeyHash, firstSeenAt };
}
