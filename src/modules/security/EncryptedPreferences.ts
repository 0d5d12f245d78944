/**
 * @fileoverview AES-256-GCM encrypted key-value preferences.
 * @module modules/security/EncryptedPreferences
 * @version 1.0.0
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { AppErrorCode, ServerApiError } from '../../types/app-errors';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import {
    StorageLike,
    listKeysWithPrefix,
    safeStorageGet,
    safeStorageRemove,
    safeStorageSet,
} from '../../utils/storage';
import { ENCRYPTION_CONSTANTS } from './constants';
import type { EncryptedPreferencesConfig, IEncryptedPreferences } from './interfaces';

/**
 * Encrypted preference store.
 *
 * Each value is stored as `v1:` + base64(iv | authTag | ciphertext). The storage
 * key is bound as additional authenticated data, so an envelope copied under a
 * different key fails to decrypt.
 *
 * @example
 * ```typescript
 * const prefs = new EncryptedPreferences({
 *   storage: new FileStorage('/var/lib/media-session/prefs.json'),
 *   key: EncryptedPreferences.deriveKey(process.env.PREFS_SECRET ?? '', 'media-session'),
 * });
 * prefs.set('msc_device_id', 'device-1');
 * ```
 */
export class EncryptedPreferences implements IEncryptedPreferences {
    private readonly _storage: StorageLike;
    private readonly _key: Buffer;
    private readonly _logger: Logger;

    constructor(config: EncryptedPreferencesConfig) {
        if (config.key.length !== ENCRYPTION_CONSTANTS.KEY_BYTES) {
            throw new RangeError(`Encryption key must be ${ENCRYPTION_CONSTANTS.KEY_BYTES} bytes`);
        }
        this._storage = config.storage;
        this._key = Buffer.from(config.key);
        this._logger = config.logger ?? DEFAULT_LOGGER;
    }

    /**
     * Random 32-byte key for hosts that keep the key in a secret store.
     */
    public static generateKey(): Buffer {
        return randomBytes(ENCRYPTION_CONSTANTS.KEY_BYTES);
    }

    /**
     * Derive a 32-byte key from a passphrase with scrypt.
     */
    public static deriveKey(passphrase: string, salt: string): Buffer {
        return scryptSync(passphrase, salt, ENCRYPTION_CONSTANTS.KEY_BYTES, {
            N: ENCRYPTION_CONSTANTS.SCRYPT_COST,
            r: ENCRYPTION_CONSTANTS.SCRYPT_BLOCK_SIZE,
            p: ENCRYPTION_CONSTANTS.SCRYPT_PARALLELIZATION,
        });
    }

    public get(key: string): string | null {
        const envelope = safeStorageGet(this._storage, key);
        if (envelope === null) {
            return null;
        }
        return this._decrypt(key, envelope);
    }

    public getJson(key: string): unknown {
        const plaintext = this.get(key);
        if (plaintext === null) {
            return null;
        }
        try {
            const parsed: unknown = JSON.parse(plaintext);
            return parsed;
        } catch (error) {
            throw new ServerApiError(AppErrorCode.STORAGE_CORRUPTED, `Stored value is not valid JSON: ${key}`, {
                cause: error,
            });
        }
    }

    public set(key: string, value: string): boolean {
        const ok = safeStorageSet(this._storage, key, this._encrypt(key, value));
        if (!ok) {
            this._logger.warn(`[EncryptedPreferences] Storage rejected write for key: ${key}`);
        }
        return ok;
    }

    public setJson(key: string, value: unknown): boolean {
        return this.set(key, JSON.stringify(value));
    }

    public remove(key: string): boolean {
        return safeStorageRemove(this._storage, key);
    }

    public has(key: string): boolean {
        return safeStorageGet(this._storage, key) !== null;
    }

    public keys(prefix: string = ''): string[] {
        return listKeysWithPrefix(this._storage, prefix);
    }

    // ============================================
    // Private helpers
    // ============================================

    private _encrypt(key: string, plaintext: string): string {
        const iv = randomBytes(ENCRYPTION_CONSTANTS.IV_BYTES);
        const cipher = createCipheriv(ENCRYPTION_CONSTANTS.CIPHER, this._key, iv, {
            authTagLength: ENCRYPTION_CONSTANTS.AUTH_TAG_BYTES,
        });
        cipher.setAAD(Buffer.from(key, 'utf8'));
        const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
        const tag = cipher.getAuthTag();
        return `${ENCRYPTION_CONSTANTS.ENVELOPE_PREFIX}${Buffer.concat([iv, tag, ciphertext]).toString('base64')}`;
    }

    private _decrypt(key: string, envelope: string): string {
        if (!envelope.startsWith(ENCRYPTION_CONSTANTS.ENVELOPE_PREFIX)) {
            throw this._corrupted(key);
        }
        const payload = Buffer.from(envelope.slice(ENCRYPTION_CONSTANTS.ENVELOPE_PREFIX.length), 'base64');
        const headerLength = ENCRYPTION_CONSTANTS.IV_BYTES + ENCRYPTION_CONSTANTS.AUTH_TAG_BYTES;
        if (payload.length < headerLength) {
            throw this._corrupted(key);
        }

        const iv = payload.subarray(0, ENCRYPTION_CONSTANTS.IV_BYTES);
        const tag = payload.subarray(ENCRYPTION_CONSTANTS.IV_BYTES, headerLength);
        const ciphertext = payload.subarray(headerLength);

        try {
            const decipher = createDecipheriv(ENCRYPTION_CONSTANTS.CIPHER, this._key, iv, {
                authTagLength: ENCRYPTION_CONSTANTS.AUTH_TAG_BYTES,
            });
            decipher.setAAD(Buffer.from(key, 'utf8'));
            decipher.setAuthTag(tag);
            return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
        } catch (error) {
            throw this._corrupted(key, error);
        }
    }

    private _corrupted(key: string, cause?: unknown): ServerApiError {
        this._logger.warn(`[EncryptedPreferences] Unable to decrypt value for key: ${key}`);
        return new ServerApiError(AppErrorCode.STORAGE_CORRUPTED, `Stored value could not be decrypted: ${key}`, {
            cause,
        });
    }
}
