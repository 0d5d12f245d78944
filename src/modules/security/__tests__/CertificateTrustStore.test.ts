/**
 * @fileoverview Unit tests for the TOFU certificate trust store.
 * @module modules/security/__tests__/CertificateTrustStore.test
 */

import { generateKeyPairSync, createHash } from 'node:crypto';
import { CertificateTrustStore } from '../CertificateTrustStore';
import { EncryptedPreferences } from '../EncryptedPreferences';
import { hashPublicKey } from '../pinning';
import type { PinnableCertificate } from '../types';
import { MemoryStorage } from '../../../utils/storage';
import { AppErrorCode, ServerApiError } from '../../../types/app-errors';
import { SILENT_LOGGER } from '../../../utils/logger';

// Test certificates carry their "key" in raw; the pin is derived from it.
function cert(keyLabel: string, issuer?: PinnableCertificate): PinnableCertificate {
    return issuer
        ? { raw: Buffer.from(keyLabel), issuerCertificate: issuer }
        : { raw: Buffer.from(keyLabel) };
}

const computePin = (certificate: PinnableCertificate): string => `pin:${certificate.raw.toString('utf8')}`;

describe('CertificateTrustStore', () => {
    let storage: MemoryStorage;
    let prefs: EncryptedPreferences;

    function createStore(): CertificateTrustStore {
        return new CertificateTrustStore({
            preferences: prefs,
            logger: SILENT_LOGGER,
            now: () => 1700000000000,
            computePin,
        });
    }

    beforeEach(() => {
        storage = new MemoryStorage();
        prefs = new EncryptedPreferences({ storage, key: Buffer.alloc(32, 7), logger: SILENT_LOGGER });
    });

    it('should pin the leaf key on first use and accept it afterwards', async () => {
        const store = createStore();
        await store.initialize();

        expect(() => store.verify('media.test', cert('P1'))).not.toThrow();
        expect(store.getPin('media.test')).toEqual({
            hostname: 'media.test',
            publicKeyHash: 'pin:P1',
            firstSeenAt: 1700000000000,
        });
        expect(() => store.verify('media.test', cert('P1'))).not.toThrow();
    });

    it('should reject a different key for a pinned host', async () => {
        const store = createStore();
        await store.initialize();
        store.verify('media.test', cert('P1'));

        expect(() => store.verify('media.test', cert('P2'))).toThrow(
            expect.objectContaining({ code: AppErrorCode.CERTIFICATE_PIN_MISMATCH, hostname: 'media.test' })
        );
        expect(store.getPin('media.test')?.publicKeyHash).toBe('pin:P1');
    });

    it('should accept a chain that contains the pinned key further up', async () => {
        const store = createStore();
        await store.initialize();
        store.verify('media.test', cert('P1'));

        expect(() => store.verify('media.test', cert('P3', cert('P1')))).not.toThrow();
    });

    it('should treat hostnames case-insensitively', async () => {
        const store = createStore();
        await store.initialize();
        store.verify('Media.Test', cert('P1'));

        expect(() => store.verify('media.test.', cert('P2'))).toThrow(ServerApiError);
    });

    it('should persist pins encrypted and reload them', async () => {
        const store = createStore();
        await store.initialize();
        store.verify('media.test', cert('P1'));
        await store.flush();

        const raw = storage.getItem('msc_cert_pin:media.test');
        expect(raw).not.toBeNull();
        expect(raw).not.toContain('pin:P1');

        const reloaded = createStore();
        await reloaded.initialize();
        expect(reloaded.isInitialized).toBe(true);
        expect(() => reloaded.verify('media.test', cert('P2'))).toThrow(
            expect.objectContaining({ code: AppErrorCode.CERTIFICATE_PIN_MISMATCH })
        );
    });

    it('should return a host to unknown only when its pin is revoked', async () => {
        const store = createStore();
        await store.initialize();
        store.verify('media.test', cert('P1'));

        expect(await store.revokePin('media.test')).toBe(true);
        expect(store.getPin('media.test')).toBeNull();
        expect(storage.getItem('msc_cert_pin:media.test')).toBeNull();

        expect(() => store.verify('media.test', cert('P2'))).not.toThrow();
        expect(store.getPin('media.test')?.publicKeyHash).toBe('pin:P2');
        expect(await store.revokePin('other.test')).toBe(false);
    });

    it('should clear every pin', async () => {
        const store = createStore();
        await store.initialize();
        store.verify('a.test', cert('P1'));
        store.verify('b.test', cert('P2'));

        await store.clearAllPins();

        expect(store.getPinnedCertificates()).toEqual([]);
        expect(prefs.keys('msc_cert_pin:')).toEqual([]);
    });

    it('should refuse handshakes until the stored pins are loaded', async () => {
        const first = createStore();
        await first.initialize();
        first.verify('media.test', cert('P1'));
        await first.flush();

        const store = createStore();
        expect(() => store.verify('media.test', cert('P2'))).toThrow(
            expect.objectContaining({ code: AppErrorCode.SERVER_SSL_ERROR, hostname: 'media.test' })
        );
        expect(store.getPin('media.test')).toBeNull();

        await store.initialize();
        expect(store.getPin('media.test')?.publicKeyHash).toBe('pin:P1');
        expect(() => store.verify('media.test', cert('P2'))).toThrow(
            expect.objectContaining({ code: AppErrorCode.CERTIFICATE_PIN_MISMATCH })
        );
    });

    it('should fail initialization on a malformed pin record', async () => {
        prefs.setJson('msc_cert_pin:media.test', { hostname: 'media.test' });
        const store = createStore();

        await expect(store.initialize()).rejects.toMatchObject({ code: AppErrorCode.STORAGE_CORRUPTED });
        expect(store.isInitialized).toBe(false);
    });

    it('should report failed pin writes on flush', async () => {
        const failing = new MemoryStorage();
        jest.spyOn(failing, 'setItem').mockImplementation(() => {
            throw new Error('disk full');
        });
        const store = new CertificateTrustStore({
            preferences: new EncryptedPreferences({ storage: failing, key: Buffer.alloc(32, 7), logger: SILENT_LOGGER }),
            logger: SILENT_LOGGER,
            computePin,
        });
        await store.initialize();
        store.verify('media.test', cert('P1'));

        await expect(store.flush()).rejects.toMatchObject({ code: AppErrorCode.STORAGE_CORRUPTED });
        await expect(store.flush()).resolves.toBeUndefined();
    });

    it('should run the standard hostname check before pinning', async () => {
        const store = createStore();
        await store.initialize();
        const check = store.createServerIdentityCheck();

        const error = check('media.test', {
            subject: { CN: 'other.test' },
            subjectaltname: 'DNS:other.test',
            raw: Buffer.from('P1'),
        } as unknown as Parameters<typeof check>[1]);

        expect(error).toBeInstanceOf(Error);
        expect(store.getPin('media.test')).toBeNull();
    });

    it('should return the pin mismatch from the identity check', async () => {
        const store = createStore();
        await store.initialize();
        store.verify('media.test', cert('P1'));
        const check = store.createServerIdentityCheck();

        const error = check('media.test', {
            subject: { CN: 'media.test' },
            subjectaltname: 'DNS:media.test',
            raw: Buffer.from('P2'),
        } as unknown as Parameters<typeof check>[1]);

        expect(error).toBeInstanceOf(ServerApiError);
        expect(error).toMatchObject({ code: AppErrorCode.CERTIFICATE_PIN_MISMATCH });
    });
});

describe('hashPublicKey', () => {
    it('should produce the base64 SHA-256 of the SPKI DER', () => {
        const { publicKey } = generateKeyPairSync('ec', { namedCurve: 'P-256' });
        const der = publicKey.export({ type: 'spki', format: 'der' });
        const expected = createHash('sha256').update(der).digest('base64');

        expect(hashPublicKey(der)).toBe(expected);
        expect(Buffer.from(expected, 'base64')).toHaveLength(32);
    });
});
