/**
 * @fileoverview Unit tests for storage backends and safe helpers.
 * @module utils/__tests__/storage.test
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
    FileStorage,
    MemoryStorage,
    StorageLike,
    listKeysWithPrefix,
    safeStorageGet,
    safeStorageSet,
} from '../storage';

function brokenStorage(): StorageLike {
    const fail = (): never => {
        throw new Error('storage unavailable');
    };
    return {
        get length(): number {
            return fail();
        },
        key: fail,
        getItem: fail,
        setItem: fail,
        removeItem: fail,
        clear: fail,
    };
}

describe('MemoryStorage', () => {
    it('should list keys by prefix', () => {
        const storage = new MemoryStorage();
        storage.setItem('msc_session:a', '1');
        storage.setItem('msc_device_id', '2');
        storage.setItem('msc_session:b', '3');

        expect(listKeysWithPrefix(storage, 'msc_session:')).toEqual(['msc_session:a', 'msc_session:b']);
    });
});

describe('FileStorage', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'msc-storage-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should persist values across instances', () => {
        const file = path.join(dir, 'nested', 'prefs.json');
        const first = new FileStorage(file);
        first.setItem('a', '1');
        first.setItem('b', '2');
        first.removeItem('a');

        const second = new FileStorage(file);

        expect(second.getItem('a')).toBeNull();
        expect(second.getItem('b')).toBe('2');
        expect(second.length).toBe(1);
    });
});

describe('safe storage helpers', () => {
    it('should not throw when the backend fails', () => {
        const storage = brokenStorage();

        expect(safeStorageGet(storage, 'a')).toBeNull();
        expect(safeStorageSet(storage, 'a', '1')).toBe(false);
        expect(listKeysWithPrefix(storage, '')).toEqual([]);
    });
});
