/**
 * @fileoverview Key-value storage backends and safe access helpers.
 * @module utils/storage
 * @version 1.0.0
 *
 * Backends follow the Web Storage shape so the same code runs against
 * an in-memory map, a JSON file, or a host-provided store.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Minimal synchronous key-value store (Web Storage shape).
 */
export interface StorageLike {
    readonly length: number;
    key(index: number): string | null;
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
    removeItem(key: string): void;
    clear(): void;
}

/**
 * In-memory storage. Contents are lost when the process exits.
 */
export class MemoryStorage implements StorageLike {
    private _store = new Map<string, string>();

    public get length(): number {
        return this._store.size;
    }

    public key(index: number): string | null {
        const keys = Array.from(this._store.keys());
        return keys[index] ?? null;
    }

    public getItem(key: string): string | null {
        return this._store.get(key) ?? null;
    }

    public setItem(key: string, value: string): void {
        this._store.set(key, value);
    }

    public removeItem(key: string): void {
        this._store.delete(key);
    }

    public clear(): void {
        this._store.clear();
    }
}

/**
 * Storage persisted to a single JSON file.
 * The whole map is rewritten on every mutation; values are expected to be small.
 */
export class FileStorage implements StorageLike {
    private readonly _filePath: string;
    private _store: Map<string, string>;

    constructor(filePath: string) {
        this._filePath = filePath;
        this._store = FileStorage._load(filePath);
    }

    public get length(): number {
        return this._store.size;
    }

    public key(index: number): string | null {
        const keys = Array.from(this._store.keys());
        return keys[index] ?? null;
    }

    public getItem(key: string): string | null {
        return this._store.get(key) ?? null;
    }

    public setItem(key: string, value: string): void {
        this._store.set(key, value);
        this._flush();
    }

    public removeItem(key: string): void {
        if (this._store.delete(key)) {
            this._flush();
        }
    }

    public clear(): void {
        this._store.clear();
        this._flush();
    }

    private _flush(): void {
        fs.mkdirSync(path.dirname(this._filePath), { recursive: true });
        const tmpPath = `${this._filePath}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(Object.fromEntries(this._store)), {
            encoding: 'utf8',
            mode: 0o600,
        });
        fs.renameSync(tmpPath, this._filePath);
    }

    private static _load(filePath: string): Map<string, string> {
        const store = new Map<string, string>();
        if (!fs.existsSync(filePath)) {
            return store;
        }
        const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
            return store;
        }
        for (const [key, value] of Object.entries(parsed)) {
            if (typeof value === 'string') {
                store.set(key, value);
            }
        }
        return store;
    }
}

// Helpers below treat storage as optional and never throw.

export function safeStorageGet(storage: StorageLike, key: string): string | null {
    try {
        return storage.getItem(key);
    } catch {
        return null;
    }
}

export function safeStorageSet(storage: StorageLike, key: string, value: string): boolean {
    try {
        storage.setItem(key, value);
        return true;
    } catch {
        return false;
    }
}

export function safeStorageRemove(storage: StorageLike, key: string): boolean {
    try {
        storage.removeItem(key);
        return true;
    } catch {
        return false;
    }
}

/**
 * Keys starting with the prefix. Returns an empty list if storage is unavailable.
 */
export function listKeysWithPrefix(storage: StorageLike, prefix: string): string[] {
    const keys: string[] = [];
    try {
        for (let i = 0; i < storage.length; i++) {
            const k = storage.key(i);
            if (typeof k === 'string' && k.startsWith(prefix)) {
                keys.push(k);
            }
        }
    } catch {
        return [];
    }
    return keys;
}
