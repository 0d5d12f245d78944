/**
 * @fileoverview Cache of authenticated clients keyed by server URL and token.
 * @module modules/transport/ClientCache
 * @version 1.0.0
 */

import { createHash } from 'node:crypto';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import { TRANSPORT_CONSTANTS } from './constants';
import type { ClientCacheConfig, ClientCacheStats, IClientCache, IServerClient } from './interfaces';
import { ServerClient } from './ServerClient';

interface CachedClient {
    cacheKey: string;
    client: IServerClient;
    createdAt: number;
    lastUsedAt: number;
}

/**
 * Hash of (server URL, token). Tokens never appear in keys or logs.
 */
export function clientCacheKey(serverUrl: string, accessToken: string): string {
    return createHash('sha256').update(`${serverUrl}\n${accessToken}`).digest('hex');
}

/**
 * LRU cache of authenticated clients.
 * Map insertion order tracks recency: a hit moves the entry to the end.
 */
export class ClientCache implements IClientCache {
    private readonly _entries = new Map<string, CachedClient>();
    private readonly _maxEntries: number;
    private readonly _now: () => number;
    private readonly _logger: Logger;
    private readonly _createClient: (serverUrl: string, accessToken: string) => IServerClient;
    private _hits = 0;
    private _misses = 0;
    private _evictions = 0;

    constructor(config: ClientCacheConfig) {
        this._maxEntries = Math.max(1, config.maxEntries ?? TRANSPORT_CONSTANTS.CLIENT_CACHE_MAX_ENTRIES);
        this._now = config.now ?? Date.now;
        this._logger = config.logger ?? DEFAULT_LOGGER;
        this._createClient = config.createClient ??
            ((serverUrl, accessToken) => new ServerClient(config.transport, serverUrl, config.identity, accessToken));
    }

    public get size(): number {
        return this._entries.size;
    }

    /**
     * Get the client bound to a server and token, creating it on first use.
     * The least recently used entry is evicted past the size limit.
     */
    public acquire(serverUrl: string, accessToken: string): IServerClient {
        const cacheKey = clientCacheKey(serverUrl, accessToken);
        const now = this._now();
        const existing = this._entries.get(cacheKey);
        if (existing) {
            this._hits++;
            existing.lastUsedAt = now;
            this._entries.delete(cacheKey);
            this._entries.set(cacheKey, existing);
            return existing.client;
        }

        this._misses++;
        const entry: CachedClient = {
            cacheKey,
            client: this._createClient(serverUrl, accessToken),
            createdAt: now,
            lastUsedAt: now,
        };
        this._entries.set(cacheKey, entry);
        this._evictOverflow();
        return entry.client;
    }

    public invalidate(serverUrl: string, accessToken: string): boolean {
        const removed = this._entries.delete(clientCacheKey(serverUrl, accessToken));
        if (removed) {
            this._logger.debug(`[ClientCache] Invalidated client for ${serverUrl}`);
        }
        return removed;
    }

    public clear(): void {
        this._entries.clear();
    }

    public stats(): ClientCacheStats {
        return {
            size: this._entries.size,
            hits: this._hits,
            misses: this._misses,
            evictions: this._evictions,
        };
    }

    private _evictOverflow(): void {
        while (this._entries.size > this._maxEntries) {
            const oldest = this._entries.keys().next();
            if (oldest.done) return;
            this._entries.delete(oldest.value);
            this._evictions++;
        }
    }
}
