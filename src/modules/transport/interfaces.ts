/**
 * @fileoverview Interface definitions for the HTTP transport.
 * @module modules/transport/interfaces
 * @version 1.0.0
 */

import type { Dispatcher } from 'undici';
import type { ICertificateTrustStore } from '../security/interfaces';
import type { Logger } from '../../utils/interfaces';
import type {
    ClientIdentity,
    FetchLike,
    PipelineStage,
    ServerRequest,
    ServerResponse,
    TransportRequest,
} from './types';

export interface HttpTransportConfig {
    /** Pins are enforced on every TLS handshake when provided */
    trustStore?: ICertificateTrustStore;
    /** Defaults to undici's fetch */
    fetch?: FetchLike;
    /** Replaces the pinning agent built from the trust store */
    dispatcher?: Dispatcher;
    /** Extra stages appended after the built-in ones */
    stages?: PipelineStage[];
    /** Headers added to every request */
    defaultHeaders?: Record<string, string>;
    requestTimeoutMs?: number;
    logger?: Logger;
}

/**
 * Sends requests through the stage pipeline and the pinned connection pool.
 */
export interface IHttpTransport {
    /**
     * Send a request. Non-2xx statuses resolve normally.
     * @throws ServerApiError for transport failures, timeouts and cancellation
     */
    send(request: TransportRequest): Promise<ServerResponse>;

    /**
     * Append a stage to the pipeline.
     */
    use(stage: PipelineStage): void;

    readonly defaultTimeoutMs: number;

    /**
     * Close pooled connections.
     */
    close(): Promise<void>;
}

/**
 * HTTP client bound to one server URL and one access token.
 */
export interface IServerClient {
    readonly serverUrl: string;

    /**
     * Send an authenticated request.
     * @throws ServerApiError for non-2xx statuses and transport failures
     */
    request(request: ServerRequest): Promise<ServerResponse>;
}

export interface ClientCacheConfig {
    transport: IHttpTransport;
    identity: ClientIdentity;
    maxEntries?: number;
    now?: () => number;
    logger?: Logger;
    /** Client factory; defaults to ServerClient */
    createClient?: (serverUrl: string, accessToken: string) => IServerClient;
}

export interface ClientCacheStats {
    size: number;
    hits: number;
    misses: number;
    evictions: number;
}

/**
 * Cache of authenticated clients keyed by a hash of (server URL, token).
 */
export interface IClientCache {
    /**
     * Cached client for the pair, created on first use.
     */
    acquire(serverUrl: string, accessToken: string): IServerClient;

    /**
     * @returns true if an entry was removed
     */
    invalidate(serverUrl: string, accessToken: string): boolean;

    clear(): void;

    readonly size: number;

    stats(): ClientCacheStats;
}
