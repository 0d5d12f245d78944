/**
 * @fileoverview Server connection - wires the session core for one server identity.
 * @module core/ServerConnection
 * @version 1.0.0
 *
 * Construction order follows the dependency graph, leaves first:
 * preferences, config, trust store, transport, retry policy, client cache,
 * discovery, token exchange, session manager, auth coordinator.
 */

import type { Dispatcher } from 'undici';
import { ResilienceConfig, resolveResilienceConfig, savePersistedOverrides } from '../config/ResilienceConfig';
import { EndpointDiscoverer } from '../modules/discovery/EndpointDiscoverer';
import type { DiscoveryResult, EndpointProbeResult } from '../modules/discovery/types';
import { RetryPolicy } from '../modules/retry/RetryPolicy';
import { CertificateTrustStore } from '../modules/security/CertificateTrustStore';
import { EncryptedPreferences } from '../modules/security/EncryptedPreferences';
import type { Pin } from '../modules/security/types';
import { AuthCoordinator } from '../modules/session/AuthCoordinator';
import { getOrCreateDeviceId } from '../modules/session/helpers';
import { SessionManager } from '../modules/session/SessionManager';
import { TokenExchange } from '../modules/session/TokenExchange';
import type {
    Credentials,
    LogoutOptions,
    QuickConnectRequest,
    QuickConnectStatus,
    RefreshState,
    ServerSession,
    SessionEvents,
} from '../modules/session/types';
import { ClientCache } from '../modules/transport/ClientCache';
import { HttpTransport } from '../modules/transport/HttpTransport';
import type { ClientIdentity, FetchLike, PipelineStage, ServerRequest, ServerResponse } from '../modules/transport/types';
import type { IDisposable, Logger } from '../utils/interfaces';
import { DEFAULT_LOGGER } from '../utils/logger';
import type { StorageLike } from '../utils/storage';

export interface ServerConnectionConfig {
    /** Backing store for encrypted preferences */
    storage: StorageLike;
    /** 32-byte AES key; see EncryptedPreferences.deriveKey */
    encryptionKey: Uint8Array;
    /** Application name, device name and version sent to the server */
    client: Omit<ClientIdentity, 'deviceId'>;
    /** Overrides applied on top of defaults and persisted overrides */
    config?: Partial<ResilienceConfig>;
    isMeteredConnection?: () => boolean;
    /** Extra transport stages, appended after the built-in ones */
    stages?: PipelineStage[];
    fetch?: FetchLike;
    /** Replaces the pinning agent */
    dispatcher?: Dispatcher;
    random?: () => number;
    now?: () => number;
    logger?: Logger;
}

/**
 * Inbound API of the session core.
 *
 * @example
 * ```typescript
 * const connection = new ServerConnection({
 *     storage: new FileStorage('./prefs.json'),
 *     encryptionKey: EncryptedPreferences.deriveKey(passphrase, salt),
 *     client: { client: 'Living Room', device: 'tv', version: '1.0.0' },
 * });
 * await connection.login('media.local', { username, password });
 * const me = await connection.execute({ path: '/Users/Me' });
 * ```
 */
export class ServerConnection {
    public readonly config: ResilienceConfig;

    private readonly _preferences: EncryptedPreferences;
    private readonly _trustStore: CertificateTrustStore;
    private readonly _transport: HttpTransport;
    private readonly _retryPolicy: RetryPolicy;
    private readonly _discoverer: EndpointDiscoverer;
    private readonly _tokenExchange: TokenExchange;
    private readonly _sessionManager: SessionManager;
    private readonly _coordinator: AuthCoordinator;
    private readonly _logger: Logger;

    constructor(options: ServerConnectionConfig) {
        const logger = options.logger ?? DEFAULT_LOGGER;
        const now = options.now ?? Date.now;
        this._logger = logger;

        this._preferences = new EncryptedPreferences({
            storage: options.storage,
            key: options.encryptionKey,
            logger,
        });
        this.config = resolveResilienceConfig({
            preferences: this._preferences,
            ...(options.config ? { overrides: options.config } : {}),
            logger,
        });

        this._trustStore = new CertificateTrustStore({ preferences: this._preferences, logger, now });
        this._transport = new HttpTransport({
            trustStore: this._trustStore,
            requestTimeoutMs: this.config.requestTimeoutMs,
            logger,
            ...(options.fetch ? { fetch: options.fetch } : {}),
            ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
            ...(options.stages ? { stages: options.stages } : {}),
        });
        const retryPolicy = new RetryPolicy({
            maxAttempts: this.config.maxRetryAttempts,
            logger,
            ...(options.random ? { random: options.random } : {}),
        });

        const identity: ClientIdentity = {
            ...options.client,
            deviceId: getOrCreateDeviceId(this._preferences, logger),
        };
        const clientCache = new ClientCache({ transport: this._transport, identity, now, logger });

        this._discoverer = new EndpointDiscoverer({
            transport: this._transport,
            retryPolicy,
            identity,
            batchSize: this.config.discoveryBatchSize,
            probeTimeoutMs: this.config.probeTimeoutMs,
            meteredProbeTimeoutMultiplier: this.config.meteredProbeTimeoutMultiplier,
            probeMaxAttempts: this.config.probeMaxAttempts,
            now,
            logger,
            ...(options.isMeteredConnection ? { isMeteredConnection: options.isMeteredConnection } : {}),
        });
        this._tokenExchange = new TokenExchange({
            transport: this._transport,
            identity,
            defaultValidityMs: this.config.defaultTokenValidityMs,
            logger,
        });
        this._sessionManager = new SessionManager({
            tokenExchange: this._tokenExchange,
            clientCache,
            retryPolicy,
            preferences: this._preferences,
            trustStore: this._trustStore,
            proactiveRefreshFraction: this.config.proactiveRefreshFraction,
            refreshTimeoutMs: this.config.refreshTimeoutMs,
            clearPinsOnLogout: this.config.clearPinsOnLogout,
            now,
            logger,
        });
        this._retryPolicy = retryPolicy;
        this._coordinator = new AuthCoordinator({
            sessionManager: this._sessionManager,
            clientCache,
            retryPolicy,
            maxAttempts: this.config.maxRetryAttempts,
            logger,
        });
    }

    public get session(): ServerSession | null {
        return this._sessionManager.session;
    }

    public get refreshState(): RefreshState | null {
        return this._sessionManager.refreshState;
    }

    public on<K extends keyof SessionEvents>(
        event: K,
        handler: (payload: SessionEvents[K]) => void
    ): IDisposable {
        return this._sessionManager.on(event, handler);
    }

    /**
     * Resolve the address to a reachable endpoint and sign in there.
     *
     * @param address - Hostname, host:port or URL as typed by the user
     * @param credentials - Username and password
     * @param signal - Aborts discovery and the token exchange
     * @returns The new session
     * @throws ServerApiError from discovery, pinning or the token exchange
     */
    public async login(address: string, credentials: Credentials, signal?: AbortSignal): Promise<ServerSession> {
        const baseUrl = await this._resolve(address, signal);
        return this._sessionManager.login(baseUrl, credentials, signal);
    }

    /**
     * Resolve the address and start a Quick Connect request. Show `code` to the
     * user, poll {@link getQuickConnectState} until it reads 'approved', then
     * call {@link loginWithQuickConnect}.
     *
     * @throws ServerApiError with ACCESS_DENIED when Quick Connect is disabled on the server
     */
    public async initiateQuickConnect(address: string, signal?: AbortSignal): Promise<QuickConnectRequest> {
        const serverUrl = await this._resolve(address, signal);
        const challenge = await this._retryPolicy.execute(
            () => this._tokenExchange.initiateQuickConnect(serverUrl, signal),
            {
                ...(signal ? { signal } : {}),
                hostname: new URL(serverUrl).hostname,
                operationName: 'quick connect',
            }
        );
        return { ...challenge, serverUrl };
    }

    public async getQuickConnectState(request: QuickConnectRequest, signal?: AbortSignal): Promise<QuickConnectStatus> {
        await this._trustStore.initialize();
        return this._tokenExchange.getQuickConnectState(request.serverUrl, request.secret, signal);
    }

    /**
     * Sign in with an approved Quick Connect request.
     * The session cannot refresh itself; when its token runs out the user signs in again.
     */
    public async loginWithQuickConnect(request: QuickConnectRequest, signal?: AbortSignal): Promise<ServerSession> {
        await this._trustStore.initialize();
        return this._sessionManager.loginWithQuickConnect(request.serverUrl, request.secret, signal);
    }

    /**
     * Discovery only, without signing in.
     */
    public async discover(address: string, signal?: AbortSignal): Promise<DiscoveryResult> {
        await this._trustStore.initialize();
        return this._discoverer.discover(address, signal);
    }

    public async testEndpoint(url: string, signal?: AbortSignal): Promise<EndpointProbeResult | null> {
        await this._trustStore.initialize();
        return this._discoverer.testEndpoint(url, signal);
    }

    /**
     * Send an authenticated request. A rejected token is refreshed once, transparently.
     * @throws ServerApiError classified per the error taxonomy
     */
    public execute(request: ServerRequest): Promise<ServerResponse> {
        return this._coordinator.execute(request);
    }

    /**
     * Cancel discovery and in-flight requests, then clear the session.
     * @param options - `clearPins` also forgets the server's certificate pin
     */
    public async logout(options: LogoutOptions = {}): Promise<void> {
        this._discoverer.cancel();
        await this._sessionManager.logout(options);
        await this._trustStore.flush();
    }

    /**
     * Reload the persisted session, if any.
     */
    public async restore(serverUrl?: string): Promise<ServerSession | null> {
        await this._trustStore.initialize();
        return this._sessionManager.restore(serverUrl);
    }

    public getPinnedCertificates(): Pin[] {
        return this._trustStore.getPinnedCertificates();
    }

    public revokePin(hostname: string): Promise<boolean> {
        return this._trustStore.revokePin(hostname);
    }

    /**
     * Validate and persist config overrides. They apply from the next construction.
     */
    public saveConfigOverrides(overrides: Partial<ResilienceConfig>): Partial<ResilienceConfig> {
        return savePersistedOverrides(this._preferences, overrides, this._logger);
    }

    /**
     * Stop timers and in-flight work, then close pooled connections.
     * Persisted state is kept for the next restore.
     */
    public async dispose(): Promise<void> {
        this._discoverer.cancel();
        this._sessionManager.dispose();
        try {
            await this._trustStore.flush();
        } finally {
            await this._transport.close();
        }
    }

    private async _resolve(address: string, signal: AbortSignal | undefined): Promise<string> {
        await this._trustStore.initialize();
        const discovery = await this._discoverer.discover(address, signal);
        this._logger.info(
            `[ServerConnection] Using ${discovery.baseUrl} (${discovery.server.name}, ${discovery.latencyMs}ms)`
        );
        return discovery.baseUrl;
    }
}
