/**
 * @fileoverview Session state machine with single-flight and proactive token refresh.
 * @module modules/session/SessionManager
 * @version 1.0.0
 */

import { SESSION_STORAGE_KEYS } from '../../config/storageKeys';
import { AppErrorCode, ServerApiError, createCancelledError } from '../../types/app-errors';
import { linkAbortSignals, raceWithSignal } from '../../utils/abort';
import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable, Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import { normalizeTransportError } from '../retry/errorMapping';
import type { IRetryPolicy } from '../retry/interfaces';
import type { ICertificateTrustStore, IEncryptedPreferences } from '../security/interfaces';
import type { IClientCache } from '../transport/interfaces';
import { SESSION_CONSTANTS, SESSION_ERROR_MESSAGES } from './constants';
import {
    StoredSession,
    credentialsStorageKey,
    parseStoredCredentials,
    parseStoredSession,
    sessionStorageKey,
} from './helpers';
import type { ISessionManager, ITokenExchange, PendingRefresh, SessionManagerConfig } from './interfaces';
import {
    Credentials,
    LogoutOptions,
    RefreshReason,
    RefreshState,
    ServerSession,
    SessionEvents,
    TokenGrant,
} from './types';

/** setTimeout's upper bound */
const MAX_TIMER_DELAY_MS = 2147483647;

/**
 * Session manager for one server identity.
 *
 * Owns the ServerSession and is the only writer of it. Refreshes go through a
 * single PendingRefresh slot: the first caller installs it, concurrent callers
 * attach to the same promise, and the slot is cleared in the same step that
 * publishes the outcome.
 *
 * @example
 * ```typescript
 * const session = await sessionManager.login('https://media.local:8096', { username, password });
 * sessionManager.on('refreshFailed', ({ error }) => showLogin(error.message));
 * ```
 */
export class SessionManager implements ISessionManager {
    private readonly _tokenExchange: ITokenExchange;
    private readonly _clientCache: IClientCache;
    private readonly _retryPolicy: IRetryPolicy;
    private readonly _preferences: IEncryptedPreferences;
    private readonly _trustStore: Pick<ICertificateTrustStore, 'revokePin'> | undefined;
    private readonly _fraction: number;
    private readonly _refreshTimeoutMs: number;
    private readonly _maxRefreshAttempts: number | undefined;
    private readonly _clearPinsOnLogout: boolean;
    private readonly _now: () => number;
    private readonly _logger: Logger;
    private readonly _emitter: EventEmitter<SessionEvents>;

    private _session: ServerSession | null = null;
    private _credentials: Credentials | null = null;
    private _pending: PendingRefresh | null = null;
    private _proactiveTimer: ReturnType<typeof setTimeout> | null = null;
    private _sessionController = new AbortController();
    private _generation = 0;

    constructor(config: SessionManagerConfig) {
        this._tokenExchange = config.tokenExchange;
        this._clientCache = config.clientCache;
        this._retryPolicy = config.retryPolicy;
        this._preferences = config.preferences;
        this._trustStore = config.trustStore;
        this._fraction = config.proactiveRefreshFraction ?? SESSION_CONSTANTS.PROACTIVE_REFRESH_FRACTION;
        this._refreshTimeoutMs = config.refreshTimeoutMs ?? SESSION_CONSTANTS.REFRESH_TIMEOUT_MS;
        this._maxRefreshAttempts = config.maxRefreshAttempts;
        this._clearPinsOnLogout = config.clearPinsOnLogout ?? false;
        this._now = config.now ?? Date.now;
        this._logger = config.logger ?? DEFAULT_LOGGER;
        this._emitter = new EventEmitter<SessionEvents>(this._logger);
    }

    // ============================================
    // State
    // ============================================

    public get session(): ServerSession | null {
        return this._session ? { ...this._session } : null;
    }

    public get refreshState(): RefreshState | null {
        return this._session ? this._session.refreshState : null;
    }

    public get sessionSignal(): AbortSignal {
        return this._sessionController.signal;
    }

    public on<K extends keyof SessionEvents>(
        event: K,
        handler: (payload: SessionEvents[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    // ============================================
    // Login / logout
    // ============================================

    /**
     * Exchange credentials for a token and install a new Idle session.
     * Replaces any previous session and cancels its pending refresh.
     *
     * @param serverUrl - Base URL of the server
     * @param credentials - Username and password; the password may be empty
     * @param signal - Aborts the exchange; a logout aborts it as well
     * @returns Copy of the new session
     * @throws ServerApiError with AUTH_INVALID_CREDENTIALS, a transport error, or CANCELLED
     */
    public login(serverUrl: string, credentials: Credentials, signal?: AbortSignal): Promise<ServerSession> {
        return this._establish(
            serverUrl,
            (baseUrl, linked) => this._tokenExchange.authenticate(baseUrl, credentials, linked),
            credentials,
            signal
        );
    }

    /**
     * Redeem an approved Quick Connect secret and install a new Idle session.
     * No password is kept, so a refresh of this session ends in Failed and the
     * user has to sign in again.
     *
     * @param serverUrl - Base URL of the server the request was started on
     * @param secret - Secret returned when the request was initiated
     * @param signal - Aborts the exchange
     * @returns Copy of the new session
     * @throws ServerApiError with AUTH_INVALID_CREDENTIALS, a transport error, or CANCELLED
     */
    public loginWithQuickConnect(serverUrl: string, secret: string, signal?: AbortSignal): Promise<ServerSession> {
        return this._establish(
            serverUrl,
            (baseUrl, linked) => this._tokenExchange.authenticateWithQuickConnect(baseUrl, secret, linked),
            null,
            signal
        );
    }

    /**
     * End the session: aborts in-flight work tied to it, clears cached clients
     * and removes the persisted token and credentials.
     *
     * @param options - `clearPins` also revokes the server's certificate pin
     */
    public async logout(options: LogoutOptions = {}): Promise<void> {
        this._generation++;
        this._sessionController.abort();
        this._cancelPending();
        this._clearProactiveTimer();

        const session = this._session;
        this._session = null;
        this._credentials = null;
        this._clientCache.clear();

        if (!session) {
            return;
        }
        this._preferences.remove(sessionStorageKey(session.serverUrl));
        this._preferences.remove(credentialsStorageKey(session.serverUrl));

        const hostname = hostnameOf(session.serverUrl);
        if ((options.clearPins ?? this._clearPinsOnLogout) && this._trustStore && hostname) {
            await this._trustStore.revokePin(hostname);
        }

        this._logger.info(`[SessionManager] Logged out of ${hostname ?? session.serverUrl}`);
        this._emitter.emit('sessionEnd', { reason: 'logout' });
    }

    /**
     * Reload a persisted session. An unreadable record is removed.
     *
     * @param serverUrl - Server to restore; the first persisted session when omitted
     * @returns Copy of the restored session, or null
     */
    public restore(serverUrl?: string): ServerSession | null {
        const key = serverUrl
            ? sessionStorageKey(serverUrl)
            : this._preferences.keys(SESSION_STORAGE_KEYS.SESSION_PREFIX)[0];
        if (!key) {
            return null;
        }

        let stored: StoredSession | null;
        let credentials: Credentials | null = null;
        try {
            stored = parseStoredSession(this._preferences.getJson(key));
            if (stored) {
                credentials = parseStoredCredentials(
                    this._preferences.getJson(credentialsStorageKey(stored.serverUrl))
                );
            }
        } catch (error) {
            if (!(error instanceof ServerApiError)) {
                throw error;
            }
            stored = null;
        }
        if (!stored) {
            this._logger.warn(`[SessionManager] Discarding unreadable persisted session: ${key}`);
            this._preferences.remove(key);
            return null;
        }

        this._generation++;
        this._cancelPending();
        if (this._sessionController.signal.aborted) {
            this._sessionController = new AbortController();
        }

        const session: ServerSession = {
            serverUrl: stored.serverUrl,
            serverId: stored.serverId,
            userId: stored.userId,
            userName: stored.userName,
            accessToken: stored.accessToken,
            tokenIssuedAt: stored.tokenIssuedAt,
            tokenValidityWindow: stored.tokenValidityWindow,
            refreshState: RefreshState.Idle,
        };
        this._session = session;
        this._credentials = credentials;
        if (!credentials) {
            this._logger.warn('[SessionManager] Restored session has no stored credentials; refresh will end the session');
        }
        this._scheduleProactiveRefresh();
        this._logger.info(`[SessionManager] Restored session for ${hostnameOf(session.serverUrl) ?? session.serverUrl}`);
        this._emitTokenChange(session, 'restore');
        return { ...session };
    }

    public dispose(): void {
        this._generation++;
        this._sessionController.abort();
        this._cancelPending();
        this._clearProactiveTimer();
        this._emitter.removeAllListeners();
    }

    // ============================================
    // Refresh
    // ============================================

    /**
     * Refresh the token. Concurrent callers share one episode.
     *
     * @param reason - What started the refresh
     * @param staleToken - Token the caller saw rejected; when it was already replaced
     *   the current session is returned without a network call
     * @returns Copy of the session holding the new token
     * @throws ServerApiError with AUTH_REQUIRED, AUTH_EXPIRED (session is then Failed) or CANCELLED
     */
    public refresh(reason: RefreshReason, staleToken?: string): Promise<ServerSession> {
        const session = this._session;
        if (!session) {
            return Promise.reject(authRequiredError());
        }
        if (session.refreshState === RefreshState.Failed) {
            return Promise.reject(authExpiredError(session));
        }
        if (staleToken !== undefined && staleToken !== session.accessToken) {
            // The episode that replaced staleToken has already completed.
            return Promise.resolve({ ...session });
        }
        if (this._pending) {
            this._pending.waiters++;
            return this._pending.promise;
        }
        return this._startRefresh(reason, session).promise;
    }

    /**
     * Return a session whose token is inside its lead time, waiting for a
     * pending refresh or starting a proactive one when needed.
     *
     * @param signal - Stops waiting; the shared refresh itself keeps running
     * @throws ServerApiError with AUTH_REQUIRED, AUTH_EXPIRED or CANCELLED
     */
    public async ensureFresh(signal?: AbortSignal): Promise<ServerSession> {
        const session = this._session;
        const onAbort = (): ServerApiError => createCancelledError(session ? hostnameOf(session.serverUrl) : undefined);
        if (signal?.aborted) {
            throw onAbort();
        }
        if (!session) {
            throw authRequiredError();
        }
        if (session.refreshState === RefreshState.Failed) {
            throw authExpiredError(session);
        }
        if (this._pending) {
            this._pending.waiters++;
            return raceWithSignal(this._pending.promise, signal, onAbort);
        }
        if (this._now() >= this._refreshDueAt(session)) {
            return raceWithSignal(this.refresh('proactive'), signal, onAbort);
        }
        return { ...session };
    }

    // ============================================
    // Private helpers
    // ============================================

    private async _establish(
        serverUrl: string,
        exchange: (baseUrl: string, signal: AbortSignal) => Promise<TokenGrant>,
        credentials: Credentials | null,
        signal: AbortSignal | undefined
    ): Promise<ServerSession> {
        const generation = ++this._generation;
        const baseUrl = serverUrl.trim().replace(/\/+$/, '');
        const hostname = hostnameOf(baseUrl);
        if (this._sessionController.signal.aborted) {
            this._sessionController = new AbortController();
        }
        const linked = linkAbortSignals([signal, this._sessionController.signal]);

        let grant: TokenGrant;
        try {
            grant = await this._retryPolicy.execute(
                () => exchange(baseUrl, linked.signal),
                { signal: linked.signal, hostname, operationName: 'login' }
            );
        } finally {
            linked.dispose();
        }
        if (generation !== this._generation) {
            throw createCancelledError(hostname);
        }

        const previous = this._session;
        this._cancelPending();
        if (previous && previous.accessToken) {
            this._clientCache.invalidate(previous.serverUrl, previous.accessToken);
        }

        const session: ServerSession = {
            serverUrl: baseUrl,
            serverId: grant.serverId,
            userId: grant.userId,
            userName: grant.userName,
            accessToken: grant.accessToken,
            tokenIssuedAt: this._now(),
            tokenValidityWindow: grant.validityMs,
            refreshState: RefreshState.Idle,
        };
        this._session = session;
        this._credentials = credentials ? { ...credentials } : null;
        this._persistSession(session);
        if (credentials) {
            this._persistCredentials(session.serverUrl, credentials);
        } else {
            this._preferences.remove(credentialsStorageKey(session.serverUrl));
        }
        this._scheduleProactiveRefresh();

        this._logger.info(`[SessionManager] Logged in as '${session.userName}' on ${hostname ?? baseUrl}`);
        if (previous && previous.refreshState !== RefreshState.Idle) {
            this._emitter.emit('stateChange', { previous: previous.refreshState, current: RefreshState.Idle });
        }
        this._emitTokenChange(session, 'login');
        return { ...session };
    }

    private _startRefresh(reason: RefreshReason, session: ServerSession): PendingRefresh {
        const hostname = hostnameOf(session.serverUrl);
        const controller = new AbortController();
        this._setState(session, RefreshState.Refreshing);

        const run = this._runRefresh(reason, session, controller);
        const pending: PendingRefresh = {
            reason,
            promise: raceWithSignal(run, controller.signal, () => createCancelledError(hostname)),
            controller,
            waiters: 1,
            staleToken: session.accessToken,
            startedAt: this._now(),
        };
        this._pending = pending;
        return pending;
    }

    private async _runRefresh(
        reason: RefreshReason,
        session: ServerSession,
        controller: AbortController
    ): Promise<ServerSession> {
        const hostname = hostnameOf(session.serverUrl);
        const credentials = this._credentials;
        const linked = linkAbortSignals([controller.signal], this._refreshTimeoutMs);
        this._logger.info(`[SessionManager] Refreshing token (${reason})`);

        try {
            if (!credentials) {
                throw new ServerApiError(AppErrorCode.AUTH_EXPIRED, 'No stored credentials for re-authentication', {
                    hostname,
                });
            }
            const grant = await this._retryPolicy.execute(
                () => this._tokenExchange.authenticate(session.serverUrl, credentials, linked.signal),
                {
                    ...(this._maxRefreshAttempts !== undefined ? { maxAttempts: this._maxRefreshAttempts } : {}),
                    signal: linked.signal,
                    hostname,
                    operationName: 'token refresh',
                }
            );
            if (controller.signal.aborted || this._session !== session) {
                throw createCancelledError(hostname);
            }
            return this._applyGrant(session, grant, reason);
        } catch (error) {
            if (controller.signal.aborted || this._session !== session) {
                throw createCancelledError(hostname);
            }
            const failure = linked.timedOut()
                ? new ServerApiError(AppErrorCode.TIMEOUT, 'Token refresh timed out', { hostname, cause: error })
                : normalizeTransportError(error, hostname);
            throw this._failRefresh(session, failure);
        } finally {
            linked.dispose();
            if (this._pending?.controller === controller) {
                this._pending = null;
            }
        }
    }

    private _applyGrant(session: ServerSession, grant: TokenGrant, reason: RefreshReason): ServerSession {
        const next: ServerSession = {
            ...session,
            accessToken: grant.accessToken,
            userId: grant.userId || session.userId,
            userName: grant.userName || session.userName,
            serverId: grant.serverId || session.serverId,
            tokenIssuedAt: this._now(),
            tokenValidityWindow: grant.validityMs,
            refreshState: RefreshState.Idle,
        };
        this._session = next;
        this._clientCache.invalidate(session.serverUrl, session.accessToken);
        this._persistSession(next);
        this._scheduleProactiveRefresh();

        this._logger.info(`[SessionManager] Token refreshed (${reason})`);
        this._emitter.emit('stateChange', { previous: RefreshState.Refreshing, current: RefreshState.Idle });
        this._emitTokenChange(next, reason);
        return { ...next };
    }

    private _failRefresh(session: ServerSession, failure: ServerApiError): ServerApiError {
        this._clientCache.invalidate(session.serverUrl, session.accessToken);
        session.accessToken = '';
        this._setState(session, RefreshState.Failed);
        this._clearProactiveTimer();

        const error = new ServerApiError(AppErrorCode.AUTH_EXPIRED, SESSION_ERROR_MESSAGES.AUTH_EXPIRED, {
            hostname: failure.hostname,
            attempts: failure.attempts,
            httpStatus: failure.httpStatus,
            cause: failure,
        });
        this._logger.error(`[SessionManager] Token refresh failed: ${failure.code}`);
        this._emitter.emit('refreshFailed', { error: error.toAppError() });
        return error;
    }

    private _setState(session: ServerSession, state: RefreshState): void {
        const previous = session.refreshState;
        if (previous === state) return;
        session.refreshState = state;
        this._emitter.emit('stateChange', { previous, current: state });
    }

    private _cancelPending(): void {
        const pending = this._pending;
        if (!pending) return;
        this._pending = null;
        this._logger.debug(`[SessionManager] Cancelling refresh with ${pending.waiters} waiter(s)`);
        pending.controller.abort();
    }

    private _refreshDueAt(session: ServerSession): number {
        return session.tokenIssuedAt + this._fraction * session.tokenValidityWindow;
    }

    private _scheduleProactiveRefresh(): void {
        this._clearProactiveTimer();
        const session = this._session;
        if (!session || session.refreshState === RefreshState.Failed) {
            return;
        }
        const delay = Math.min(MAX_TIMER_DELAY_MS, Math.max(0, this._refreshDueAt(session) - this._now()));
        const timer = setTimeout(() => {
            this._proactiveTimer = null;
            this.refresh('proactive').catch((error: unknown) => {
                const code = error instanceof ServerApiError ? error.code : AppErrorCode.UNKNOWN;
                if (code !== AppErrorCode.CANCELLED) {
                    this._logger.warn(`[SessionManager] Proactive refresh failed: ${code}`);
                }
            });
        }, delay);
        timer.unref();
        this._proactiveTimer = timer;
    }

    private _clearProactiveTimer(): void {
        if (this._proactiveTimer !== null) {
            clearTimeout(this._proactiveTimer);
            this._proactiveTimer = null;
        }
    }

    private _persistSession(session: ServerSession): void {
        const record: StoredSession = {
            version: SESSION_CONSTANTS.STORAGE_VERSION,
            serverUrl: session.serverUrl,
            serverId: session.serverId,
            userId: session.userId,
            userName: session.userName,
            accessToken: session.accessToken,
            tokenIssuedAt: session.tokenIssuedAt,
            tokenValidityWindow: session.tokenValidityWindow,
        };
        if (!this._preferences.setJson(sessionStorageKey(session.serverUrl), record)) {
            this._logger.warn('[SessionManager] Failed to persist session');
        }
    }

    private _persistCredentials(serverUrl: string, credentials: Credentials): void {
        if (!this._preferences.setJson(credentialsStorageKey(serverUrl), credentials)) {
            this._logger.warn('[SessionManager] Failed to persist credentials; refresh will need a new login');
        }
    }

    private _emitTokenChange(session: ServerSession, reason: SessionEvents['tokenChange']['reason']): void {
        this._emitter.emit('tokenChange', {
            serverUrl: session.serverUrl,
            userId: session.userId,
            issuedAt: session.tokenIssuedAt,
            reason,
        });
    }
}

function authRequiredError(): ServerApiError {
    return new ServerApiError(AppErrorCode.AUTH_REQUIRED, SESSION_ERROR_MESSAGES.AUTH_REQUIRED);
}

function authExpiredError(session: ServerSession): ServerApiError {
    return new ServerApiError(AppErrorCode.AUTH_EXPIRED, SESSION_ERROR_MESSAGES.AUTH_EXPIRED, {
        hostname: hostnameOf(session.serverUrl),
    });
}

function hostnameOf(url: string): string | undefined {
    try {
        return new URL(url).hostname;
    } catch {
        return undefined;
    }
}
