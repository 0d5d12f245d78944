/**
 * @fileoverview Interface definitions for the session module.
 * @module modules/session/interfaces
 * @version 1.0.0
 */

import type { IRetryPolicy } from '../retry/interfaces';
import type { ICertificateTrustStore, IEncryptedPreferences } from '../security/interfaces';
import type { IClientCache, IHttpTransport } from '../transport/interfaces';
import type { ClientIdentity, ServerRequest, ServerResponse } from '../transport/types';
import type { IDisposable, Logger } from '../../utils/interfaces';
import type {
    Credentials,
    LogoutOptions,
    QuickConnectChallenge,
    QuickConnectStatus,
    RefreshReason,
    RefreshState,
    ServerSession,
    SessionEvents,
    TokenGrant,
} from './types';

/**
 * An in-flight refresh shared by every caller that observes Refreshing.
 */
export interface PendingRefresh {
    reason: RefreshReason;
    promise: Promise<ServerSession>;
    controller: AbortController;
    /** Callers attached to this episode, the initiator included */
    waiters: number;
    /** Token this episode replaces */
    staleToken: string;
    startedAt: number;
}

export interface TokenExchangeConfig {
    transport: IHttpTransport;
    identity: ClientIdentity;
    defaultValidityMs?: number;
    logger?: Logger;
}

/**
 * Exchanges credentials for an access token.
 */
export interface ITokenExchange {
    /**
     * @throws ServerApiError with AUTH_INVALID_CREDENTIALS when the server rejects the credentials
     */
    authenticate(serverUrl: string, credentials: Credentials, signal?: AbortSignal): Promise<TokenGrant>;

    /**
     * Ask the server for a Quick Connect code to approve from a signed-in device.
     * @throws ServerApiError with ACCESS_DENIED when Quick Connect is disabled on the server
     */
    initiateQuickConnect(serverUrl: string, signal?: AbortSignal): Promise<QuickConnectChallenge>;

    /**
     * Poll a Quick Connect request. An unknown or timed-out secret reads as 'expired'.
     */
    getQuickConnectState(serverUrl: string, secret: string, signal?: AbortSignal): Promise<QuickConnectStatus>;

    /**
     * Redeem an approved Quick Connect secret for a token.
     * @throws ServerApiError with AUTH_INVALID_CREDENTIALS when the request was not approved
     */
    authenticateWithQuickConnect(serverUrl: string, secret: string, signal?: AbortSignal): Promise<TokenGrant>;
}

export interface SessionManagerConfig {
    tokenExchange: ITokenExchange;
    clientCache: IClientCache;
    retryPolicy: IRetryPolicy;
    preferences: IEncryptedPreferences;
    /** Used to drop the server's pin on logout */
    trustStore?: Pick<ICertificateTrustStore, 'revokePin'>;
    proactiveRefreshFraction?: number;
    refreshTimeoutMs?: number;
    /** Attempts per token exchange during a refresh */
    maxRefreshAttempts?: number;
    clearPinsOnLogout?: boolean;
    now?: () => number;
    logger?: Logger;
}

/**
 * Owner of the session state machine and the single-flight refresh.
 */
export interface ISessionManager {
    /**
     * Exchange credentials for a token and start a new session.
     * @param serverUrl - Base URL of the server, as returned by discovery
     * @param credentials - Username and password; the password may be empty
     * @param signal - Aborts the exchange
     * @returns Copy of the new session
     * @throws ServerApiError with AUTH_INVALID_CREDENTIALS, a transport error, or CANCELLED
     */
    login(serverUrl: string, credentials: Credentials, signal?: AbortSignal): Promise<ServerSession>;

    /**
     * Redeem an approved Quick Connect secret and start a new session.
     * No password is stored, so a later refresh of this session ends in Failed.
     * @throws ServerApiError with AUTH_INVALID_CREDENTIALS, a transport error, or CANCELLED
     */
    loginWithQuickConnect(serverUrl: string, secret: string, signal?: AbortSignal): Promise<ServerSession>;

    /**
     * Refresh the token. Concurrent callers share one episode.
     * @param staleToken - Token the caller saw rejected; if already replaced, resolves without a network call
     * @throws ServerApiError with AUTH_EXPIRED on failure, CANCELLED on logout
     */
    refresh(reason: RefreshReason, staleToken?: string): Promise<ServerSession>;

    /**
     * Wait for a pending refresh, or start a proactive one if the token is past its lead time.
     * @throws ServerApiError with AUTH_REQUIRED, AUTH_EXPIRED or CANCELLED
     */
    ensureFresh(signal?: AbortSignal): Promise<ServerSession>;

    /**
     * Cancel pending work and clear the session, cached clients and persisted credentials.
     */
    logout(options?: LogoutOptions): Promise<void>;

    /**
     * Reload a persisted session.
     * @param serverUrl - Server to restore; the first persisted session when omitted
     */
    restore(serverUrl?: string): ServerSession | null;

    /**
     * Copy of the current session, or null.
     */
    readonly session: ServerSession | null;

    readonly refreshState: RefreshState | null;

    /**
     * Aborts when the current session ends.
     */
    readonly sessionSignal: AbortSignal;

    on<K extends keyof SessionEvents>(event: K, handler: (payload: SessionEvents[K]) => void): IDisposable;

    /**
     * Stop timers and abort pending work without clearing persisted state.
     */
    dispose(): void;
}

export interface AuthCoordinatorConfig {
    sessionManager: ISessionManager;
    clientCache: IClientCache;
    retryPolicy: IRetryPolicy;
    /** Total attempts per request; RetryPolicy's value when omitted */
    maxAttempts?: number;
    logger?: Logger;
}

/**
 * Request wrapper: attaches the token, recovers from 401 once, retries transient failures.
 */
export interface IAuthCoordinator {
    /**
     * @throws ServerApiError classified per the error taxonomy
     */
    execute(request: ServerRequest): Promise<ServerResponse>;
}
