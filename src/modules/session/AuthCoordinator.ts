/**
 * @fileoverview Authenticated request execution with one-shot 401 recovery.
 * @module modules/session/AuthCoordinator
 * @version 1.0.0
 */

import { AppErrorCode, ServerApiError, createCancelledError } from '../../types/app-errors';
import { linkAbortSignals, raceWithSignal } from '../../utils/abort';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import type { IRetryPolicy } from '../retry/interfaces';
import type { IClientCache } from '../transport/interfaces';
import type { ServerRequest, ServerResponse } from '../transport/types';
import { SESSION_ERROR_MESSAGES } from './constants';
import type { AuthCoordinatorConfig, IAuthCoordinator, ISessionManager } from './interfaces';
import { RefreshState, ServerSession } from './types';

/**
 * Wraps every request against the authenticated server.
 *
 * A 401 triggers one reactive refresh keyed on the token that was rejected,
 * then the request is sent once more with the new token. A second 401 is
 * surfaced as AUTH_EXPIRED. Transient failures go through the retry policy.
 */
export class AuthCoordinator implements IAuthCoordinator {
    private readonly _sessionManager: ISessionManager;
    private readonly _clientCache: IClientCache;
    private readonly _retryPolicy: IRetryPolicy;
    private readonly _maxAttempts: number | undefined;
    private readonly _logger: Logger;

    constructor(config: AuthCoordinatorConfig) {
        this._sessionManager = config.sessionManager;
        this._clientCache = config.clientCache;
        this._retryPolicy = config.retryPolicy;
        this._maxAttempts = config.maxAttempts;
        this._logger = config.logger ?? DEFAULT_LOGGER;
    }

    /**
     * Send a request with the current token.
     *
     * @param request - Path and options relative to the session's server
     * @returns The 2xx response
     * @throws ServerApiError with AUTH_REQUIRED without a session, AUTH_EXPIRED when the
     *   session is Failed or the refreshed token is rejected too, CANCELLED on abort or
     *   logout, or the classified failure once retries are spent
     */
    public async execute(request: ServerRequest): Promise<ServerResponse> {
        const session = this._sessionManager.session;
        if (!session) {
            throw new ServerApiError(AppErrorCode.AUTH_REQUIRED, SESSION_ERROR_MESSAGES.AUTH_REQUIRED);
        }
        const hostname = hostnameOf(session.serverUrl);
        if (session.refreshState === RefreshState.Failed) {
            throw new ServerApiError(AppErrorCode.AUTH_EXPIRED, SESSION_ERROR_MESSAGES.AUTH_EXPIRED, { hostname });
        }

        const linked = linkAbortSignals([request.signal, this._sessionManager.sessionSignal]);
        const maxAttempts = request.maxAttempts ?? this._maxAttempts;
        let authRetried = false;

        try {
            return await this._retryPolicy.execute(
                async () => {
                    const current = await this._sessionManager.ensureFresh(linked.signal);
                    try {
                        return await this._dispatch(current, request, linked.signal);
                    } catch (error) {
                        if (!isUnauthorized(error) || authRetried) {
                            throw error;
                        }
                        authRetried = true;
                        this._logger.info(`[AuthCoordinator] 401 on ${request.path}, refreshing token`);
                        const refreshed = await raceWithSignal(
                            this._sessionManager.refresh('reactive', current.accessToken),
                            linked.signal,
                            () => createCancelledError(hostname)
                        );
                        return this._dispatch(refreshed, request, linked.signal);
                    }
                },
                {
                    ...(maxAttempts !== undefined ? { maxAttempts } : {}),
                    signal: linked.signal,
                    hostname,
                    operationName: `${request.method ?? 'GET'} ${request.path}`,
                }
            );
        } catch (error) {
            if (linked.signal.aborted && !(error instanceof ServerApiError && error.code === AppErrorCode.CANCELLED)) {
                const attempts = error instanceof ServerApiError ? error.attempts : 0;
                throw createCancelledError(hostname).withDiagnostics({ attempts });
            }
            throw error;
        } finally {
            linked.dispose();
        }
    }

    private _dispatch(session: ServerSession, request: ServerRequest, signal: AbortSignal): Promise<ServerResponse> {
        const client = this._clientCache.acquire(session.serverUrl, session.accessToken);
        return client.request({ ...request, signal });
    }
}

function isUnauthorized(error: unknown): boolean {
    return error instanceof ServerApiError && error.httpStatus === 401;
}

function hostnameOf(url: string): string | undefined {
    try {
        return new URL(url).hostname;
    } catch {
        return undefined;
    }
}
