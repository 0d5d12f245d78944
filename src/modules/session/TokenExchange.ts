/**
 * @fileoverview Credential-for-token exchange against the server.
 * @module modules/session/TokenExchange
 * @version 1.0.0
 */

import { AppErrorCode, ServerApiError } from '../../types/app-errors';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import { errorForStatus, parseRetryAfter } from '../retry/errorMapping';
import { AUTHORIZATION_HEADER, buildAuthorizationHeader } from '../transport/headers';
import type { IHttpTransport } from '../transport/interfaces';
import { isSuccessStatus, joinUrl, readJson, readString } from '../transport/response';
import type { ClientIdentity, HttpMethod, ServerResponse } from '../transport/types';
import { SESSION_CONSTANTS, SESSION_ERROR_MESSAGES } from './constants';
import { parseAuthenticationResponse } from './helpers';
import type { ITokenExchange, TokenExchangeConfig } from './interfaces';
import type { Credentials, QuickConnectChallenge, QuickConnectStatus, TokenGrant } from './types';

/**
 * Exchanges a username and password, or an approved Quick Connect secret, for an access token.
 */
export class TokenExchange implements ITokenExchange {
    private readonly _transport: IHttpTransport;
    private readonly _identity: ClientIdentity;
    private readonly _defaultValidityMs: number;
    private readonly _logger: Logger;

    constructor(config: TokenExchangeConfig) {
        this._transport = config.transport;
        this._identity = config.identity;
        this._defaultValidityMs = config.defaultValidityMs ?? SESSION_CONSTANTS.DEFAULT_TOKEN_VALIDITY_MS;
        this._logger = config.logger ?? DEFAULT_LOGGER;
    }

    public async authenticate(serverUrl: string, credentials: Credentials, signal?: AbortSignal): Promise<TokenGrant> {
        const hostname = new URL(serverUrl).hostname;
        this._logger.debug(`[TokenExchange] Authenticating user '${credentials.username}' on ${hostname}`);

        const response = await this._send(
            serverUrl,
            'POST',
            SESSION_CONSTANTS.AUTHENTICATE_PATH,
            { Username: credentials.username, Pw: credentials.password },
            signal
        );

        if (response.status === 400 || response.status === 401) {
            this._logger.warn(`[TokenExchange] Credentials rejected for user '${credentials.username}'`);
            throw new ServerApiError(AppErrorCode.AUTH_INVALID_CREDENTIALS, SESSION_ERROR_MESSAGES.AUTH_INVALID_CREDENTIALS, {
                hostname,
                httpStatus: response.status,
            });
        }
        this._assertSuccess(response, hostname);

        return parseAuthenticationResponse(readJson(response), credentials.username, this._defaultValidityMs);
    }

    public async initiateQuickConnect(serverUrl: string, signal?: AbortSignal): Promise<QuickConnectChallenge> {
        const hostname = new URL(serverUrl).hostname;
        const response = await this._send(serverUrl, 'POST', SESSION_CONSTANTS.QUICK_CONNECT_INITIATE_PATH, undefined, signal);

        // Servers answer 401 while Quick Connect is switched off
        if (response.status === 401 || response.status === 403) {
            throw new ServerApiError(AppErrorCode.ACCESS_DENIED, SESSION_ERROR_MESSAGES.QUICK_CONNECT_DISABLED, {
                hostname,
                httpStatus: response.status,
            });
        }
        this._assertSuccess(response, hostname);

        const payload = readJson(response);
        const code = readString(payload, 'Code');
        const secret = readString(payload, 'Secret');
        if (!code || !secret) {
            throw new ServerApiError(AppErrorCode.UNKNOWN, 'Quick Connect response did not include a code', {
                hostname,
                httpStatus: response.status,
            });
        }
        this._logger.info(`[TokenExchange] Quick Connect started on ${hostname}`);
        return { code, secret };
    }

    public async getQuickConnectState(serverUrl: string, secret: string, signal?: AbortSignal): Promise<QuickConnectStatus> {
        const hostname = new URL(serverUrl).hostname;
        const path = `${SESSION_CONSTANTS.QUICK_CONNECT_STATE_PATH}?secret=${encodeURIComponent(secret)}`;
        const response = await this._send(serverUrl, 'GET', path, undefined, signal);

        if (response.status === 404) {
            return 'expired';
        }
        this._assertSuccess(response, hostname);

        const payload = readJson(response);
        const authenticated: unknown =
            typeof payload === 'object' && payload !== null ? Reflect.get(payload, 'Authenticated') : undefined;
        return authenticated === true ? 'approved' : 'pending';
    }

    public async authenticateWithQuickConnect(serverUrl: string, secret: string, signal?: AbortSignal): Promise<TokenGrant> {
        const hostname = new URL(serverUrl).hostname;
        this._logger.debug(`[TokenExchange] Redeeming Quick Connect approval on ${hostname}`);

        const response = await this._send(
            serverUrl,
            'POST',
            SESSION_CONSTANTS.QUICK_CONNECT_AUTHENTICATE_PATH,
            { Secret: secret },
            signal
        );

        if (response.status === 400 || response.status === 401 || response.status === 404) {
            throw new ServerApiError(AppErrorCode.AUTH_INVALID_CREDENTIALS, SESSION_ERROR_MESSAGES.QUICK_CONNECT_NOT_APPROVED, {
                hostname,
                httpStatus: response.status,
            });
        }
        this._assertSuccess(response, hostname);

        return parseAuthenticationResponse(readJson(response), '', this._defaultValidityMs);
    }

    private _send(
        serverUrl: string,
        method: HttpMethod,
        path: string,
        body: Record<string, string> | undefined,
        signal: AbortSignal | undefined
    ): Promise<ServerResponse> {
        const headers: Record<string, string> = {
            [AUTHORIZATION_HEADER]: buildAuthorizationHeader(this._identity),
        };
        if (body) {
            headers['Content-Type'] = 'application/json';
        }
        return this._transport.send({
            url: joinUrl(serverUrl, path),
            method,
            headers,
            ...(body ? { body: JSON.stringify(body) } : {}),
            timeoutMs: this._transport.defaultTimeoutMs,
            ...(signal ? { signal } : {}),
        });
    }

    private _assertSuccess(response: ServerResponse, hostname: string): void {
        if (!isSuccessStatus(response.status)) {
            throw errorForStatus(response.status, hostname, parseRetryAfter(response.headers['retry-after']));
        }
    }
}
