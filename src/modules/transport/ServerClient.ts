/**
 * @fileoverview HTTP client bound to one server and one access token.
 * @module modules/transport/ServerClient
 * @version 1.0.0
 */

import { errorForStatus, parseRetryAfter } from '../retry/errorMapping';
import { AUTHORIZATION_HEADER, buildAuthorizationHeader } from './headers';
import type { IHttpTransport, IServerClient } from './interfaces';
import { isSuccessStatus, joinUrl } from './response';
import type { ClientIdentity, QueryValue, ServerRequest, ServerResponse } from './types';

/**
 * Authenticated client. Immutable: a new token means a new client.
 */
export class ServerClient implements IServerClient {
    public readonly serverUrl: string;
    private readonly _transport: IHttpTransport;
    private readonly _authorization: string;
    private readonly _hostname: string;

    constructor(transport: IHttpTransport, serverUrl: string, identity: ClientIdentity, accessToken: string) {
        this._transport = transport;
        this.serverUrl = serverUrl;
        this._authorization = buildAuthorizationHeader(identity, accessToken);
        this._hostname = new URL(serverUrl).hostname;
    }

    public async request(request: ServerRequest): Promise<ServerResponse> {
        const headers: Record<string, string> = { ...request.headers, [AUTHORIZATION_HEADER]: this._authorization };
        let body: string | undefined;
        if (request.body !== undefined) {
            if (typeof request.body === 'string') {
                body = request.body;
            } else {
                body = JSON.stringify(request.body);
                headers['Content-Type'] = 'application/json';
            }
        }

        const response = await this._transport.send({
            url: buildRequestUrl(this.serverUrl, request.path, request.query),
            method: request.method ?? 'GET',
            headers,
            ...(body !== undefined ? { body } : {}),
            timeoutMs: request.timeoutMs ?? this._transport.defaultTimeoutMs,
            ...(request.signal ? { signal: request.signal } : {}),
        });

        if (!isSuccessStatus(response.status)) {
            throw errorForStatus(response.status, this._hostname, parseRetryAfter(response.headers['retry-after']));
        }
        return response;
    }
}

function buildRequestUrl(serverUrl: string, path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(joinUrl(serverUrl, path));
    if (query) {
        for (const [key, value] of Object.entries(query)) {
            if (value !== undefined) {
                url.searchParams.set(key, String(value));
            }
        }
    }
    return url.toString();
}
