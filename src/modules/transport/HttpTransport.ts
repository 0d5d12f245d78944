/**
 * @fileoverview HTTP transport over undici with certificate pinning.
 * @module modules/transport/HttpTransport
 * @version 1.0.0
 */

import { Agent, fetch as undiciFetch, Dispatcher } from 'undici';
import { AppErrorCode, ServerApiError, createCancelledError } from '../../types/app-errors';
import { linkAbortSignals } from '../../utils/abort';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import { normalizeTransportError } from '../retry/errorMapping';
import { TRANSPORT_CONSTANTS } from './constants';
import type { ICertificateTrustStore } from '../security/interfaces';
import type { HttpTransportConfig, IHttpTransport } from './interfaces';
import { composePipeline, createDefaultHeadersStage, createLoggingStage } from './pipeline';
import type { FetchLike, PipelineStage, ServerResponse, TransportRequest } from './types';

/**
 * Agent options whose TLS connector runs the trust store's identity check.
 *
 * Node does not call checkServerIdentity on a resumed TLS session, so session
 * caching is off: every connection performs a full handshake and a revoked pin
 * is taken again on the next connection.
 */
export function createPinningAgentOptions(
    trustStore: Pick<ICertificateTrustStore, 'createServerIdentityCheck'>
): Agent.Options {
    return {
        connect: {
            checkServerIdentity: trustStore.createServerIdentityCheck(),
            maxCachedSessions: 0,
        },
    };
}

/**
 * Sends requests through an ordered stage pipeline.
 *
 * When a trust store is configured, an undici Agent is built whose TLS connector
 * runs the trust store's identity check, so a pin mismatch fails the handshake
 * before any request bytes are written.
 */
export class HttpTransport implements IHttpTransport {
    private readonly _fetch: FetchLike;
    private readonly _dispatcher: Dispatcher | undefined;
    private readonly _ownsDispatcher: boolean;
    private readonly _stages: PipelineStage[];
    private readonly _defaultTimeoutMs: number;
    private readonly _logger: Logger;
    private _closed = false;

    constructor(config: HttpTransportConfig = {}) {
        this._logger = config.logger ?? DEFAULT_LOGGER;
        this._fetch = config.fetch ?? undiciFetch;
        this._defaultTimeoutMs = config.requestTimeoutMs ?? TRANSPORT_CONSTANTS.DEFAULT_TIMEOUT_MS;

        if (config.dispatcher) {
            this._dispatcher = config.dispatcher;
            this._ownsDispatcher = false;
        } else if (config.trustStore) {
            this._dispatcher = new Agent(createPinningAgentOptions(config.trustStore));
            this._ownsDispatcher = true;
        } else {
            this._dispatcher = undefined;
            this._ownsDispatcher = false;
        }

        this._stages = [
            createDefaultHeadersStage({
                'User-Agent': TRANSPORT_CONSTANTS.USER_AGENT,
                Accept: TRANSPORT_CONSTANTS.ACCEPT,
                ...config.defaultHeaders,
            }),
            createLoggingStage(this._logger),
            ...(config.stages ?? []),
        ];
    }

    public get defaultTimeoutMs(): number {
        return this._defaultTimeoutMs;
    }

    public use(stage: PipelineStage): void {
        this._stages.push(stage);
    }

    public send(request: TransportRequest): Promise<ServerResponse> {
        if (this._closed) {
            return Promise.reject(
                new ServerApiError(AppErrorCode.CANCELLED, 'Transport is closed', { hostname: hostnameOf(request.url) })
            );
        }
        const run = composePipeline(this._stages, (finalRequest) => this._dispatch(finalRequest));
        return run(request);
    }

    public async close(): Promise<void> {
        if (this._closed) return;
        this._closed = true;
        if (this._dispatcher && this._ownsDispatcher) {
            await this._dispatcher.close();
        }
    }

    // ============================================
    // Private helpers
    // ============================================

    private async _dispatch(request: TransportRequest): Promise<ServerResponse> {
        const hostname = hostnameOf(request.url);
        const timeoutMs = request.timeoutMs > 0 ? request.timeoutMs : this._defaultTimeoutMs;
        const linked = linkAbortSignals([request.signal], timeoutMs);

        try {
            const response = await this._fetch(request.url, {
                method: request.method,
                headers: request.headers,
                ...(request.body !== undefined ? { body: request.body } : {}),
                signal: linked.signal,
                ...(this._dispatcher ? { dispatcher: this._dispatcher } : {}),
            });
            const body = await response.text();
            const headers: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                headers[key.toLowerCase()] = value;
            });
            return { status: response.status, headers, body, url: response.url || request.url };
        } catch (error) {
            if (linked.signal.aborted) {
                if (linked.timedOut()) {
                    throw new ServerApiError(
                        AppErrorCode.TIMEOUT,
                        `Request timed out after ${timeoutMs}ms`,
                        { hostname, retryable: true, cause: error }
                    );
                }
                throw createCancelledError(hostname);
            }
            throw normalizeTransportError(error, hostname);
        } finally {
            linked.dispose();
        }
    }
}

function hostnameOf(url: string): string | undefined {
    try {
        return new URL(url).hostname;
    } catch {
        return undefined;
    }
}
