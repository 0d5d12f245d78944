/**
 * @fileoverview Endpoint discovery: concurrent probing of candidate server URLs.
 * @module modules/discovery/EndpointDiscoverer
 * @version 1.0.0
 */

import { AppErrorCode, ServerApiError, createCancelledError } from '../../types/app-errors';
import { linkAbortSignals } from '../../utils/abort';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import { redactUrl } from '../../utils/redact';
import { errorForStatus, normalizeTransportError } from '../retry/errorMapping';
import type { IRetryPolicy } from '../retry/interfaces';
import { AUTHORIZATION_HEADER, buildAuthorizationHeader } from '../transport/headers';
import type { IHttpTransport } from '../transport/interfaces';
import { isSuccessStatus, joinUrl, readJson, readString } from '../transport/response';
import type { ClientIdentity } from '../transport/types';
import { expandCandidates } from './candidates';
import { DISCOVERY_CONSTANTS } from './constants';
import type { EndpointDiscovererConfig, IEndpointDiscoverer } from './interfaces';
import type { DiscoveryResult, EndpointCandidate, EndpointProbeResult, ServerIdentity } from './types';

interface BatchOutcome {
    winner?: { candidate: EndpointCandidate; probe: EndpointProbeResult };
    fatal?: ServerApiError;
}

/**
 * Endpoint discoverer.
 *
 * Candidates are probed in priority batches. Within a batch the first probe that
 * returns a valid identification wins and the others are aborted; if the whole
 * batch fails, the next batch starts.
 *
 * @example
 * ```typescript
 * const discoverer = new EndpointDiscoverer({ transport, retryPolicy, identity });
 * const { baseUrl, server } = await discoverer.discover('media.local');
 * ```
 */
export class EndpointDiscoverer implements IEndpointDiscoverer {
    private readonly _transport: IHttpTransport;
    private readonly _retryPolicy: IRetryPolicy;
    private readonly _identity: ClientIdentity;
    private readonly _batchSize: number;
    private readonly _probeTimeoutMs: number;
    private readonly _meteredMultiplier: number;
    private readonly _probeMaxAttempts: number;
    private readonly _isMetered: () => boolean;
    private readonly _now: () => number;
    private readonly _logger: Logger;
    private readonly _active = new Set<AbortController>();

    constructor(config: EndpointDiscovererConfig) {
        this._transport = config.transport;
        this._retryPolicy = config.retryPolicy;
        this._identity = config.identity;
        this._batchSize = Math.max(1, config.batchSize ?? DISCOVERY_CONSTANTS.DEFAULT_BATCH_SIZE);
        this._probeTimeoutMs = config.probeTimeoutMs ?? DISCOVERY_CONSTANTS.PROBE_TIMEOUT_MS;
        this._meteredMultiplier = config.meteredProbeTimeoutMultiplier ?? DISCOVERY_CONSTANTS.METERED_TIMEOUT_MULTIPLIER;
        this._probeMaxAttempts = config.probeMaxAttempts ?? DISCOVERY_CONSTANTS.PROBE_MAX_ATTEMPTS;
        this._isMetered = config.isMeteredConnection ?? ((): boolean => false);
        this._now = config.now ?? Date.now;
        this._logger = config.logger ?? DEFAULT_LOGGER;
    }

    /**
     * Find a reachable endpoint for a user-entered address.
     *
     * @param rawAddress - Hostname, host:port or URL
     * @param signal - Aborts every probe in flight
     * @returns The winning base URL with the server's identity and probe latency
     * @throws ServerApiError with INVALID_SERVER_ADDRESS, CERTIFICATE_PIN_MISMATCH,
     *   NO_REACHABLE_ENDPOINT or CANCELLED
     */
    public async discover(rawAddress: string, signal?: AbortSignal): Promise<DiscoveryResult> {
        const candidates = expandCandidates(rawAddress);
        const controller = new AbortController();
        const linked = linkAbortSignals([signal, controller.signal]);
        this._active.add(controller);

        let tried = 0;
        let lastFailureHost: string | undefined;
        try {
            for (let start = 0; start < candidates.length; start += this._batchSize) {
                if (linked.signal.aborted) {
                    throw createCancelledError();
                }

                const batch = candidates.slice(start, start + this._batchSize);
                tried += batch.length;
                const targets = batch.map((candidate) => redactUrl(candidate.url)).join(', ');
                this._logger.debug(`[EndpointDiscoverer] Probing ${batch.length} candidate(s): ${targets}`);

                const outcome = await this._probeBatch(batch, linked.signal);
                if (outcome.fatal) {
                    throw outcome.fatal;
                }
                if (outcome.winner) {
                    const { candidate, probe } = outcome.winner;
                    this._logger.info(
                        `[EndpointDiscoverer] Selected ${redactUrl(candidate.url)} (${probe.latencyMs}ms)`
                    );
                    return {
                        baseUrl: candidate.url,
                        server: probe.server,
                        latencyMs: probe.latencyMs,
                        candidatesTried: tried,
                    };
                }
                if (linked.signal.aborted) {
                    throw createCancelledError();
                }
                lastFailureHost = hostnameOf(batch[0]?.url);
            }
        } finally {
            linked.dispose();
            this._active.delete(controller);
        }

        this._logger.warn(`[EndpointDiscoverer] No reachable endpoint among ${tried} candidate(s)`);
        throw new ServerApiError(
            AppErrorCode.NO_REACHABLE_ENDPOINT,
            `No reachable server found for ${rawAddress.trim()}`,
            { hostname: lastFailureHost, attempts: tried }
        );
    }

    /**
     * Probe one URL.
     * @returns The identity and latency, or null when the endpoint does not answer
     * @throws ServerApiError with CERTIFICATE_PIN_MISMATCH or CANCELLED
     */
    public async testEndpoint(url: string, signal?: AbortSignal): Promise<EndpointProbeResult | null> {
        const controller = new AbortController();
        const linked = linkAbortSignals([signal, controller.signal]);
        this._active.add(controller);
        try {
            return await this._probeWithRetry(url, linked.signal);
        } catch (error) {
            const failure = normalizeTransportError(error, hostnameOf(url));
            if (failure.code === AppErrorCode.CANCELLED || failure.code === AppErrorCode.CERTIFICATE_PIN_MISMATCH) {
                throw failure;
            }
            this._logger.debug(`[EndpointDiscoverer] ${redactUrl(url)} unreachable: ${failure.code}`);
            return null;
        } finally {
            linked.dispose();
            this._active.delete(controller);
        }
    }

    /**
     * Abort every discovery and probe in flight.
     */
    public cancel(): void {
        if (this._active.size > 0) {
            this._logger.debug(`[EndpointDiscoverer] Cancelling ${this._active.size} discovery run(s)`);
        }
        for (const controller of this._active) {
            controller.abort();
        }
        this._active.clear();
    }

    // ============================================
    // Private helpers
    // ============================================

    private _probeBatch(batch: EndpointCandidate[], signal: AbortSignal): Promise<BatchOutcome> {
        const batchAbort = linkAbortSignals([signal]);

        return new Promise<BatchOutcome>((resolve) => {
            let remaining = batch.length;
            let settled = false;

            const settle = (outcome: BatchOutcome): void => {
                if (settled) return;
                settled = true;
                // Losing probes are aborted as soon as the batch is decided.
                batchAbort.abort();
                batchAbort.dispose();
                resolve(outcome);
            };

            for (const candidate of batch) {
                this._probeWithRetry(candidate.url, batchAbort.signal).then(
                    (probe) => settle({ winner: { candidate, probe } }),
                    (error: unknown) => {
                        const failure = normalizeTransportError(error, hostnameOf(candidate.url));
                        if (failure.code === AppErrorCode.CERTIFICATE_PIN_MISMATCH) {
                            settle({ fatal: failure });
                            return;
                        }
                        if (!settled && failure.code !== AppErrorCode.CANCELLED) {
                            this._logger.debug(
                                `[EndpointDiscoverer] ${redactUrl(candidate.url)} failed: ${failure.code}`
                            );
                        }
                        remaining--;
                        if (remaining === 0) {
                            settle({});
                        }
                    }
                );
            }
        });
    }

    private _probeWithRetry(url: string, signal: AbortSignal): Promise<EndpointProbeResult> {
        return this._retryPolicy.execute(() => this._probeOnce(url, signal), {
            maxAttempts: this._probeMaxAttempts,
            signal,
            hostname: hostnameOf(url),
            operationName: `probe ${redactUrl(url)}`,
        });
    }

    private async _probeOnce(url: string, signal: AbortSignal): Promise<EndpointProbeResult> {
        const startedAt = this._now();
        const timeoutMs = this._isMetered()
            ? this._probeTimeoutMs * this._meteredMultiplier
            : this._probeTimeoutMs;

        const response = await this._transport.send({
            url: joinUrl(url, DISCOVERY_CONSTANTS.IDENTIFICATION_PATH),
            method: 'GET',
            headers: { [AUTHORIZATION_HEADER]: buildAuthorizationHeader(this._identity) },
            timeoutMs,
            signal,
        });
        if (!isSuccessStatus(response.status)) {
            throw errorForStatus(response.status, hostnameOf(url));
        }

        const server = parseServerIdentity(readJson(response));
        if (!server) {
            throw new ServerApiError(AppErrorCode.CLIENT_ERROR, 'Endpoint did not identify as a media server', {
                hostname: hostnameOf(url),
                httpStatus: response.status,
            });
        }
        return { server, latencyMs: this._now() - startedAt };
    }
}

/**
 * Parse the identification payload. A missing server Id means the URL does not host a server.
 */
export function parseServerIdentity(payload: unknown): ServerIdentity | null {
    const id = readString(payload, 'Id');
    if (!id) {
        return null;
    }
    return {
        id,
        name: readString(payload, 'ServerName') ?? '',
        version: readString(payload, 'Version') ?? '',
        productName: readString(payload, 'ProductName') ?? '',
    };
}

function hostnameOf(url: string | undefined): string | undefined {
    if (!url) return undefined;
    try {
        return new URL(url).hostname;
    } catch {
        return undefined;
    }
}
