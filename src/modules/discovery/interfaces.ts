/**
 * @fileoverview Interface definitions for endpoint discovery.
 * @module modules/discovery/interfaces
 * @version 1.0.0
 */

import type { IRetryPolicy } from '../retry/interfaces';
import type { ClientIdentity } from '../transport/types';
import type { IHttpTransport } from '../transport/interfaces';
import type { Logger } from '../../utils/interfaces';
import type { DiscoveryResult, EndpointProbeResult } from './types';

export interface EndpointDiscovererConfig {
    transport: IHttpTransport;
    retryPolicy: IRetryPolicy;
    identity: ClientIdentity;
    /** Candidates probed concurrently */
    batchSize?: number;
    probeTimeoutMs?: number;
    meteredProbeTimeoutMultiplier?: number;
    probeMaxAttempts?: number;
    /** Host-supplied network check; probes wait longer on metered links */
    isMeteredConnection?: () => boolean;
    now?: () => number;
    logger?: Logger;
}

/**
 * Resolves a user-entered server address to a reachable base URL.
 */
export interface IEndpointDiscoverer {
    /**
     * Probe candidate URLs in priority batches; the first valid identification wins.
     * @throws ServerApiError with INVALID_SERVER_ADDRESS, NO_REACHABLE_ENDPOINT,
     *         CERTIFICATE_PIN_MISMATCH or CANCELLED
     */
    discover(rawAddress: string, signal?: AbortSignal): Promise<DiscoveryResult>;

    /**
     * Probe a single base URL.
     * @returns Identity and latency, or null if the URL does not host a server
     */
    testEndpoint(url: string, signal?: AbortSignal): Promise<EndpointProbeResult | null>;

    /**
     * Abort every in-flight probe.
     */
    cancel(): void;
}
