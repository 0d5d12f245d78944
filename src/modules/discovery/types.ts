/**
 * @fileoverview Type definitions for endpoint discovery.
 * @module modules/discovery/types
 * @version 1.0.0
 */

/**
 * One URL to probe. Lower priority values are probed first.
 */
export interface EndpointCandidate {
    url: string;
    priority: number;
}

/**
 * Parsed response of the identification endpoint.
 */
export interface ServerIdentity {
    id: string;
    name: string;
    version: string;
    productName: string;
}

/**
 * Outcome of a successful discovery.
 */
export interface DiscoveryResult {
    /** Validated base URL, without trailing slash */
    baseUrl: string;
    server: ServerIdentity;
    /** Round-trip time of the winning probe */
    latencyMs: number;
    /** Candidates probed before (and including) the winner's batch */
    candidatesTried: number;
}

/**
 * Outcome of probing a single URL.
 */
export interface EndpointProbeResult {
    server: ServerIdentity;
    latencyMs: number;
}
