/**
 * @fileoverview Public exports for endpoint discovery.
 * @module modules/discovery
 * @version 1.0.0
 */

export { EndpointDiscoverer, parseServerIdentity } from './EndpointDiscoverer';
export { expandCandidates } from './candidates';
export { DISCOVERY_CONSTANTS } from './constants';
export type { IEndpointDiscoverer, EndpointDiscovererConfig } from './interfaces';
export type { EndpointCandidate, ServerIdentity, DiscoveryResult, EndpointProbeResult } from './types';
