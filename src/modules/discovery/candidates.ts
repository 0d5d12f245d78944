/**
 * @fileoverview Expansion of a user-entered address into prioritized candidate URLs.
 * @module modules/discovery/candidates
 * @version 1.0.0
 */

import { AppErrorCode, ServerApiError } from '../../types/app-errors';
import { DEFAULT_SCHEME_PORTS, DISCOVERY_CONSTANTS } from './constants';
import type { EndpointCandidate } from './types';

type Scheme = 'https' | 'http';

const SCHEMES: readonly Scheme[] = ['https', 'http'];
const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;
const EXPLICIT_PORT_PATTERN = /:(\d{1,5})$/;

function invalidAddress(rawAddress: string): ServerApiError {
    return new ServerApiError(AppErrorCode.INVALID_SERVER_ADDRESS, `Invalid server address: ${rawAddress}`);
}

/**
 * Port given in the address itself, including default ports that URL parsing drops.
 */
function readExplicitPort(withoutScheme: string): number | undefined {
    const authority = withoutScheme.split(/[/?#]/, 1)[0] ?? '';
    const hostPort = authority.slice(authority.lastIndexOf('@') + 1);
    const match = EXPLICIT_PORT_PATTERN.exec(hostPort);
    if (!match?.[1] || hostPort.endsWith(']')) {
        return undefined;
    }
    return parseInt(match[1], 10);
}

function portsFor(scheme: Scheme, explicitPort: number | undefined): number[] {
    if (explicitPort !== undefined) {
        return [explicitPort];
    }
    return scheme === 'https'
        ? [DISCOVERY_CONSTANTS.JELLYFIN_HTTP_PORT, DEFAULT_SCHEME_PORTS.https, DISCOVERY_CONSTANTS.JELLYFIN_HTTPS_PORT]
        : [DISCOVERY_CONSTANTS.JELLYFIN_HTTP_PORT, DEFAULT_SCHEME_PORTS.http];
}

function pathsFor(userPath: string): string[] {
    const base = userPath.replace(/\/+$/, '');
    const suffix = DISCOVERY_CONSTANTS.JELLYFIN_PATH;
    if (base.toLowerCase().endsWith(suffix)) {
        return [base, base.slice(0, -suffix.length)];
    }
    return [base, base + suffix];
}

/**
 * Expand an address over scheme x port x path.
 *
 * Order: https before http; the explicit port, else 8096, then the scheme's
 * default port, then 8920 (https only); the given path before its `/jellyfin`
 * variant. Priority is `scheme * 100 + port * 10 + path` by rank.
 *
 * @throws ServerApiError with INVALID_SERVER_ADDRESS
 */
export function expandCandidates(rawAddress: string): EndpointCandidate[] {
    const trimmed = rawAddress.trim();
    if (trimmed.length === 0) {
        throw invalidAddress(rawAddress);
    }

    const schemeMatch = SCHEME_PATTERN.exec(trimmed);
    const givenScheme = schemeMatch?.[1]?.toLowerCase();
    if (givenScheme !== undefined && givenScheme !== 'http' && givenScheme !== 'https') {
        throw invalidAddress(rawAddress);
    }
    const withoutScheme = schemeMatch ? trimmed.slice(schemeMatch[0].length) : trimmed;

    let parsed: URL;
    try {
        parsed = new URL(`https://${withoutScheme}`);
    } catch {
        throw invalidAddress(rawAddress);
    }
    if (!parsed.hostname) {
        throw invalidAddress(rawAddress);
    }

    const explicitPort = readExplicitPort(withoutScheme);
    if (explicitPort !== undefined && (explicitPort < 1 || explicitPort > 65535)) {
        throw invalidAddress(rawAddress);
    }

    const paths = pathsFor(parsed.pathname);
    const byUrl = new Map<string, EndpointCandidate>();

    SCHEMES.forEach((scheme, schemeRank) => {
        portsFor(scheme, explicitPort).forEach((port, portRank) => {
            const portPart = port === DEFAULT_SCHEME_PORTS[scheme] ? '' : `:${port}`;
            paths.forEach((path, pathRank) => {
                const url = `${scheme}://${parsed.hostname}${portPart}${path}`;
                const priority = schemeRank * 100 + portRank * 10 + pathRank;
                const existing = byUrl.get(url);
                if (!existing || existing.priority > priority) {
                    byUrl.set(url, { url, priority });
                }
            });
        });
    });

    return Array.from(byUrl.values()).sort((a, b) => a.priority - b.priority);
}
