/**
 * @fileoverview MediaBrowser authorization header construction.
 * @module modules/transport/headers
 * @version 1.0.0
 */

import type { ClientIdentity } from './types';

export const AUTHORIZATION_HEADER = 'Authorization';

function quote(value: string): string {
    return `"${encodeURIComponent(value)}"`;
}

/**
 * Build the `Authorization: MediaBrowser ...` value.
 * The token part is omitted for unauthenticated calls (login, discovery).
 *
 * @example
 * ```typescript
 * buildAuthorizationHeader({ client: 'Demo', device: 'Server', deviceId: 'abc', version: '1.0.0' }, 'tok');
 * // MediaBrowser Client="Demo", Device="Server", DeviceId="abc", Version="1.0.0", Token="tok"
 * ```
 */
export function buildAuthorizationHeader(identity: ClientIdentity, accessToken?: string): string {
    const parts = [
        `Client=${quote(identity.client)}`,
        `Device=${quote(identity.device)}`,
        `DeviceId=${quote(identity.deviceId)}`,
        `Version=${quote(identity.version)}`,
    ];
    if (accessToken) {
        parts.push(`Token=${quote(accessToken)}`);
    }
    return `MediaBrowser ${parts.join(', ')}`;
}
