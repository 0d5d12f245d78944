/**
 * @fileoverview Response helpers.
 * @module modules/transport/response
 * @version 1.0.0
 */

import { AppErrorCode, ServerApiError } from '../../types/app-errors';
import type { ServerResponse } from './types';

/**
 * Parse a response body as JSON.
 * @throws ServerApiError when the body is not JSON
 */
export function readJson(response: ServerResponse): unknown {
    if (response.body.length === 0) {
        return null;
    }
    try {
        const parsed: unknown = JSON.parse(response.body);
        return parsed;
    } catch (error) {
        let hostname: string | undefined;
        try {
            hostname = new URL(response.url).hostname;
        } catch {
            hostname = undefined;
        }
        throw new ServerApiError(AppErrorCode.UNKNOWN, 'Response body is not valid JSON', {
            hostname,
            httpStatus: response.status,
            cause: error,
        });
    }
}

export function isSuccessStatus(status: number): boolean {
    return status >= 200 && status < 300;
}

/**
 * Read a string field from a parsed JSON object.
 */
export function readString(source: unknown, field: string): string | undefined {
    if (typeof source !== 'object' || source === null) return undefined;
    const value: unknown = Reflect.get(source, field);
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Read a nested object field from a parsed JSON object.
 */
export function readObject(source: unknown, field: string): object | undefined {
    if (typeof source !== 'object' || source === null) return undefined;
    const value: unknown = Reflect.get(source, field);
    return typeof value === 'object' && value !== null ? value : undefined;
}

/**
 * Join a base URL and a path without doubling slashes.
 */
export function joinUrl(baseUrl: string, path: string): string {
    return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
