/**
 * @fileoverview Mapping of HTTP statuses and raw transport failures into the error taxonomy.
 * @module modules/retry/errorMapping
 * @version 1.0.0
 */

import { AppErrorCode, ServerApiError } from '../../types/app-errors';
import {
    BUSY_STATUSES,
    CONNECT_ERROR_CODES,
    DNS_ERROR_CODES,
    RETRYABLE_STATUSES,
    TIMEOUT_ERROR_CODES,
    TLS_ERROR_CODES,
} from './constants';

const MAX_CAUSE_DEPTH = 6;

/**
 * Build the error surfaced for a non-success HTTP status.
 */
export function errorForStatus(
    status: number,
    hostname?: string,
    retryAfterMs?: number
): ServerApiError {
    const diagnostics = { hostname, httpStatus: status, retryAfterMs };

    if (status === 401) {
        return new ServerApiError(AppErrorCode.AUTH_EXPIRED, 'Unauthorized: session token rejected', diagnostics);
    }
    if (status === 403) {
        return new ServerApiError(AppErrorCode.ACCESS_DENIED, 'Forbidden: access denied', diagnostics);
    }
    if (status === 404) {
        return new ServerApiError(AppErrorCode.RESOURCE_NOT_FOUND, 'Resource not found', diagnostics);
    }
    if (status === 408) {
        return new ServerApiError(AppErrorCode.TIMEOUT, 'Request timeout (408)', {
            ...diagnostics,
            retryable: true,
        });
    }
    if (BUSY_STATUSES.has(status)) {
        return new ServerApiError(AppErrorCode.SERVER_BUSY, `Server busy: ${status}`, {
            ...diagnostics,
            retryable: true,
        });
    }
    if (status >= 500) {
        return new ServerApiError(AppErrorCode.SERVER_ERROR, `Server error: ${status}`, {
            ...diagnostics,
            retryable: RETRYABLE_STATUSES.has(status),
        });
    }
    return new ServerApiError(AppErrorCode.CLIENT_ERROR, `Request failed with status ${status}`, diagnostics);
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 * @returns Delay in ms, or undefined when absent or unparseable
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
    if (!value) return undefined;
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
        const seconds = parseInt(trimmed, 10);
        return seconds > 0 ? seconds * 1000 : undefined;
    }
    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) return undefined;
    const delta = date - now;
    return delta > 0 ? delta : undefined;
}

/**
 * Convert anything thrown by the transport into a ServerApiError.
 * Walks `error.cause` because undici wraps socket errors in `TypeError('fetch failed')`.
 */
export function normalizeTransportError(error: unknown, hostname?: string): ServerApiError {
    if (error instanceof ServerApiError) {
        return error;
    }

    let current: unknown = error;
    for (let depth = 0; depth < MAX_CAUSE_DEPTH && current !== undefined && current !== null; depth++) {
        if (current instanceof ServerApiError) {
            // e.g. a pin mismatch returned from checkServerIdentity
            return current.withDiagnostics({ hostname });
        }
        const mapped = mapErrorShape(current, hostname, error);
        if (mapped) {
            return mapped;
        }
        current = current instanceof Error ? current.cause : undefined;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ServerApiError(AppErrorCode.UNKNOWN, `Request failed: ${message}`, {
        hostname,
        cause: error,
    });
}

function mapErrorShape(candidate: unknown, hostname: string | undefined, original: unknown): ServerApiError | null {
    if (typeof candidate !== 'object' || candidate === null) {
        return null;
    }
    const code = readStringField(candidate, 'code');
    const name = readStringField(candidate, 'name');

    if (name === 'AbortError') {
        return new ServerApiError(AppErrorCode.CANCELLED, 'Operation cancelled', { hostname, cause: original });
    }
    if (name === 'TimeoutError' || (code !== undefined && TIMEOUT_ERROR_CODES.has(code))) {
        return new ServerApiError(AppErrorCode.TIMEOUT, 'Request timed out', {
            hostname,
            retryable: true,
            cause: original,
        });
    }
    if (code === undefined) {
        return null;
    }
    if (DNS_ERROR_CODES.has(code)) {
        return new ServerApiError(AppErrorCode.DNS_FAILURE, 'Could not resolve host', { hostname, cause: original });
    }
    if (CONNECT_ERROR_CODES.has(code)) {
        return new ServerApiError(AppErrorCode.NETWORK_UNREACHABLE, `Network error: ${code}`, {
            hostname,
            retryable: true,
            cause: original,
        });
    }
    if (TLS_ERROR_CODES.has(code)) {
        return new ServerApiError(AppErrorCode.SERVER_SSL_ERROR, `TLS validation failed: ${code}`, {
            hostname,
            cause: original,
        });
    }
    return null;
}

function readStringField(target: object, field: string): string | undefined {
    const value: unknown = Reflect.get(target, field);
    return typeof value === 'string' ? value : undefined;
}
