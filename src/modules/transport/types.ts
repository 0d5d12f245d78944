/**
 * @fileoverview Type definitions for the HTTP transport.
 * @module modules/transport/types
 * @version 1.0.0
 */

import type { Dispatcher } from 'undici';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

export type QueryValue = string | number | boolean | undefined;

/**
 * A request against the authenticated server, relative to its base URL.
 */
export interface ServerRequest {
    /** Defaults to GET */
    method?: HttpMethod;
    /** Path below the server base URL, e.g. `/Users/Me` */
    path: string;
    query?: Record<string, QueryValue>;
    headers?: Record<string, string>;
    /** Strings are sent as-is; anything else is JSON-encoded */
    body?: unknown;
    /** Per-dispatch timeout override */
    timeoutMs?: number;
    signal?: AbortSignal;
    /** Total attempts override for retryable failures */
    maxAttempts?: number;
}

/**
 * A completed HTTP exchange. The body is read fully before the response is returned.
 */
export interface ServerResponse {
    status: number;
    /** Lower-cased header names */
    headers: Record<string, string>;
    body: string;
    url: string;
}

/**
 * An absolute request flowing through the transport pipeline.
 */
export interface TransportRequest {
    url: string;
    method: HttpMethod;
    headers: Record<string, string>;
    body?: string;
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * One pipeline stage. Calls `next` to continue, or returns without it to short-circuit.
 */
export type PipelineStage = (
    request: TransportRequest,
    next: (request: TransportRequest) => Promise<ServerResponse>
) => Promise<ServerResponse>;

/**
 * The subset of a fetch response the transport reads.
 */
export interface FetchResponseLike {
    status: number;
    url: string;
    headers: { forEach(callback: (value: string, key: string) => void): void };
    text(): Promise<string>;
}

export interface FetchInitLike {
    method: string;
    headers: Record<string, string>;
    body?: string;
    signal: AbortSignal;
    dispatcher?: Dispatcher;
}

/**
 * Fetch implementation; undici's by default, injectable for tests.
 */
export type FetchLike = (url: string, init: FetchInitLike) => Promise<FetchResponseLike>;

/**
 * Client identity sent in the MediaBrowser authorization header.
 */
export interface ClientIdentity {
    /** Application name */
    client: string;
    /** Device name */
    device: string;
    /** Stable device identifier */
    deviceId: string;
    /** Application version */
    version: string;
}
