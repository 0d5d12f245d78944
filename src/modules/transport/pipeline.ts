/**
 * @fileoverview Built-in transport pipeline stages and composition.
 * @module modules/transport/pipeline
 * @version 1.0.0
 */

import type { Logger } from '../../utils/interfaces';
import { redactUrl } from '../../utils/redact';
import type { PipelineStage, ServerResponse, TransportRequest } from './types';

/**
 * Chain stages in order around a terminal sender.
 */
export function composePipeline(
    stages: readonly PipelineStage[],
    terminal: (request: TransportRequest) => Promise<ServerResponse>
): (request: TransportRequest) => Promise<ServerResponse> {
    return stages.reduceRight<(request: TransportRequest) => Promise<ServerResponse>>(
        (next, stage) => (request) => stage(request, next),
        terminal
    );
}

/**
 * Add headers the request does not already set (case-insensitive).
 */
export function createDefaultHeadersStage(defaults: Record<string, string>): PipelineStage {
    return (request, next) => {
        const present = new Set(Object.keys(request.headers).map((name) => name.toLowerCase()));
        const headers = { ...request.headers };
        for (const [name, value] of Object.entries(defaults)) {
            if (!present.has(name.toLowerCase())) {
                headers[name] = value;
            }
        }
        return next({ ...request, headers });
    };
}

/**
 * Log each exchange at debug level with a redacted URL. Header values are never logged.
 */
export function createLoggingStage(logger: Logger, now: () => number = Date.now): PipelineStage {
    return async (request, next) => {
        const startedAt = now();
        const target = `${request.method} ${redactUrl(request.url)}`;
        try {
            const response = await next(request);
            logger.debug(`[HttpTransport] ${target} -> ${response.status} (${now() - startedAt}ms)`);
            return response;
        } catch (error) {
            const code = error instanceof Error && 'code' in error ? String(error.code) : 'error';
            logger.debug(`[HttpTransport] ${target} failed: ${code} (${now() - startedAt}ms)`);
            throw error;
        }
    };
}
