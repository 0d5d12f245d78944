/**
 * @fileoverview Console-backed default logger.
 * @module utils/logger
 * @version 1.0.0
 */

import type { Logger } from './interfaces';

/**
 * Logger used when a component is constructed without one.
 * Debug output is dropped unless MEDIA_SESSION_DEBUG is set.
 */
export const DEFAULT_LOGGER: Logger = {
    debug: (message: string, ...details: unknown[]): void => {
        if (process.env['MEDIA_SESSION_DEBUG']) {
            console.debug(message, ...details);
        }
    },
    info: (message: string, ...details: unknown[]): void => {
        console.info(message, ...details);
    },
    warn: (message: string, ...details: unknown[]): void => {
        console.warn(message, ...details);
    },
    error: (message: string, ...details: unknown[]): void => {
        console.error(message, ...details);
    },
};

/** Logger that discards everything. */
export const SILENT_LOGGER: Logger = {
    debug: (): void => undefined,
    info: (): void => undefined,
    warn: (): void => undefined,
    error: (): void => undefined,
};
