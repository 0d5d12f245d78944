/**
 * @fileoverview Public API of the media session core.
 * @module index
 * @version 1.0.0
 */

export * from './core';
export * from './config';
export * from './types';
export * from './modules/retry';
export * from './modules/security';
export * from './modules/transport';
export * from './modules/discovery';
export * from './modules/session';
export {
    EventEmitter,
    DEFAULT_LOGGER,
    SILENT_LOGGER,
    redactSensitiveTokens,
    MemoryStorage,
    FileStorage,
} from './utils';
export type { IDisposable, Logger, StorageLike } from './utils';
