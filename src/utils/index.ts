/**
 * @fileoverview Public exports for the utils module.
 * @module utils
 * @version 1.0.0
 */

export { EventEmitter } from './EventEmitter';
export { DEFAULT_LOGGER, SILENT_LOGGER } from './logger';
export { redactSensitiveTokens, redactUrl } from './redact';
export { MemoryStorage, FileStorage, safeStorageGet, safeStorageSet, safeStorageRemove, listKeysWithPrefix } from './storage';
export { linkAbortSignals, raceWithSignal } from './abort';
export type { LinkedAbort } from './abort';
export type { IEventEmitter, IDisposable, Logger } from './interfaces';
export type { StorageLike } from './storage';
