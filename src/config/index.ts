/**
 * @fileoverview Public exports for configuration.
 * @module config
 * @version 1.0.0
 */

export {
    DEFAULT_RESILIENCE_CONFIG,
    validateConfigOverrides,
    loadPersistedOverrides,
    savePersistedOverrides,
    resolveResilienceConfig,
} from './ResilienceConfig';
export type { ResilienceConfig } from './ResilienceConfig';
export { SESSION_STORAGE_KEYS } from './storageKeys';
