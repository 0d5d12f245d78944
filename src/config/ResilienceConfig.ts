/**
 * @fileoverview Resilience configuration: defaults, persisted overrides and validation.
 * @module config/ResilienceConfig
 * @version 1.0.0
 */

import type { IEncryptedPreferences } from '../modules/security/interfaces';
import { isServerApiError } from '../types/app-errors';
import type { Logger } from '../utils/interfaces';
import { DEFAULT_LOGGER } from '../utils/logger';
import { SESSION_STORAGE_KEYS } from './storageKeys';

/**
 * Tunables for retry, refresh, discovery and pinning behaviour.
 */
export interface ResilienceConfig {
    /** Total attempts per request, first try included */
    maxRetryAttempts: number;
    /** Fraction of the token validity window after which a refresh is started */
    proactiveRefreshFraction: number;
    /** Per-probe timeout during discovery */
    probeTimeoutMs: number;
    /** Probe timeout multiplier on metered connections */
    meteredProbeTimeoutMultiplier: number;
    /** Attempts per discovery probe */
    probeMaxAttempts: number;
    /** Candidates probed concurrently */
    discoveryBatchSize: number;
    /** Per-dispatch timeout for authenticated requests */
    requestTimeoutMs: number;
    /** Timeout for a whole refresh episode */
    refreshTimeoutMs: number;
    /** Validity window assumed when the server gives none */
    defaultTokenValidityMs: number;
    /** Remove the server's pins on logout */
    clearPinsOnLogout: boolean;
}

export const DEFAULT_RESILIENCE_CONFIG: Readonly<ResilienceConfig> = Object.freeze({
    maxRetryAttempts: 3,
    proactiveRefreshFraction: 0.8,
    probeTimeoutMs: 5000,
    meteredProbeTimeoutMultiplier: 2,
    probeMaxAttempts: 1,
    discoveryBatchSize: 4,
    requestTimeoutMs: 30000,
    refreshTimeoutMs: 15000,
    defaultTokenValidityMs: 50 * 60 * 1000,
    clearPinsOnLogout: false,
});

type FieldValidator = (value: unknown) => boolean;

const isPositiveInteger: FieldValidator = (value) =>
    typeof value === 'number' && Number.isInteger(value) && value >= 1;

const isPositiveNumber: FieldValidator = (value) =>
    typeof value === 'number' && Number.isFinite(value) && value > 0;

const VALIDATORS: Record<keyof ResilienceConfig, FieldValidator> = {
    maxRetryAttempts: (value) => isPositiveInteger(value) && typeof value === 'number' && value <= 10,
    proactiveRefreshFraction: (value) => typeof value === 'number' && value > 0 && value < 1,
    probeTimeoutMs: isPositiveNumber,
    meteredProbeTimeoutMultiplier: (value) => typeof value === 'number' && Number.isFinite(value) && value >= 1,
    probeMaxAttempts: isPositiveInteger,
    discoveryBatchSize: isPositiveInteger,
    requestTimeoutMs: isPositiveNumber,
    refreshTimeoutMs: isPositiveNumber,
    defaultTokenValidityMs: isPositiveNumber,
    clearPinsOnLogout: (value) => typeof value === 'boolean',
};

function isConfigField(field: string): field is keyof ResilienceConfig {
    return Object.prototype.hasOwnProperty.call(VALIDATORS, field);
}

/**
 * Keep the valid fields of an untrusted override object.
 * Unknown and invalid fields are logged and dropped.
 */
export function validateConfigOverrides(input: unknown, logger: Logger = DEFAULT_LOGGER): Partial<ResilienceConfig> {
    const result: Partial<ResilienceConfig> = {};
    if (typeof input !== 'object' || input === null || Array.isArray(input)) {
        if (input !== null && input !== undefined) {
            logger.warn('[ResilienceConfig] Ignoring overrides: expected an object');
        }
        return result;
    }

    for (const [field, value] of Object.entries(input)) {
        if (!isConfigField(field)) {
            logger.warn(`[ResilienceConfig] Ignoring unknown field: ${field}`);
            continue;
        }
        if (!VALIDATORS[field](value)) {
            logger.warn(`[ResilienceConfig] Ignoring invalid value for ${field}:`, value);
            continue;
        }
        assignField(result, field, value);
    }
    return result;
}

function assignField(target: Partial<ResilienceConfig>, field: keyof ResilienceConfig, value: unknown): void {
    if (field === 'clearPinsOnLogout') {
        if (typeof value === 'boolean') target.clearPinsOnLogout = value;
        return;
    }
    if (typeof value === 'number') {
        target[field] = value;
    }
}

/**
 * Read persisted overrides from the encrypted store.
 * A corrupted entry is logged and treated as absent.
 */
export function loadPersistedOverrides(
    preferences: IEncryptedPreferences,
    logger: Logger = DEFAULT_LOGGER
): Partial<ResilienceConfig> {
    let stored: unknown;
    try {
        stored = preferences.getJson(SESSION_STORAGE_KEYS.CONFIG_OVERRIDES);
    } catch (error) {
        if (!isServerApiError(error)) {
            throw error;
        }
        logger.warn('[ResilienceConfig] Persisted overrides unreadable, using defaults:', error.code);
        return {};
    }
    return validateConfigOverrides(stored, logger);
}

/**
 * Persist overrides after validation.
 * @returns The overrides that were stored
 */
export function savePersistedOverrides(
    preferences: IEncryptedPreferences,
    overrides: Partial<ResilienceConfig>,
    logger: Logger = DEFAULT_LOGGER
): Partial<ResilienceConfig> {
    const valid = validateConfigOverrides(overrides, logger);
    preferences.setJson(SESSION_STORAGE_KEYS.CONFIG_OVERRIDES, valid);
    return valid;
}

/**
 * Merge defaults, persisted overrides and caller overrides, in that order.
 */
export function resolveResilienceConfig(options: {
    preferences?: IEncryptedPreferences;
    overrides?: Partial<ResilienceConfig>;
    logger?: Logger;
} = {}): ResilienceConfig {
    const logger = options.logger ?? DEFAULT_LOGGER;
    const persisted = options.preferences ? loadPersistedOverrides(options.preferences, logger) : {};
    const explicit = options.overrides ? validateConfigOverrides(options.overrides, logger) : {};
    return { ...DEFAULT_RESILIENCE_CONFIG, ...persisted, ...explicit };
}
