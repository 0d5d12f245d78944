/**
 * @fileoverview Session helpers: device identity, response parsing and persisted records.
 * @module modules/session/helpers
 * @version 1.0.0
 */

import { randomUUID } from 'node:crypto';
import { SESSION_STORAGE_KEYS } from '../../config/storageKeys';
import { AppErrorCode, ServerApiError } from '../../types/app-errors';
import type { Logger } from '../../utils/interfaces';
import { DEFAULT_LOGGER } from '../../utils/logger';
import type { IEncryptedPreferences } from '../security/interfaces';
import { readObject, readString } from '../transport/response';
import { SESSION_CONSTANTS } from './constants';
import type { Credentials, TokenGrant } from './types';

/**
 * Session fields persisted between runs.
 */
export interface StoredSession {
    version: number;
    serverUrl: string;
    serverId: string;
    userId: string;
    userName: string;
    accessToken: string;
    tokenIssuedAt: number;
    tokenValidityWindow: number;
}

/**
 * Get the persisted device identifier, creating one on first use.
 */
export function getOrCreateDeviceId(preferences: IEncryptedPreferences, logger: Logger = DEFAULT_LOGGER): string {
    let existing: string | null = null;
    try {
        existing = preferences.get(SESSION_STORAGE_KEYS.DEVICE_ID);
    } catch (error) {
        if (!(error instanceof ServerApiError)) {
            throw error;
        }
        logger.warn('[Session] Stored device id unreadable, generating a new one');
    }
    if (existing) {
        return existing;
    }
    const deviceId = randomUUID();
    preferences.set(SESSION_STORAGE_KEYS.DEVICE_ID, deviceId);
    return deviceId;
}

/**
 * Storage suffix for a server: its host, including any port.
 */
function serverKey(serverUrl: string): string {
    try {
        return new URL(serverUrl).host.toLowerCase();
    } catch {
        return serverUrl;
    }
}

export function sessionStorageKey(serverUrl: string): string {
    return `${SESSION_STORAGE_KEYS.SESSION_PREFIX}${serverKey(serverUrl)}`;
}

export function credentialsStorageKey(serverUrl: string): string {
    return `${SESSION_STORAGE_KEYS.CREDENTIALS_PREFIX}${serverKey(serverUrl)}`;
}

/**
 * Parse the token exchange response.
 * @throws ServerApiError when no access token is present
 */
export function parseAuthenticationResponse(
    payload: unknown,
    fallbackUserName: string,
    defaultValidityMs: number = SESSION_CONSTANTS.DEFAULT_TOKEN_VALIDITY_MS
): TokenGrant {
    const accessToken = readString(payload, 'AccessToken');
    if (!accessToken) {
        throw new ServerApiError(AppErrorCode.UNKNOWN, 'Authentication response did not include an access token');
    }
    const user = readObject(payload, 'User');
    return {
        accessToken,
        userId: readString(user, 'Id') ?? '',
        userName: readString(user, 'Name') ?? fallbackUserName,
        serverId: readString(payload, 'ServerId') ?? '',
        validityMs: defaultValidityMs,
    };
}

export function parseStoredSession(value: unknown): StoredSession | null {
    if (typeof value !== 'object' || value === null) {
        return null;
    }
    const serverUrl = readString(value, 'serverUrl');
    const accessToken = readString(value, 'accessToken');
    const tokenIssuedAt: unknown = Reflect.get(value, 'tokenIssuedAt');
    const tokenValidityWindow: unknown = Reflect.get(value, 'tokenValidityWindow');
    if (
        !serverUrl ||
        !accessToken ||
        typeof tokenIssuedAt !== 'number' ||
        typeof tokenValidityWindow !== 'number' ||
        tokenValidityWindow <= 0
    ) {
        return null;
    }
    return {
        version: SESSION_CONSTANTS.STORAGE_VERSION,
        serverUrl,
        serverId: readString(value, 'serverId') ?? '',
        userId: readString(value, 'userId') ?? '',
        userName: readString(value, 'userName') ?? '',
        accessToken,
        tokenIssuedAt,
        tokenValidityWindow,
    };
}

/**
 * Parse persisted credentials. An empty password is valid: accounts may have none.
 */
export function parseStoredCredentials(value: unknown): Credentials | null {
    const username = readString(value, 'username');
    if (!username || typeof value !== 'object' || value === null) {
        return null;
    }
    const password: unknown = Reflect.get(value, 'password');
    return typeof password === 'string' ? { username, password } : null;
}
