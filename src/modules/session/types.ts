/**
 * @fileoverview Type definitions for the session module.
 * @module modules/session/types
 * @version 1.0.0
 */

import type { AppError } from '../../types/app-errors';

/**
 * Refresh lifecycle of a session.
 * Failed only returns to Idle through a new login.
 */
export enum RefreshState {
    Idle = 'idle',
    Refreshing = 'refreshing',
    Failed = 'failed',
}

/** Why a refresh was started. */
export type RefreshReason = 'reactive' | 'proactive' | 'manual';

export interface Credentials {
    username: string;
    password: string;
}

/**
 * Code shown to the user and secret kept by the client while a Quick Connect
 * request waits for approval from a signed-in device.
 */
export interface QuickConnectChallenge {
    code: string;
    secret: string;
}

/**
 * A Quick Connect request bound to the endpoint it was started on.
 */
export interface QuickConnectRequest extends QuickConnectChallenge {
    serverUrl: string;
}

/** Server-side state of a Quick Connect request. */
export type QuickConnectStatus = 'pending' | 'approved' | 'expired';

/**
 * Parsed result of the token exchange.
 */
export interface TokenGrant {
    accessToken: string;
    userId: string;
    userName: string;
    serverId: string;
    /** Validity window; the configured default when the server gives none */
    validityMs: number;
}

/**
 * One authenticated session against one server.
 */
export interface ServerSession {
    serverUrl: string;
    serverId: string;
    userId: string;
    userName: string;
    /** Never empty unless refreshState is Failed */
    accessToken: string;
    /** Epoch ms when the current token was issued */
    tokenIssuedAt: number;
    /** Token validity window in ms */
    tokenValidityWindow: number;
    refreshState: RefreshState;
}

export interface LogoutOptions {
    /** Remove the server's certificate pin as well */
    clearPins?: boolean;
}

/**
 * Events emitted by the session manager.
 */
export interface SessionEvents extends Record<string, unknown> {
    /** Refresh state transitions */
    stateChange: { previous: RefreshState; current: RefreshState };
    /** A new token was installed (login, refresh or restore) */
    tokenChange: { serverUrl: string; userId: string; issuedAt: number; reason: RefreshReason | 'login' | 'restore' };
    /** A refresh failed; the session stays Failed until the next login */
    refreshFailed: { error: AppError };
    /** The session was cleared */
    sessionEnd: { reason: 'logout' };
}
