/**
 * @fileoverview Public exports for the session module.
 * @module modules/session
 * @version 1.0.0
 */

export { SessionManager } from './SessionManager';
export { AuthCoordinator } from './AuthCoordinator';
export { TokenExchange } from './TokenExchange';
export {
    getOrCreateDeviceId,
    parseAuthenticationResponse,
    sessionStorageKey,
    credentialsStorageKey,
} from './helpers';
export { SESSION_CONSTANTS, SESSION_ERROR_MESSAGES } from './constants';
export { RefreshState } from './types';
export type {
    RefreshReason,
    Credentials,
    TokenGrant,
    ServerSession,
    LogoutOptions,
    SessionEvents,
    QuickConnectChallenge,
    QuickConnectRequest,
    QuickConnectStatus,
} from './types';
export type {
    ISessionManager,
    SessionManagerConfig,
    IAuthCoordinator,
    AuthCoordinatorConfig,
    ITokenExchange,
    TokenExchangeConfig,
    PendingRefresh,
} from './interfaces';
