/**
 * @fileoverview In-process media server stand-in shared by the session tests.
 * @module modules/session/__tests__/fakeServer
 */

import { EncryptedPreferences } from '../../security/EncryptedPreferences';
import { RetryPolicy } from '../../retry/RetryPolicy';
import type { RetryPolicyConfig } from '../../retry/interfaces';
import { ClientCache } from '../../transport/ClientCache';
import type { IHttpTransport } from '../../transport/interfaces';
import type { ClientIdentity, ServerResponse, TransportRequest } from '../../transport/types';
import { raceWithSignal } from '../../../utils/abort';
import { SILENT_LOGGER } from '../../../utils/logger';
import { MemoryStorage } from '../../../utils/storage';
import { AuthCoordinator } from '../AuthCoordinator';
import { SessionManager } from '../SessionManager';
import { TokenExchange } from '../TokenExchange';

export const SERVER_URL = 'https://media.test';
export const CREDENTIALS = { username: 'alice', password: 'test-password' };

export const identity: ClientIdentity = {
    client: 'Test Client',
    device: 'ci',
    deviceId: 'dev-1',
    version: '1.0.0',
};

export interface Gate {
    promise: Promise<void>;
    open(): void;
}

export function createGate(): Gate {
    let release: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
        release = resolve;
    });
    return { promise, open: () => release() };
}

/** Drain pending promise continuations. Real timers only. */
export function flush(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

export interface FakeServerState {
    /** Tokens the server currently accepts */
    validTokens: Set<string>;
    /** When false every token is rejected */
    acceptTokens: boolean;
    authStatus: number;
    authGate: Gate | null;
    apiGate: Gate | null;
    authCalls: number;
    /** Token seen on each API call, in order */
    apiTokens: string[];
    /** 503 responses left for /Busy */
    busyResponses: number;
    quickConnectEnabled: boolean;
    /** Whether a signed-in device approved the pending Quick Connect request */
    quickConnectApproved: boolean;
    quickConnectCalls: number;
}

export const QUICK_CONNECT_SECRET = 'test-secret';

function abortError(): Error {
    return Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });
}

async function waitAt(gate: Gate | null, signal: AbortSignal | undefined): Promise<void> {
    if (gate) {
        await raceWithSignal(gate.promise, signal, abortError);
    }
}

export function createFakeServer(): { transport: jest.Mocked<IHttpTransport>; state: FakeServerState } {
    const state: FakeServerState = {
        validTokens: new Set(),
        acceptTokens: true,
        authStatus: 200,
        authGate: null,
        apiGate: null,
        authCalls: 0,
        apiTokens: [],
        busyResponses: 0,
        quickConnectEnabled: true,
        quickConnectApproved: false,
        quickConnectCalls: 0,
    };
    let issued = 0;

    const respond = (req: TransportRequest, status: number, body: string = ''): ServerResponse => ({
        status,
        headers: {},
        body,
        url: req.url,
    });

    const issueToken = (req: TransportRequest, userName: string): ServerResponse => {
        issued++;
        const token = `token-${issued}`;
        state.validTokens.add(token);
        return respond(
            req,
            200,
            JSON.stringify({ AccessToken: token, ServerId: 'srv-1', User: { Id: 'user-1', Name: userName } })
        );
    };

    const transport: jest.Mocked<IHttpTransport> = {
        send: jest.fn(async (req: TransportRequest): Promise<ServerResponse> => {
            const { pathname } = new URL(req.url);

            if (pathname === '/Users/AuthenticateByName') {
                state.authCalls++;
                await waitAt(state.authGate, req.signal);
                if (state.authStatus !== 200) {
                    return respond(req, state.authStatus);
                }
                return issueToken(req, 'alice');
            }

            if (pathname === '/QuickConnect/Initiate') {
                if (!state.quickConnectEnabled) {
                    return respond(req, 401);
                }
                return respond(req, 200, JSON.stringify({ Code: '123456', Secret: QUICK_CONNECT_SECRET }));
            }
            if (pathname === '/QuickConnect/Connect') {
                if (new URL(req.url).searchParams.get('secret') !== QUICK_CONNECT_SECRET) {
                    return respond(req, 404);
                }
                return respond(req, 200, JSON.stringify({ Authenticated: state.quickConnectApproved }));
            }
            if (pathname === '/Users/AuthenticateWithQuickConnect') {
                state.quickConnectCalls++;
                if (!state.quickConnectApproved || req.body !== JSON.stringify({ Secret: QUICK_CONNECT_SECRET })) {
                    return respond(req, 401);
                }
                return issueToken(req, 'bob');
            }

            const token = /Token="([^"]+)"/.exec(req.headers['Authorization'] ?? '')?.[1] ?? '';
            state.apiTokens.push(token);
            await waitAt(state.apiGate, req.signal);
            if (!state.acceptTokens || !state.validTokens.has(token)) {
                return respond(req, 401);
            }
            if (pathname === '/Forbidden') {
                return respond(req, 403);
            }
            if (pathname === '/Busy' && state.busyResponses > 0) {
                state.busyResponses--;
                return respond(req, 503);
            }
            return respond(req, 200, JSON.stringify({ path: pathname }));
        }),
        use: jest.fn(),
        defaultTimeoutMs: 1000,
        close: jest.fn(async (): Promise<void> => undefined),
    };

    return { transport, state };
}

export function createHarness(retry: RetryPolicyConfig = {}) {
    const server = createFakeServer();
    const storage = new MemoryStorage();
    const preferences = new EncryptedPreferences({ storage, key: Buffer.alloc(32, 7), logger: SILENT_LOGGER });
    const retryPolicy = new RetryPolicy({ random: () => 0.5, logger: SILENT_LOGGER, ...retry });
    const clientCache = new ClientCache({ transport: server.transport, identity, logger: SILENT_LOGGER });
    const tokenExchange = new TokenExchange({ transport: server.transport, identity, logger: SILENT_LOGGER });
    const trustStore = { revokePin: jest.fn(async (_hostname: string): Promise<boolean> => true) };
    const sessionManager = new SessionManager({
        tokenExchange,
        clientCache,
        retryPolicy,
        preferences,
        trustStore,
        now: () => Date.now(),
        logger: SILENT_LOGGER,
    });
    const coordinator = new AuthCoordinator({ sessionManager, clientCache, retryPolicy, logger: SILENT_LOGGER });

    return { server, storage, preferences, retryPolicy, clientCache, tokenExchange, trustStore, sessionManager, coordinator };
}
