/**
 * @fileoverview Integration tests for ServerConnection with an in-process fetch.
 * @module core/__tests__/ServerConnection.test
 */

import { ServerConnection } from '../ServerConnection';
import { AppErrorCode } from '../../types/app-errors';
import type { FetchInitLike, FetchLike, FetchResponseLike } from '../../modules/transport/types';
import { RefreshState } from '../../modules/session/types';
import { SILENT_LOGGER } from '../../utils/logger';
import { MemoryStorage } from '../../utils/storage';

const BASE_URL = 'https://media.test:8096';
const CREDENTIALS = { username: 'alice', password: 'test-password' };

interface FakeMediaServer {
    fetch: FetchLike;
    validTokens: Set<string>;
    requestedUrls: string[];
    quickConnectApproved: boolean;
}

function response(status: number, body: unknown = ''): FetchResponseLike {
    return {
        status,
        url: '',
        headers: { forEach: (): void => undefined },
        text: async (): Promise<string> => (typeof body === 'string' ? body : JSON.stringify(body)),
    };
}

function connectionRefused(): Error {
    return Object.assign(new TypeError('fetch failed'), {
        cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }),
    });
}

function createFakeMediaServer(): FakeMediaServer {
    const validTokens = new Set<string>();
    const requestedUrls: string[] = [];
    let issued = 0;
    const issueToken = (userName: string): FetchResponseLike => {
        issued++;
        const token = `token-${issued}`;
        validTokens.add(token);
        return response(200, { AccessToken: token, ServerId: 'srv-1', User: { Id: 'user-1', Name: userName } });
    };

    const fetch = jest.fn(async (url: string, init: FetchInitLike): Promise<FetchResponseLike> => {
        requestedUrls.push(`${init.method} ${url}`);
        if (!url.startsWith(`${BASE_URL}/`)) {
            throw connectionRefused();
        }
        const path = url.slice(BASE_URL.length);
        if (path === '/System/Info/Public') {
            return response(200, { Id: 'srv-1', ServerName: 'Den', Version: '10.9.0', ProductName: 'Jellyfin Server' });
        }
        if (path === '/Users/AuthenticateByName') {
            return issueToken('alice');
        }
        if (path === '/QuickConnect/Initiate') {
            return response(200, { Code: '123456', Secret: 'test-secret', Authenticated: false });
        }
        if (path === '/QuickConnect/Connect?secret=test-secret') {
            return response(200, { Authenticated: fake.quickConnectApproved });
        }
        if (path === '/Users/AuthenticateWithQuickConnect') {
            return fake.quickConnectApproved && init.body === '{"Secret":"test-secret"}'
                ? issueToken('bob')
                : response(401);
        }
        const token = /Token="([^"]+)"/.exec(init.headers['Authorization'] ?? '')?.[1];
        if (!token || !validTokens.has(token)) {
            return response(401);
        }
        return response(200, { Name: 'alice' });
    });

    const fake: FakeMediaServer = { fetch, validTokens, requestedUrls, quickConnectApproved: false };
    return fake;
}

describe('ServerConnection', () => {
    let storage: MemoryStorage;
    let server: FakeMediaServer;
    const connections: ServerConnection[] = [];

    function connect(config: ConstructorParameters<typeof ServerConnection>[0]['config'] = {}): ServerConnection {
        const connection = new ServerConnection({
            storage,
            encryptionKey: Buffer.alloc(32, 9),
            client: { client: 'Test Client', device: 'ci', version: '1.0.0' },
            config,
            fetch: server.fetch,
            random: () => 0.5,
            logger: SILENT_LOGGER,
        });
        connections.push(connection);
        return connection;
    }

    beforeEach(() => {
        storage = new MemoryStorage();
        server = createFakeMediaServer();
    });

    afterEach(async () => {
        await Promise.all(connections.splice(0).map((connection) => connection.dispose()));
    });

    it('should discover the endpoint, sign in and execute requests', async () => {
        const connection = connect();

        const session = await connection.login('media.test', CREDENTIALS);

        expect(session.serverUrl).toBe(BASE_URL);
        expect(session.accessToken).toBe('token-1');
        expect(session.refreshState).toBe(RefreshState.Idle);

        const me = await connection.execute({ path: '/Users/Me' });
        expect(me.status).toBe(200);
        expect(me.body).toBe('{"Name":"alice"}');
        expect(server.requestedUrls).toContain(`GET ${BASE_URL}/Users/Me`);
    });

    it('should recover from an expired token transparently', async () => {
        const connection = connect();
        await connection.login('media.test', CREDENTIALS);
        server.validTokens.clear();

        const me = await connection.execute({ path: '/Users/Me' });

        expect(me.status).toBe(200);
        expect(connection.session?.accessToken).toBe('token-2');
    });

    it('should sign in through an approved Quick Connect request', async () => {
        const connection = connect();

        const request = await connection.initiateQuickConnect('media.test');

        expect(request).toEqual({ serverUrl: BASE_URL, code: '123456', secret: 'test-secret' });
        await expect(connection.getQuickConnectState(request)).resolves.toBe('pending');

        server.quickConnectApproved = true;
        await expect(connection.getQuickConnectState(request)).resolves.toBe('approved');

        const session = await connection.loginWithQuickConnect(request);
        expect(session).toMatchObject({ serverUrl: BASE_URL, accessToken: 'token-1', userName: 'bob' });

        const me = await connection.execute({ path: '/Users/Me' });
        expect(me.status).toBe(200);
    });

    it('should fail with NO_REACHABLE_ENDPOINT when no candidate answers', async () => {
        const connection = connect();

        await expect(connection.login('elsewhere.test', CREDENTIALS)).rejects.toMatchObject({
            code: AppErrorCode.NO_REACHABLE_ENDPOINT,
            attempts: 10,
        });
        expect(connection.session).toBeNull();
    });

    it('should restore a persisted session in a new connection', async () => {
        await connect().login('media.test', CREDENTIALS);

        const restored = await connect().restore();

        expect(restored).toMatchObject({ serverUrl: BASE_URL, accessToken: 'token-1' });
    });

    it('should require a new login after logout', async () => {
        const connection = connect();
        await connection.login('media.test', CREDENTIALS);

        await connection.logout();

        await expect(connection.execute({ path: '/Users/Me' })).rejects.toMatchObject({
            code: AppErrorCode.AUTH_REQUIRED,
        });
        await expect(connect().restore()).resolves.toBeNull();
    });

    it('should apply persisted config overrides below explicit ones', () => {
        connect().saveConfigOverrides({ discoveryBatchSize: 2, maxRetryAttempts: 5 });

        const connection = connect({ maxRetryAttempts: 4 });

        expect(connection.config.discoveryBatchSize).toBe(2);
        expect(connection.config.maxRetryAttempts).toBe(4);
        expect(connection.config.probeTimeoutMs).toBe(5000);
    });
});
