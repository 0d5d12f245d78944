/**
 * @fileoverview Unit tests for AuthCoordinator against the in-process server.
 * @module modules/session/__tests__/AuthCoordinator.test
 */

import { AppErrorCode } from '../../../types/app-errors';
import { RefreshState } from '../types';
import { CREDENTIALS, SERVER_URL, createGate, createHarness, flush } from './fakeServer';

describe('AuthCoordinator', () => {
    let harness: ReturnType<typeof createHarness>;

    beforeEach(async () => {
        harness = createHarness({ defaultBaseMs: 1, busyBaseMs: 1, capMs: 5 });
        await harness.sessionManager.login(SERVER_URL, CREDENTIALS);
    });

    afterEach(() => {
        harness.sessionManager.dispose();
    });

    it('should send the request with the current token', async () => {
        const response = await harness.coordinator.execute({ path: '/Users/Me' });

        expect(response.status).toBe(200);
        expect(response.body).toBe('{"path":"/Users/Me"}');
        expect(harness.server.state.apiTokens).toEqual(['token-1']);
    });

    it('should refresh exactly once for concurrent 401s', async () => {
        const { coordinator, server, sessionManager } = harness;
        server.state.validTokens.clear();
        const gate = createGate();
        server.state.authGate = gate;

        const requests = [0, 1, 2, 3, 4].map((i) => coordinator.execute({ path: `/Items/${i}` }));
        await flush();
        expect(sessionManager.refreshState).toBe(RefreshState.Refreshing);

        gate.open();
        const responses = await Promise.all(requests);

        expect(responses.map((r) => r.status)).toEqual([200, 200, 200, 200, 200]);
        expect(server.state.authCalls).toBe(2);
        expect(server.state.apiTokens.filter((t) => t === 'token-1')).toHaveLength(5);
        expect(server.state.apiTokens.filter((t) => t === 'token-2')).toHaveLength(5);
        expect(sessionManager.session?.accessToken).toBe('token-2');
    });

    it('should surface AUTH_EXPIRED when the new token is rejected too', async () => {
        const { coordinator, server, sessionManager } = harness;
        server.state.acceptTokens = false;

        await expect(coordinator.execute({ path: '/Users/Me' })).rejects.toMatchObject({
            code: AppErrorCode.AUTH_EXPIRED,
            httpStatus: 401,
        });

        expect(server.state.authCalls).toBe(2);
        expect(server.state.apiTokens).toEqual(['token-1', 'token-2']);
        expect(sessionManager.refreshState).toBe(RefreshState.Idle);
    });

    it('should fail fast once the session is Failed', async () => {
        const { coordinator, server, sessionManager } = harness;
        server.state.validTokens.clear();
        server.state.authStatus = 401;

        await expect(coordinator.execute({ path: '/Users/Me' })).rejects.toMatchObject({
            code: AppErrorCode.AUTH_EXPIRED,
        });
        expect(sessionManager.refreshState).toBe(RefreshState.Failed);

        await expect(coordinator.execute({ path: '/Users/Me' })).rejects.toMatchObject({
            code: AppErrorCode.AUTH_EXPIRED,
        });
        expect(server.state.apiTokens).toEqual(['token-1']);
        expect(server.state.authCalls).toBe(2);
    });

    it('should not retry the request after a refresh that ran out of attempts on a busy server', async () => {
        const { coordinator, retryPolicy, server, sessionManager } = harness;
        server.state.validTokens.clear();
        server.state.authStatus = 503;
        const wait = jest.spyOn(retryPolicy, 'wait');

        await expect(coordinator.execute({ path: '/Users/Me' })).rejects.toMatchObject({
            code: AppErrorCode.AUTH_EXPIRED,
            httpStatus: 503,
            attempts: 1,
        });

        // the two backoffs belong to the token exchange inside the refresh
        expect(wait).toHaveBeenCalledTimes(2);
        expect(server.state.authCalls).toBe(4);
        expect(server.state.apiTokens).toEqual(['token-1']);
        expect(sessionManager.refreshState).toBe(RefreshState.Failed);
    });

    it('should not refresh on 403', async () => {
        await expect(harness.coordinator.execute({ path: '/Forbidden' })).rejects.toMatchObject({
            code: AppErrorCode.ACCESS_DENIED,
            httpStatus: 403,
            attempts: 1,
        });
        expect(harness.server.state.authCalls).toBe(1);
    });

    it('should retry a busy server', async () => {
        harness.server.state.busyResponses = 1;

        const response = await harness.coordinator.execute({ path: '/Busy' });

        expect(response.status).toBe(200);
        expect(harness.server.state.apiTokens).toEqual(['token-1', 'token-1']);
    });

    it('should honour a per-request attempt limit', async () => {
        harness.server.state.busyResponses = 1;

        await expect(harness.coordinator.execute({ path: '/Busy', maxAttempts: 1 })).rejects.toMatchObject({
            code: AppErrorCode.SERVER_BUSY,
            attempts: 1,
        });
    });

    it('should cancel in-flight requests on logout and require a new login', async () => {
        const { coordinator, server, sessionManager } = harness;
        server.state.apiGate = createGate();

        const assertion = expect(coordinator.execute({ path: '/Users/Me' })).rejects.toMatchObject({
            code: AppErrorCode.CANCELLED,
        });
        await flush();
        await sessionManager.logout();
        await assertion;

        await expect(coordinator.execute({ path: '/Users/Me' })).rejects.toMatchObject({
            code: AppErrorCode.AUTH_REQUIRED,
        });
    });

    it('should cancel on the caller signal without touching the session', async () => {
        const { coordinator, server, sessionManager } = harness;
        server.state.apiGate = createGate();
        const controller = new AbortController();

        const assertion = expect(coordinator.execute({ path: '/Users/Me', signal: controller.signal })).rejects.toMatchObject({
            code: AppErrorCode.CANCELLED,
        });
        await flush();
        controller.abort();
        await assertion;

        expect(sessionManager.refreshState).toBe(RefreshState.Idle);
        expect(sessionManager.session?.accessToken).toBe('token-1');
    });
});
