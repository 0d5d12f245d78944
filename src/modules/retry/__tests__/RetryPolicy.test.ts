/**
 * @fileoverview Unit tests for the retry policy.
 * @module modules/retry/__tests__/RetryPolicy.test
 */

import { RetryPolicy } from '../RetryPolicy';
import { ErrorClass, RetryAttemptInfo } from '../types';
import { errorForStatus, parseRetryAfter, normalizeTransportError } from '../errorMapping';
import { AppErrorCode, ServerApiError } from '../../../types/app-errors';
import type { Logger } from '../../../utils/interfaces';

function createMockLogger(): jest.Mocked<Logger> {
    return {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
}

function codedError(message: string, code: string): Error {
    return Object.assign(new Error(message), { code });
}

describe('RetryPolicy', () => {
    let logger: jest.Mocked<Logger>;

    beforeEach(() => {
        logger = createMockLogger();
    });

    describe('classify', () => {
        const policy = new RetryPolicy({ logger: createMockLogger() });

        it('should classify busy statuses as RetryBusy', () => {
            expect(policy.classify(503)).toBe(ErrorClass.RetryBusy);
            expect(policy.classify(429)).toBe(ErrorClass.RetryBusy);
        });

        it('should classify transient statuses as RetryIdempotent', () => {
            expect(policy.classify(408)).toBe(ErrorClass.RetryIdempotent);
            expect(policy.classify(500)).toBe(ErrorClass.RetryIdempotent);
            expect(policy.classify(502)).toBe(ErrorClass.RetryIdempotent);
            expect(policy.classify(504)).toBe(ErrorClass.RetryIdempotent);
        });

        it('should classify 401 and 403 as NonRetryAuth', () => {
            expect(policy.classify(401)).toBe(ErrorClass.NonRetryAuth);
            expect(policy.classify(403)).toBe(ErrorClass.NonRetryAuth);
        });

        it('should classify 404, other 4xx and 501 as NonRetryClient', () => {
            expect(policy.classify(404)).toBe(ErrorClass.NonRetryClient);
            expect(policy.classify(400)).toBe(ErrorClass.NonRetryClient);
            expect(policy.classify(501)).toBe(ErrorClass.NonRetryClient);
        });

        it('should classify DNS failures as NonRetryDns', () => {
            expect(policy.classify(codedError('getaddrinfo ENOTFOUND media.test', 'ENOTFOUND')))
                .toBe(ErrorClass.NonRetryDns);
        });

        it('should look through the cause chain of wrapped fetch errors', () => {
            const wrapped = new TypeError('fetch failed', {
                cause: codedError('connect ECONNREFUSED', 'ECONNREFUSED'),
            });
            expect(policy.classify(wrapped)).toBe(ErrorClass.RetryIdempotent);
        });

        it('should classify an error carrying an HTTP status by that status', () => {
            expect(policy.classify(errorForStatus(401))).toBe(ErrorClass.NonRetryAuth);
            expect(policy.classify(errorForStatus(503))).toBe(ErrorClass.RetryBusy);
        });

        it('should never retry auth outcomes or cancellations, whatever status they carry', () => {
            const expired = new ServerApiError(AppErrorCode.AUTH_EXPIRED, 'expired', { httpStatus: 503 });
            const invalid = new ServerApiError(AppErrorCode.AUTH_INVALID_CREDENTIALS, 'invalid', { httpStatus: 502 });
            const cancelled = new ServerApiError(AppErrorCode.CANCELLED, 'cancelled', { httpStatus: 429 });

            expect(policy.classify(expired)).toBe(ErrorClass.NonRetryAuth);
            expect(policy.classify(invalid)).toBe(ErrorClass.NonRetryAuth);
            expect(policy.classify(cancelled)).toBe(ErrorClass.NonRetryClient);
        });

        it('should treat pin mismatches and unknown errors as non-retryable', () => {
            const mismatch = new ServerApiError(AppErrorCode.CERTIFICATE_PIN_MISMATCH, 'pin mismatch');
            expect(policy.classify(mismatch)).toBe(ErrorClass.NonRetryClient);
            expect(policy.classify(new Error('boom'))).toBe(ErrorClass.NonRetryClient);
        });
    });

    describe('backoff', () => {
        it('should double the base delay per attempt and stop at the cap', () => {
            const policy = new RetryPolicy({ random: () => 0.5, logger });
            const delays = [0, 1, 2, 3, 4, 5].map((attempt) =>
                policy.backoff(attempt, ErrorClass.RetryIdempotent)
            );
            expect(delays).toEqual([1000, 2000, 4000, 8000, 10000, 10000]);
        });

        it('should use larger bases for busy and rate-limited servers', () => {
            const policy = new RetryPolicy({ random: () => 0.5, logger });
            expect(policy.backoff(0, ErrorClass.RetryBusy, 503)).toBe(2000);
            expect(policy.backoff(0, ErrorClass.RetryBusy, 429)).toBe(5000);
            expect(policy.backoff(1, ErrorClass.RetryBusy, 429)).toBe(10000);
        });

        it('should apply at most 10% jitter and never exceed the cap', () => {
            const high = new RetryPolicy({ random: () => 0.999, logger });
            const low = new RetryPolicy({ random: () => 0, logger });
            expect(high.backoff(0, ErrorClass.RetryIdempotent)).toBe(1100);
            expect(low.backoff(0, ErrorClass.RetryIdempotent)).toBe(900);
            expect(high.backoff(6, ErrorClass.RetryIdempotent)).toBe(10000);
        });

        it('should honor Retry-After within the cap', () => {
            const policy = new RetryPolicy({ random: () => 0.5, logger });
            expect(policy.backoff(2, ErrorClass.RetryBusy, 429, 3000)).toBe(3000);
            expect(policy.backoff(0, ErrorClass.RetryBusy, 429, 60000)).toBe(10000);
        });
    });

    describe('execute', () => {
        beforeEach(() => {
            jest.useFakeTimers();
        });

        afterEach(() => {
            jest.useRealTimers();
        });

        it('should retry busy responses with backoff and return the eventual result', async () => {
            const policy = new RetryPolicy({ random: () => 0.5, logger });
            const operation = jest.fn<Promise<string>, [number]>()
                .mockRejectedValueOnce(errorForStatus(503, 'media.test'))
                .mockRejectedValueOnce(errorForStatus(503, 'media.test'))
                .mockResolvedValue('ok');

            const promise = policy.execute(operation, { hostname: 'media.test' });

            await jest.advanceTimersByTimeAsync(1999);
            expect(operation).toHaveBeenCalledTimes(1);
            await jest.advanceTimersByTimeAsync(1);
            expect(operation).toHaveBeenCalledTimes(2);
            await jest.advanceTimersByTimeAsync(4000);

            await expect(promise).resolves.toBe('ok');
            expect(operation).toHaveBeenCalledTimes(3);
            expect(operation.mock.calls.map((call) => call[0])).toEqual([0, 1, 2]);
            expect(logger.warn).toHaveBeenCalledTimes(2);
        });

        it('should surface the last error stamped with attempts once exhausted', async () => {
            const policy = new RetryPolicy({ random: () => 0.5, logger });
            const operation = jest.fn<Promise<string>, [number]>()
                .mockRejectedValue(errorForStatus(500));

            const promise = policy.execute(operation, { hostname: 'media.test' });
            const assertion = expect(promise).rejects.toMatchObject({
                code: AppErrorCode.SERVER_ERROR,
                httpStatus: 500,
                attempts: 3,
                hostname: 'media.test',
            });

            await jest.advanceTimersByTimeAsync(1000);
            await jest.advanceTimersByTimeAsync(2000);
            await assertion;
            expect(operation).toHaveBeenCalledTimes(3);
        });

        it('should not retry non-retryable failures', async () => {
            const policy = new RetryPolicy({ logger });
            const operation = jest.fn<Promise<string>, [number]>()
                .mockRejectedValue(errorForStatus(404));

            await expect(policy.execute(operation)).rejects.toMatchObject({
                code: AppErrorCode.RESOURCE_NOT_FOUND,
                attempts: 1,
            });
            expect(operation).toHaveBeenCalledTimes(1);
        });

        it('should use the per-call attempt limit', async () => {
            const policy = new RetryPolicy({ logger });
            const operation = jest.fn<Promise<string>, [number]>()
                .mockRejectedValue(errorForStatus(503));

            await expect(policy.execute(operation, { maxAttempts: 1 })).rejects.toMatchObject({
                code: AppErrorCode.SERVER_BUSY,
                attempts: 1,
            });
            expect(operation).toHaveBeenCalledTimes(1);
        });

        it('should report each scheduled retry, including Retry-After delays', async () => {
            const policy = new RetryPolicy({ random: () => 0.5, logger });
            const retries: RetryAttemptInfo[] = [];
            const operation = jest.fn<Promise<string>, [number]>()
                .mockRejectedValueOnce(errorForStatus(429, 'media.test', 3000))
                .mockResolvedValue('ok');

            const promise = policy.execute(operation, {
                onRetry: (info) => retries.push(info),
            });
            await jest.advanceTimersByTimeAsync(3000);

            await expect(promise).resolves.toBe('ok');
            expect(retries).toHaveLength(1);
            expect(retries[0]?.attempt).toBe(0);
            expect(retries[0]?.delayMs).toBe(3000);
            expect(retries[0]?.errorClass).toBe(ErrorClass.RetryBusy);
        });

        it('should cancel a pending backoff when the signal aborts', async () => {
            const policy = new RetryPolicy({ random: () => 0.5, logger });
            const controller = new AbortController();
            const operation = jest.fn<Promise<string>, [number]>()
                .mockRejectedValue(errorForStatus(503));

            const promise = policy.execute(operation, { signal: controller.signal });
            const assertion = expect(promise).rejects.toMatchObject({
                code: AppErrorCode.CANCELLED,
                attempts: 1,
            });

            await jest.advanceTimersByTimeAsync(100);
            controller.abort();
            await assertion;
            expect(operation).toHaveBeenCalledTimes(1);
            expect(jest.getTimerCount()).toBe(0);
        });

        it('should not start when the signal is already aborted', async () => {
            const policy = new RetryPolicy({ logger });
            const controller = new AbortController();
            controller.abort();
            const operation = jest.fn<Promise<string>, [number]>().mockResolvedValue('ok');

            await expect(policy.execute(operation, { signal: controller.signal })).rejects.toMatchObject({
                code: AppErrorCode.CANCELLED,
            });
            expect(operation).not.toHaveBeenCalled();
        });
    });
});

describe('errorMapping', () => {
    describe('errorForStatus', () => {
        it('should map statuses to error codes', () => {
            expect(errorForStatus(401).code).toBe(AppErrorCode.AUTH_EXPIRED);
            expect(errorForStatus(403).code).toBe(AppErrorCode.ACCESS_DENIED);
            expect(errorForStatus(404).code).toBe(AppErrorCode.RESOURCE_NOT_FOUND);
            expect(errorForStatus(408).code).toBe(AppErrorCode.TIMEOUT);
            expect(errorForStatus(429).code).toBe(AppErrorCode.SERVER_BUSY);
            expect(errorForStatus(502).code).toBe(AppErrorCode.SERVER_ERROR);
            expect(errorForStatus(418).code).toBe(AppErrorCode.CLIENT_ERROR);
        });

        it('should mark only transient server errors as retryable', () => {
            expect(errorForStatus(502).retryable).toBe(true);
            expect(errorForStatus(501).retryable).toBe(false);
        });
    });

    describe('parseRetryAfter', () => {
        it('should parse delta-seconds', () => {
            expect(parseRetryAfter('3')).toBe(3000);
            expect(parseRetryAfter('0')).toBeUndefined();
        });

        it('should parse HTTP dates relative to now', () => {
            const now = Date.parse('2026-01-01T00:00:00Z');
            expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:05 GMT', now)).toBe(5000);
        });

        it('should ignore missing or malformed values', () => {
            expect(parseRetryAfter(null)).toBeUndefined();
            expect(parseRetryAfter('soon')).toBeUndefined();
        });
    });

    describe('normalizeTransportError', () => {
        it('should map aborts to CANCELLED', () => {
            const abort = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
            expect(normalizeTransportError(abort).code).toBe(AppErrorCode.CANCELLED);
        });

        it('should map timeouts to a retryable TIMEOUT', () => {
            const error = normalizeTransportError(codedError('Connect Timeout Error', 'UND_ERR_CONNECT_TIMEOUT'), 'media.test');
            expect(error.code).toBe(AppErrorCode.TIMEOUT);
            expect(error.retryable).toBe(true);
            expect(error.hostname).toBe('media.test');
        });

        it('should surface a ServerApiError raised inside the TLS handshake', () => {
            const mismatch = new ServerApiError(AppErrorCode.CERTIFICATE_PIN_MISMATCH, 'pin mismatch');
            const wrapped = new TypeError('fetch failed', { cause: mismatch });
            const error = normalizeTransportError(wrapped, 'media.test');
            expect(error.code).toBe(AppErrorCode.CERTIFICATE_PIN_MISMATCH);
            expect(error.hostname).toBe('media.test');
        });

        it('should fall back to UNKNOWN', () => {
            expect(normalizeTransportError('weird').code).toBe(AppErrorCode.UNKNOWN);
        });
    });
});
