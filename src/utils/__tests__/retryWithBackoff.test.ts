import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
    retryWithBackoff,
    isRetryableError,
    calculateBackoffDelay
} from '../retryWithBackoff';

vi.mock('../logger', () => ({
    Logger: {
        warn: vi.fn(),
        error: vi.fn(),
        info: vi.fn(),
        debug: vi.fn()
    }
}));

describe('isRetryableError', () => {
    it('treats rate limiting and server errors as transient', () => {
        expect(isRetryableError({ response: { status: 429 } })).toBe(true);
        expect(isRetryableError({ status: 503 })).toBe(true);
    });

    it('does not retry client errors', () => {
        expect(isRetryableError({ response: { status: 400 } })).toBe(false);
        expect(isRetryableError({ response: { status: 404 } })).toBe(false);
    });

    it('recognizes network codes on the error or its cause', () => {
        expect(isRetryableError({ code: 'ECONNRESET' })).toBe(true);
        expect(isRetryableError(new Error('fetch failed', { cause: { code: 'EAI_AGAIN' } }))).toBe(true);
    });

    it('recognizes timeout messages', () => {
        expect(isRetryableError(new Error('Quote request timeout after 5000ms'))).toBe(true);
    });

    it('returns false for anything else', () => {
        expect(isRetryableError(new Error('Invalid JSON'))).toBe(false);
        expect(isRetryableError('plain string')).toBe(false);
        expect(isRetryableError(null)).toBe(false);
    });
});

describe('calculateBackoffDelay', () => {
    it('doubles per attempt within ±10% jitter', () => {
        const delay0 = calculateBackoffDelay(0, 1000, 30000);
        const delay2 = calculateBackoffDelay(2, 1000, 30000);

        expect(delay0).toBeGreaterThanOrEqual(900);
        expect(delay0).toBeLessThanOrEqual(1100);
        expect(delay2).toBeGreaterThanOrEqual(3600);
        expect(delay2).toBeLessThanOrEqual(4400);
    });

    it('caps at maxDelayMs', () => {
        expect(calculateBackoffDelay(10, 1000, 5000)).toBeLessThanOrEqual(5500);
    });
});

describe('retryWithBackoff', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('returns the first successful result', async () => {
        const fn = vi.fn().mockResolvedValue(['quote']);

        await expect(retryWithBackoff(fn)).resolves.toEqual(['quote']);
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('retries a transient failure', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce({ response: { status: 429 } })
            .mockResolvedValue('ok');

        const promise = retryWithBackoff(fn, { baseDelayMs: 100 });
        await vi.advanceTimersByTimeAsync(200);

        await expect(promise).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('rethrows the last error once retries run out', async () => {
        const error = { status: 500, message: 'Server Error' };
        const fn = vi.fn().mockRejectedValue(error);

        const promise = retryWithBackoff(fn, { maxRetries: 2, baseDelayMs: 100 });
        const settled = expect(promise).rejects.toEqual(error);
        await vi.advanceTimersByTimeAsync(1000);
        await settled;

        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('does not retry when retryOn says no', async () => {
        const error = new Error('Custom error');
        const fn = vi.fn().mockRejectedValue(error);
        const retryOn = vi.fn().mockReturnValue(false);

        await expect(retryWithBackoff(fn, { retryOn })).rejects.toThrow('Custom error');
        expect(retryOn).toHaveBeenCalledWith(error);
        expect(fn).toHaveBeenCalledTimes(1);
    });
});
