import { Logger } from './logger';
import { RETRY_DEFAULTS } from '../config/limits';

/**
 * Configuration options for retry behavior.
 */
export interface RetryOptions {
    /** Maximum number of retry attempts. Default: 3 */
    maxRetries?: number;
    /** Base delay in milliseconds before first retry. Default: 1000 */
    baseDelayMs?: number;
    /** Maximum delay cap in milliseconds. Default: 30000 */
    maxDelayMs?: number;
    /** Custom function to determine if an error should trigger a retry */
    retryOn?: (error: unknown) => boolean;
    /** Context label for logging. Default: 'operation' */
    context?: string;
}

const RETRYABLE_STATUSES = [429, 500, 502, 503, 504];

const RETRYABLE_CODES = [
    'ECONNRESET',
    'ETIMEDOUT',
    'ECONNREFUSED',
    'ENETUNREACH',
    'EAI_AGAIN',
    'EPIPE',
    'EHOSTUNREACH'
];

function field(value: unknown, key: string): unknown {
    if (typeof value === 'object' && value !== null && key in value) {
        return Reflect.get(value, key);
    }
    return undefined;
}

function describeError(error: unknown): string {
    const message = field(error, 'message');
    return typeof message === 'string' ? message : String(error);
}

/**
 * Default conditions that trigger a retry:
 * - HTTP 429 (Too Many Requests)
 * - HTTP 500, 502, 503, 504 (Server errors)
 * - Network errors (ECONNRESET, ETIMEDOUT, ECONNREFUSED, etc.)
 */
export function isRetryableError(error: unknown): boolean {
    // HTTP status code checks
    const status = field(field(error, 'response'), 'status') ?? field(error, 'status');
    if (typeof status === 'number' && RETRYABLE_STATUSES.includes(status)) {
        return true;
    }

    // Network error code checks
    const code = field(error, 'code') ?? field(field(error, 'cause'), 'code');
    if (typeof code === 'string' && RETRYABLE_CODES.includes(code)) {
        return true;
    }

    const message = field(error, 'message');
    if (typeof message === 'string' && (message.includes('Network Error') || /timeout/i.test(message))) {
        return true;
    }

    return false;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * Formula: min(baseDelay * 2^attempt, maxDelay) ± 10% jitter
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateBackoffDelay(
    attempt: number,
    baseDelayMs: number,
    maxDelayMs: number
): number {
    const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
    const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

    // ±10% so parallel callers do not retry in lockstep
    const jitterFactor = 0.9 + Math.random() * 0.2;
    return Math.round(cappedDelay * jitterFactor);
}

/**
 * Execute an async function with automatic retry on transient failures.
 *
 * @example
 * const quotes = await retryWithBackoff(
 *   () => provider.fetch(actualPart),
 *   { maxRetries: 5, context: 'quotes:TDK C1608' }
 * );
 *
 * @throws Last error if all retries exhausted
 */
export async function retryWithBackoff<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const {
        maxRetries = RETRY_DEFAULTS.MAX_RETRIES,
        baseDelayMs = RETRY_DEFAULTS.BASE_DELAY_MS,
        maxDelayMs = RETRY_DEFAULTS.MAX_DELAY_MS,
        retryOn = isRetryableError,
        context = 'operation'
    } = options;

    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error;

            if (attempt >= maxRetries || !retryOn(error)) {
                break;
            }

            const delay = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs);

            Logger.warn(`[RetryWithBackoff] ${context} failed, attempt ${attempt + 1}/${maxRetries + 1}`, {
                error: describeError(error),
                nextRetryMs: delay
            });

            await new Promise(resolve => setTimeout(resolve, delay));
        }
    }

    Logger.error(`[RetryWithBackoff] ${context} gave up`, {
        error: describeError(lastError)
    });

    throw lastError;
}
