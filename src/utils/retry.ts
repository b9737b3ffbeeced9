export interface RetryOptions {
    /** Total attempts, including the first one. */
    attempts: number;
    delayMs: number;
    backoff?: 'fixed' | 'exponential';
    factor?: number;
    retryCondition?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

/** The part of RetryOptions that comes from configuration. */
export interface RetryPolicy {
    attempts: number;
    delayMs: number;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(options: RetryOptions, attemptIndex: number): number {
    if (options.backoff === 'fixed') return options.delayMs;
    const factor = options.factor ?? 2;
    return options.delayMs * Math.pow(factor, attemptIndex);
}

/**
 * Bounded retry with backoff. Errors rejected by `retryCondition` are rethrown
 * immediately; otherwise the last error is rethrown once attempts run out.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const attempts = Math.max(1, options.attempts);
    let lastError: unknown;

    for (let i = 0; i < attempts; i++) {
        try {
            return await fn(i + 1);
        } catch (error) {
            lastError = error;

            if (options.retryCondition && !options.retryCondition(error)) {
                throw error;
            }

            if (i === attempts - 1) break;

            const waitMs = backoffDelay(options, i);
            options.onRetry?.(error, i + 1, waitMs);
            await sleep(waitMs);
        }
    }

    throw lastError;
}
