import { getLogger } from './logger.js';

/**
 * Options for `withRetry`.
 */
export interface RetryOptions {
    /** Total attempts, the first call included */
    attempts: number;
    /** Delay before retry n is `baseDelayMs * 2^n` (n starting at 0) */
    baseDelayMs: number;
    /** Name used in logs and errors */
    label: string;
    /** Stops retrying (and aborts a pending delay) when fired */
    signal?: AbortSignal;
    /** Called after a failed attempt that will be retried */
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Thrown when every attempt failed.
 */
export class RetryExhaustedError extends Error {
    constructor(
        public readonly label: string,
        public readonly attempts: number,
        public readonly lastError: unknown
    ) {
        super(`${label} failed after ${attempts} attempt(s): ${describeError(lastError)}`);
        this.name = 'RetryExhaustedError';
    }
}

/**
 * Exponential backoff delay for a zero-based attempt number.
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
    return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Run `fn` until it resolves or the attempt budget is spent.
 * Every error counts as retryable except an abort of `signal`, which is rethrown at once.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const { attempts, baseDelayMs, label, signal, onRetry } = options;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < attempts; attempt++) {
        signal?.throwIfAborted();

        try {
            return await fn(attempt);
        } catch (error) {
            if (signal?.aborted) throw error;
            lastError = error;

            if (attempt < attempts - 1) {
                const delayMs = backoffDelay(baseDelayMs, attempt);
                getLogger().warn(
                    { label, attempt: attempt + 1, attempts, delayMs, error: describeError(error) },
                    'Attempt failed, backing off'
                );
                onRetry?.({ attempt, delayMs, error });
                await sleep(delayMs, signal);
            }
        }
    }

    throw new RetryExhaustedError(label, attempts, lastError);
}

/**
 * Sleep for the specified number of milliseconds.
 * Rejects with the signal's reason if it fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Short description of any thrown value, for log fields.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
