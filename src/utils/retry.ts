import { toError } from './errors.js';

export interface RetryOptions {
    /** Attempts after the first one */
    retries?: number;
    baseDelay?: number;
    maxDelay?: number;
    /** Return false to fail at once on errors a retry cannot fix */
    shouldRetry?: (error: Error) => boolean;
    onRetry?: (attempt: number, max: number, error: Error, delay: number) => void;
}

/** Delay before retry number `attempt` (1-based): base, 2×base, 4×base, ... capped at `maxDelay` */
export function backoffDelay(attempt: number, baseDelay: number, maxDelay: number): number {
    return Math.min(baseDelay * 2 ** (attempt - 1), maxDelay);
}

/**
 * Call `fn` until it resolves or the retries run out, rethrowing the last error.
 * The same call is repeated, so a page is always re-read at the same offset.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const { retries = 3, baseDelay = 1000, maxDelay = 30000, shouldRetry = () => true, onRetry } = options;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (caught) {
            const error = toError(caught);
            if (attempt > retries || !shouldRetry(error)) {
                throw error;
            }

            const delay = backoffDelay(attempt, baseDelay, maxDelay);
            onRetry?.(attempt, retries, error, delay);
            await new Promise((resolve) => setTimeout(resolve, delay));
        }
    }
}
