import { toError } from '../utils/errors.js';

export interface ParallelFailure<T> {
    item: T;
    error: Error;
}

export interface ParallelResult<T, R> {
    results: R[];
    errors: ParallelFailure<T>[];
}

/**
 * Run `processor` over `items` with at most `concurrency` calls in flight.
 * A failing item is recorded and does not stop the others.
 */
export async function processInParallel<T, R>(
    items: T[],
    concurrency: number,
    processor: (item: T) => Promise<R>
): Promise<ParallelResult<T, R>> {
    const results: R[] = [];
    const errors: ParallelFailure<T>[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const item = items[next++];
            try {
                results.push(await processor(item));
            } catch (error) {
                errors.push({ item, error: toError(error) });
            }
        }
    };

    const size = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: size }, () => worker()));

    return { results, errors };
}
