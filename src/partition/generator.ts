import type { OrderableValue, Partition } from '../types.js';
import type { QueryBackend, RangeFilter } from '../search/backend.js';
import type { OrderableType } from '../bounds/orderable.js';
import { buildRangeFilter, describeRange } from '../bounds/bound.js';
import { InvalidBoundRangeError, UnsplittablePartitionError } from '../utils/errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

export interface GenerateProgress {
    onRangeCounted?: (range: string, count: number) => void;
    onRangeSplit?: (range: string, count: number) => void;
}

export interface GenerateOptions {
    /** Maximum documents per partition (defaults to the backend's page-depth limit) */
    limit?: number;
    retry?: RetryOptions;
    progress?: GenerateProgress;
}

export interface GenerateResult {
    partitions: Partition[];
    /** Sum of the partition counts */
    totalDocumentCount: number;
    /** Count of the whole [lower, upper] range, observed before splitting */
    rangeDocumentCount: number;
    countQueries: number;
}

/**
 * Split [lower, upper] into contiguous partitions that each hold at most
 * `limit` documents, by repeated bisection driven by count queries.
 *
 * Every partition covers [lowerBound, upperBound) except the last one,
 * which also includes upperBound.
 */
export async function generatePartitions(
    backend: QueryBackend,
    field: string,
    orderable: OrderableType,
    lower: OrderableValue,
    upper: OrderableValue,
    options: GenerateOptions = {}
): Promise<GenerateResult> {
    if (orderable.compare(lower, upper) > 0) {
        throw new InvalidBoundRangeError(orderable.serialize(lower), orderable.serialize(upper));
    }

    const limit = options.limit ?? backend.maxSkip;
    const { progress } = options;

    // Stack of pending ranges; the left half is pushed last so it resolves first
    const pending: RangeFilter[] = [buildRangeFilter(field, lower, upper, true)];
    const resolved: Omit<Partition, 'index'>[] = [];
    let rangeDocumentCount = -1;
    let countQueries = 0;

    while (pending.length > 0) {
        const range = pending.pop();
        if (!range) break;

        const count = await withRetry(() => backend.count(range), options.retry);
        countQueries++;
        if (rangeDocumentCount < 0) {
            rangeDocumentCount = count;
        }

        if (count <= limit) {
            progress?.onRangeCounted?.(describeRange(range, orderable), count);
            resolved.push({ lowerBound: range.lower, upperBound: range.upper, documentCount: count });
            continue;
        }

        const [left, right] = splitRange(range, orderable, count, limit);
        progress?.onRangeSplit?.(describeRange(range, orderable), count);
        pending.push(right, left);
    }

    const partitions = resolved.map((partition, index) => ({ index, ...partition }));
    return {
        partitions,
        totalDocumentCount: partitions.reduce((sum, partition) => sum + partition.documentCount, 0),
        rangeDocumentCount,
        countQueries,
    };
}

/**
 * Halve a range at the type's midpoint. Each half must be strictly smaller
 * than the input, otherwise the range cannot be split.
 */
export function splitRange(
    range: RangeFilter,
    orderable: OrderableType,
    count: number,
    limit: number
): [RangeFilter, RangeFilter] {
    const { field, lower, upper, upperInclusive } = range;
    let mid = orderable.midpoint(lower, upper);

    const separates = orderable.compare(lower, mid) < 0 && orderable.compare(mid, upper) < 0;
    if (!separates) {
        // Adjacent values: peel the inclusive upper value off into its own range
        if (upperInclusive && orderable.compare(lower, upper) < 0) {
            mid = upper;
        } else {
            throw new UnsplittablePartitionError(
                orderable.serialize(lower),
                orderable.serialize(upper),
                count,
                limit
            );
        }
    }

    return [
        buildRangeFilter(field, lower, mid, false),
        buildRangeFilter(field, mid, upper, upperInclusive),
    ];
}
