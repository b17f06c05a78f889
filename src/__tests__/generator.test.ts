import { describe, test, expect, vi } from 'vitest';
import type { Partition } from '../types.js';
import { generatePartitions, splitRange } from '../partition/generator.js';
import { getOrderableType } from '../bounds/orderable.js';
import { buildRangeFilter } from '../bounds/bound.js';
import { InvalidBoundRangeError, UnsplittablePartitionError } from '../utils/errors.js';
import { MemoryBackend, documentsWithValues } from './fixtures/memory-backend.js';

const ints = getOrderableType('Edm.Int32');
const dates = getOrderableType('Edm.DateTimeOffset');
const DAY = 24 * 60 * 60 * 1000;

function range(from: number, to: number): number[] {
    return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

function contains(partitions: Partition[], partition: Partition, value: number): boolean {
    const last = partition.index === partitions.length - 1;
    return value >= partition.lowerBound && (last ? value <= partition.upperBound : value < partition.upperBound);
}

function expectContiguous(partitions: Partition[]): void {
    partitions.forEach((partition, position) => {
        expect(partition.index).toBe(position);
        expect(partition.lowerBound).toBeLessThanOrEqual(partition.upperBound);
        if (position > 0) {
            expect(partition.lowerBound).toBe(partitions[position - 1].upperBound);
        }
    });
}

describe('generatePartitions', () => {
    test('bisects until every partition fits the limit', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', range(0, 9)));

        const result = await generatePartitions(backend, 'n', ints, 0, 9, { limit: 4 });

        expect(result.partitions).toEqual([
            { index: 0, lowerBound: 0, upperBound: 4, documentCount: 4 },
            { index: 1, lowerBound: 4, upperBound: 6, documentCount: 2 },
            { index: 2, lowerBound: 6, upperBound: 9, documentCount: 4 },
        ]);
        expect(result.totalDocumentCount).toBe(10);
        expect(result.rangeDocumentCount).toBe(10);
        expect(result.countQueries).toBe(5);
    });

    test('puts every document in exactly one partition', async () => {
        const values = [0, 0, 1, 3, 3, 3, 4, 8, 9, 9, 12, 15, 15, 16, 20];
        const backend = new MemoryBackend(documentsWithValues('n', values));

        const { partitions } = await generatePartitions(backend, 'n', ints, 0, 20, { limit: 3 });

        expectContiguous(partitions);
        for (const value of values) {
            expect(partitions.filter((partition) => contains(partitions, partition, value))).toHaveLength(1);
        }
        expect(partitions.every((partition) => partition.documentCount <= 3)).toBe(true);
    });

    test('returns a single partition when the range fits', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', range(1, 5)));

        const result = await generatePartitions(backend, 'n', ints, 1, 5, { limit: 10 });

        expect(result.partitions).toEqual([{ index: 0, lowerBound: 1, upperBound: 5, documentCount: 5 }]);
        expect(result.countQueries).toBe(1);
        expect(backend.countCalls[0]).toEqual({ field: 'n', lower: 1, upper: 5, upperInclusive: true });
    });

    test('returns one empty partition for a range without documents', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', range(0, 9)));

        const result = await generatePartitions(backend, 'n', ints, 100, 200, { limit: 4 });

        expect(result.partitions).toEqual([{ index: 0, lowerBound: 100, upperBound: 200, documentCount: 0 }]);
    });

    test('uses the backend page-depth limit by default', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', range(0, 9)), { maxSkip: 5 });

        const { partitions } = await generatePartitions(backend, 'n', ints, 0, 9);

        expect(partitions.map((partition) => partition.documentCount)).toEqual([4, 2, 4]);
    });

    test('splits 250,000 timestamps over ten days into partitions of at most 100,000', async () => {
        const start = Date.UTC(2024, 0, 1);
        const step = (9 * DAY) / 250_000;
        const documents = Array.from({ length: 250_000 }, (_, i) => ({
            id: `doc-${i}`,
            updated: start + Math.floor(i * step),
        }));
        const end = documents[documents.length - 1].updated;
        const backend = new MemoryBackend(documents);

        const result = await generatePartitions(backend, 'updated', dates, start, end);

        expect(result.partitions.length).toBeGreaterThanOrEqual(3);
        expect(result.totalDocumentCount).toBe(250_000);
        expect(result.partitions.every((partition) => partition.documentCount <= 100_000)).toBe(true);
        expect(result.partitions[0].lowerBound).toBe(start);
        expect(result.partitions[result.partitions.length - 1].upperBound).toBe(end);
        expectContiguous(result.partitions);
    });

    test('peels off the upper value when adjacent values cannot be bisected', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', [1, 1, 1, 1, 1, 2, 2, 2, 2, 2]));

        const { partitions } = await generatePartitions(backend, 'n', ints, 1, 2, { limit: 5 });

        expect(partitions).toEqual([
            { index: 0, lowerBound: 1, upperBound: 2, documentCount: 5 },
            { index: 1, lowerBound: 2, upperBound: 2, documentCount: 5 },
        ]);
    });

    test('fails when a single value holds more documents than the limit', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', [3, 3, 3, 3, 3, 3]));

        const error = await generatePartitions(backend, 'n', ints, 3, 3, { limit: 5 }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(UnsplittablePartitionError);
        expect(error).toMatchObject({ lowerBound: '3', upperBound: '3', documentCount: 6, limit: 5 });
        expect(backend.countCalls).toHaveLength(1);
    });

    test('fails when a half-open range of one value exceeds the limit', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', [1, 1, 1, 1, 1, 1, 2]));

        await expect(generatePartitions(backend, 'n', ints, 1, 2, { limit: 5 })).rejects.toThrow(
            UnsplittablePartitionError
        );
    });

    test('rejects an inverted range without querying', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', range(0, 9)));

        await expect(generatePartitions(backend, 'n', ints, 5, 3)).rejects.toThrow(InvalidBoundRangeError);
        expect(backend.callCount).toBe(0);
    });

    test('reports counted and split ranges', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', range(0, 9)));
        const onRangeCounted = vi.fn();
        const onRangeSplit = vi.fn();

        await generatePartitions(backend, 'n', ints, 0, 9, { limit: 4, progress: { onRangeCounted, onRangeSplit } });

        expect(onRangeSplit.mock.calls).toEqual([
            ['[0, 9]', 10],
            ['[4, 9]', 6],
        ]);
        expect(onRangeCounted.mock.calls).toEqual([
            ['[0, 4)', 4],
            ['[4, 6)', 2],
            ['[6, 9]', 4],
        ]);
    });

    test('retries failed count queries', async () => {
        const backend = new MemoryBackend(documentsWithValues('n', range(0, 9)));
        const count = backend.count.bind(backend);
        let failures = 0;
        vi.spyOn(backend, 'count').mockImplementation((filter) => {
            if (failures++ === 0) return Promise.reject(new Error('socket hang up'));
            return count(filter);
        });

        const result = await generatePartitions(backend, 'n', ints, 0, 9, {
            limit: 20,
            retry: { retries: 2, baseDelay: 1 },
        });

        expect(result.partitions).toHaveLength(1);
        expect(result.partitions[0].documentCount).toBe(10);
    });
});

describe('splitRange', () => {
    test('halves at the midpoint and keeps the upper end inclusive on the right', () => {
        const [left, right] = splitRange(buildRangeFilter('n', 0, 10, true), ints, 50, 10);

        expect(left).toEqual({ field: 'n', lower: 0, upper: 5, upperInclusive: false });
        expect(right).toEqual({ field: 'n', lower: 5, upper: 10, upperInclusive: true });
    });

    test('keeps a half-open range half-open', () => {
        const [, right] = splitRange(buildRangeFilter('n', 0, 10, false), ints, 50, 10);

        expect(right.upperInclusive).toBe(false);
    });
});
