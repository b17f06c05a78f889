import { describe, test, expect } from 'vitest';
import { parseArgs } from '../args.js';

describe('parseArgs', () => {
    test('reads the command and service options', () => {
        const args = parseArgs([
            'get-bounds',
            '--endpoint',
            'https://example.search.windows.net',
            '--index-name',
            'products',
            '--field-name',
            'lastUpdated',
        ]);

        expect(args.command).toBe('get-bounds');
        expect(args.endpoint).toBe('https://example.search.windows.net');
        expect(args.indexName).toBe('products');
        expect(args.fieldName).toBe('lastUpdated');
        expect(args.yes).toBe(false);
        expect(args.quiet).toBe(false);
    });

    test('reads partition lists as numbers', () => {
        const args = parseArgs(['export-partitions', '--include-partition', '0', '1', '-y']);

        expect(args.command).toBe('export-partitions');
        expect(args.includePartition).toEqual([0, 1]);
        expect(args.excludePartition).toBeUndefined();
        expect(args.yes).toBe(true);
    });

    test('reads export tuning options', () => {
        const args = parseArgs([
            'export-partitions',
            '--concurrent-partitions',
            '4',
            '--page-size',
            '500',
            '--rate-limit',
            '100',
            '--retries',
            '0',
            '--max-log-size',
            '10MB',
            '-q',
        ]);

        expect(args.concurrentPartitions).toBe(4);
        expect(args.pageSize).toBe(500);
        expect(args.rateLimit).toBe(100);
        expect(args.retries).toBe(0);
        expect(args.maxLogSize).toBe('10MB');
        expect(args.quiet).toBe(true);
    });

    test('keeps bounds as text', () => {
        const args = parseArgs(['partition-index', '--lower-bound', '2024-01-01', '--upper-bound', '100']);

        expect(args.lowerBound).toBe('2024-01-01');
        expect(args.upperBound).toBe('100');
    });

    test('leaves the command unset for unknown commands', () => {
        expect(parseArgs(['copy']).command).toBeUndefined();
        expect(parseArgs(['--init', 'export.ini']).init).toBe('export.ini');
    });
});
