import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Config, PartitionFile } from '../types.js';
import type { SearchService } from '../search/index.js';
import { defaults } from '../config/defaults.js';
import { Output } from '../utils/output.js';
import { readPartitionFile, writePartitionFile } from '../partition/file.js';
import { runExportPartitions, runGetBounds, runPartitionIndex } from '../orchestrator.js';
import { MemoryBackend, documentsWithValues } from './fixtures/memory-backend.js';

const ENDPOINT = 'https://example.search.windows.net';

interface FakeService extends SearchService {
    connectivityChecks: number;
}

function fakeService(backend: MemoryBackend): FakeService {
    const service: FakeService = {
        endpoint: ENDPOINT,
        indexName: 'products',
        connectivityChecks: 0,
        getPartitionField: async (fieldName) => ({ name: fieldName, type: 'Edm.Int32' }),
        checkConnectivity: async () => {
            service.connectivityChecks++;
            return 0;
        },
        createBackend: () => backend,
    };
    return service;
}

function connectTo(service: FakeService) {
    return vi.fn((endpoint: string, indexName: string): SearchService => ({ ...service, endpoint, indexName }));
}

function lines(filePath: string): string[] {
    return fs.readFileSync(filePath, 'utf-8').trim().split('\n');
}

describe('orchestrator', () => {
    let tempDir: string;
    let config: Config;
    let output: Output;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'search-export-orchestrator-test-'));
        config = {
            ...defaults,
            endpoint: ENDPOINT,
            adminKey: 'test-secret',
            indexName: 'products',
            fieldName: 'rank',
            partitionPath: path.join(tempDir, 'plan.json'),
            exportPath: path.join(tempDir, 'out'),
            retries: 0,
        };
        output = new Output({ quiet: true });
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    // =========================================================================
    // get-bounds
    // =========================================================================

    describe('runGetBounds', () => {
        test('reports the smallest and largest value', async () => {
            const backend = new MemoryBackend(documentsWithValues('rank', [5, null, 2, 9, 7]));

            const result = await runGetBounds(config, output, fakeService(backend));

            expect(result.success).toBe(true);
            expect(result.bounds).toEqual({
                fieldName: 'rank',
                fieldType: 'Edm.Int32',
                lowerBound: '2',
                upperBound: '9',
            });
            expect(console.log).toHaveBeenCalledWith('Lower Bound 2');
            expect(console.log).toHaveBeenCalledWith('Upper Bound 9');
        });

        test('fails on an index without values', async () => {
            const backend = new MemoryBackend(documentsWithValues('rank', [null]));

            const result = await runGetBounds(config, output, fakeService(backend));

            expect(result.success).toBe(false);
            expect(result.error).toBe('No documents with a value for "rank" were found in the index');
        });
    });

    // =========================================================================
    // partition-index
    // =========================================================================

    describe('runPartitionIndex', () => {
        test('writes a plan that covers the index', async () => {
            const backend = new MemoryBackend(documentsWithValues('rank', [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]), {
                maxSkip: 4,
            });

            const result = await runPartitionIndex(config, output, fakeService(backend));

            expect(result.success).toBe(true);
            expect(result.partitionPath).toBe(config.partitionPath);

            const file = readPartitionFile(path.join(tempDir, 'plan.json'));
            expect(file.endpoint).toBe(ENDPOINT);
            expect(file.indexName).toBe('products');
            expect(file.fieldName).toBe('rank');
            expect(file.fieldType).toBe('Edm.Int32');
            expect(file.totalDocumentCount).toBe(10);
            expect(file.partitions).toEqual([
                { index: 0, lowerBound: 0, upperBound: 4, documentCount: 4 },
                { index: 1, lowerBound: 4, upperBound: 6, documentCount: 2 },
                { index: 2, lowerBound: 6, upperBound: 9, documentCount: 4 },
            ]);
        });

        test('uses configured bounds instead of querying them', async () => {
            const backend = new MemoryBackend(documentsWithValues('rank', [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]), {
                maxSkip: 4,
            });

            const result = await runPartitionIndex(
                { ...config, lowerBound: '2', upperBound: '7' },
                output,
                fakeService(backend)
            );

            expect(result.partitionFile?.partitions).toEqual([
                { index: 0, lowerBound: 2, upperBound: 4, documentCount: 2 },
                { index: 1, lowerBound: 4, upperBound: 7, documentCount: 4 },
            ]);
            expect(backend.queryCalls).toEqual([]);
        });

        test('fails when a bound does not fit the field type', async () => {
            const backend = new MemoryBackend(documentsWithValues('rank', [1, 2]));

            const result = await runPartitionIndex(
                { ...config, lowerBound: '2024-01-01' },
                output,
                fakeService(backend)
            );

            expect(result.success).toBe(false);
            expect(result.error).toBe('Invalid bound "2024-01-01" for a field of type Edm.Int32');
            expect(fs.existsSync(path.join(tempDir, 'plan.json'))).toBe(false);
        });
    });

    // =========================================================================
    // export-partitions
    // =========================================================================

    describe('runExportPartitions', () => {
        const plan: PartitionFile = {
            endpoint: ENDPOINT,
            indexName: 'products',
            fieldName: 'rank',
            fieldType: 'Edm.Int32',
            totalDocumentCount: 10,
            partitions: [
                { index: 0, lowerBound: 0, upperBound: 2, documentCount: 2 },
                { index: 1, lowerBound: 2, upperBound: 4, documentCount: 2 },
                { index: 2, lowerBound: 4, upperBound: 6, documentCount: 2 },
                { index: 3, lowerBound: 6, upperBound: 8, documentCount: 2 },
                { index: 4, lowerBound: 8, upperBound: 9, documentCount: 2 },
            ],
        };

        function exportBackend(): MemoryBackend {
            return new MemoryBackend(documentsWithValues('rank', [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]));
        }

        beforeEach(() => {
            writePartitionFile(path.join(tempDir, 'plan.json'), plan);
        });

        test('exports the included partitions only', async () => {
            const backend = exportBackend();

            const result = await runExportPartitions(
                { ...config, includePartitions: [0, 1] },
                output,
                connectTo(fakeService(backend)),
                { yes: true, interactive: false }
            );

            expect(result.success).toBe(true);
            expect(fs.readdirSync(path.join(tempDir, 'out')).sort()).toEqual([
                'products-0-documents.jsonl',
                'products-1-documents.jsonl',
            ]);
            expect(lines(path.join(tempDir, 'out', 'products-1-documents.jsonl'))).toEqual([
                '{"id":"doc-2","rank":2}',
                '{"id":"doc-3","rank":3}',
            ]);
            expect(result.stats).toEqual({
                partitionsExported: 2,
                documentsExported: 4,
                pageRequests: 2,
                errors: 0,
            });
        });

        test('includes the upper bound of the last partition', async () => {
            const backend = exportBackend();

            await runExportPartitions(
                { ...config, includePartitions: [4] },
                output,
                connectTo(fakeService(backend)),
                { yes: true, interactive: false }
            );

            expect(lines(path.join(tempDir, 'out', 'products-4-documents.jsonl'))).toEqual([
                '{"id":"doc-8","rank":8}',
                '{"id":"doc-9","rank":9}',
            ]);
        });

        test('rejects a conflicting selection before any remote call', async () => {
            const backend = exportBackend();
            const service = fakeService(backend);

            const result = await runExportPartitions(
                { ...config, includePartitions: [0], excludePartitions: [1] },
                output,
                connectTo(service),
                { yes: true, interactive: false }
            );

            expect(result.success).toBe(false);
            expect(result.error).toBe('Only pass either --include-partition or --exclude-partition, not both');
            expect(service.connectivityChecks).toBe(0);
            expect(backend.callCount).toBe(0);
        });

        test('keeps exporting when one partition fails', async () => {
            const backend = exportBackend();
            backend.failQueryWhen((request) => (request.filter?.lower === 4 ? new Error('boom') : null));

            const result = await runExportPartitions(config, output, connectTo(fakeService(backend)), {
                yes: true,
                interactive: false,
            });

            expect(result.success).toBe(false);
            expect(result.error).toBe('1 partition(s) failed:\n   - Partition 2 failed: boom');
            expect(result.stats.partitionsExported).toBe(4);
            expect(result.stats.errors).toBe(1);
            expect(fs.existsSync(path.join(tempDir, 'out', 'products-4-documents.jsonl'))).toBe(true);
        });

        test('stops when the user declines', async () => {
            const backend = exportBackend();
            const service = fakeService(backend);
            const confirm = vi.fn(async () => false);

            const result = await runExportPartitions(config, output, connectTo(service), {
                yes: false,
                interactive: false,
                confirm,
            });

            expect(result).toMatchObject({ success: true, cancelled: true });
            expect(confirm).toHaveBeenCalledWith(`Export 5 partition(s) to ${path.join(tempDir, 'out')}?`);
            expect(service.connectivityChecks).toBe(0);
            expect(fs.existsSync(path.join(tempDir, 'out'))).toBe(false);
        });

        test('exports the partitions picked interactively', async () => {
            const backend = exportBackend();
            const choosePartitions = vi.fn(async (file: PartitionFile) => file.partitions.slice(3));

            const result = await runExportPartitions(config, output, connectTo(fakeService(backend)), {
                yes: true,
                interactive: true,
                choosePartitions,
            });

            expect(result.results?.map((partition) => partition.partitionIndex)).toEqual([3, 4]);
        });

        test('fails on a missing partition file', async () => {
            const backend = exportBackend();

            const result = await runExportPartitions(
                { ...config, partitionPath: path.join(tempDir, 'missing.json') },
                output,
                connectTo(fakeService(backend)),
                { yes: true, interactive: false }
            );

            expect(result.success).toBe(false);
            expect(result.error).toContain('file not found');
        });

        test('connects to the endpoint and index named in the partition file', async () => {
            const connect = connectTo(fakeService(exportBackend()));

            const result = await runExportPartitions(
                { ...config, endpoint: null, indexName: null, includePartitions: [0] },
                output,
                connect,
                { yes: true, interactive: false }
            );

            expect(result.success).toBe(true);
            expect(connect).toHaveBeenCalledWith(ENDPOINT, 'products');
            expect(fs.readdirSync(path.join(tempDir, 'out'))).toEqual(['products-0-documents.jsonl']);
        });

        test('accepts an endpoint that differs only by a trailing slash', async () => {
            const connect = connectTo(fakeService(exportBackend()));

            const result = await runExportPartitions(
                { ...config, endpoint: `${ENDPOINT}/`, includePartitions: [0] },
                output,
                connect,
                { yes: true, interactive: false }
            );

            expect(result.success).toBe(true);
            expect(connect).toHaveBeenCalledWith(ENDPOINT, 'products');
        });

        test('fails before any remote call when the index differs from the partition file', async () => {
            const backend = exportBackend();
            const connect = connectTo(fakeService(backend));

            const result = await runExportPartitions({ ...config, indexName: 'orders' }, output, connect, {
                yes: true,
                interactive: false,
            });

            expect(result.success).toBe(false);
            expect(result.error).toBe(
                `${path.join(tempDir, 'plan.json')} was generated for index products, but orders was given`
            );
            expect(connect).not.toHaveBeenCalled();
            expect(backend.callCount).toBe(0);
            expect(fs.existsSync(path.join(tempDir, 'out'))).toBe(false);
        });

        test('fails before any remote call when the endpoint differs from the partition file', async () => {
            const connect = connectTo(fakeService(exportBackend()));

            const result = await runExportPartitions(
                { ...config, endpoint: 'https://other.search.windows.net' },
                output,
                connect,
                { yes: true, interactive: false }
            );

            expect(result.success).toBe(false);
            expect(result.error).toBe(
                `${path.join(tempDir, 'plan.json')} was generated for endpoint ${ENDPOINT}, but https://other.search.windows.net was given`
            );
            expect(connect).not.toHaveBeenCalled();
        });

        test('needs an index name when no partition path is given', async () => {
            const connect = connectTo(fakeService(exportBackend()));

            const result = await runExportPartitions(
                { ...config, indexName: null, partitionPath: null },
                output,
                connect,
                { yes: true, interactive: false }
            );

            expect(result.success).toBe(false);
            expect(result.error).toBe('Index name or partition path is required');
            expect(connect).not.toHaveBeenCalled();
        });
    });
});
