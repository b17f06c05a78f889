import fs from 'node:fs';
import path from 'node:path';
import type { Partition, PartitionFile, SearchDocument, Stats } from '../types.js';
import type { QueryBackend, RangeFilter } from '../search/backend.js';
import type { OrderableType } from '../bounds/orderable.js';
import type { Output } from '../utils/output.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import type { ProgressBarWrapper } from '../utils/progress.js';
import { DOCUMENTS_FILE_SUFFIX } from '../constants.js';
import { buildRangeFilter, describeRange } from '../bounds/bound.js';
import { isLastPartition } from '../partition/file.js';
import { withRetry } from '../utils/retry.js';
import { isRetryableError, PartitionExportError, SearchExportError } from '../utils/errors.js';
import { processInParallel } from './parallel.js';

export interface ExportContext {
    backend: QueryBackend;
    partitionFile: PartitionFile;
    orderable: OrderableType;
    exportPath: string;
    pageSize: number;
    retries: number;
    /** Base delay for retry backoff (ms) */
    retryDelay?: number;
    stats: Stats;
    output: Output;
    progressBar: ProgressBarWrapper | null;
    rateLimiter: RateLimiter | null;
}

export interface PartitionExportResult {
    partitionIndex: number;
    filePath: string;
    documentsExported: number;
    pageRequests: number;
}

export interface ExportRunResult {
    results: PartitionExportResult[];
    failures: PartitionExportError[];
}

export function getPartitionFileName(indexName: string, partitionIndex: number): string {
    return `${indexName}-${partitionIndex}${DOCUMENTS_FILE_SUFFIX}`;
}

export function getPartitionFilter(file: PartitionFile, partition: Partition): RangeFilter {
    return buildRangeFilter(
        file.fieldName,
        partition.lowerBound,
        partition.upperBound,
        isLastPartition(file, partition)
    );
}

function toJsonLines(documents: SearchDocument[]): string {
    return documents.map((document) => JSON.stringify(document)).join('\n') + '\n';
}

/**
 * Page through one partition in ascending field order and write every
 * document to the partition's file, replacing any earlier export.
 */
export async function exportPartition(ctx: ExportContext, partition: Partition): Promise<PartitionExportResult> {
    const { backend, partitionFile, pageSize, output, stats } = ctx;
    const filter = getPartitionFilter(partitionFile, partition);
    const filePath = path.join(ctx.exportPath, getPartitionFileName(partitionFile.indexName, partition.index));

    output.logInfo(`Exporting partition ${partition.index}`, {
        range: describeRange(filter, ctx.orderable),
        documentCount: partition.documentCount,
        file: filePath,
    });

    const handle = await fs.promises.open(filePath, 'w');
    let documentsExported = 0;
    let pageRequests = 0;

    try {
        for (let skip = 0; skip < partition.documentCount; skip += pageSize) {
            if (skip > backend.maxSkip) {
                throw new SearchExportError(
                    `Offset ${skip} exceeds the service limit of ${backend.maxSkip}`,
                    'PAGE_DEPTH_EXCEEDED'
                );
            }

            await ctx.rateLimiter?.reserve(pageSize);

            const page = await withRetry(
                () =>
                    backend.query({
                        filter,
                        orderBy: { field: partitionFile.fieldName, direction: 'asc' },
                        skip,
                        top: pageSize,
                    }),
                {
                    retries: ctx.retries,
                    baseDelay: ctx.retryDelay,
                    shouldRetry: isRetryableError,
                    onRetry: (attempt, max, err, delay) => {
                        output.logError(`Retry ${attempt}/${max} for partition ${partition.index}`, {
                            skip,
                            error: err.message,
                            delay,
                        });
                    },
                }
            );
            pageRequests++;
            stats.pageRequests++;
            ctx.rateLimiter?.release(pageSize - page.length);

            if (page.length > 0) {
                await handle.write(toJsonLines(page));
                documentsExported += page.length;
                stats.documentsExported += page.length;
                ctx.progressBar?.incrementBy(page.length);
            }

            if (page.length < pageSize) {
                break;
            }
        }
    } finally {
        await handle.close();
    }

    if (documentsExported !== partition.documentCount) {
        output.logInfo(`Partition ${partition.index} count drifted since partitioning`, {
            expected: partition.documentCount,
            exported: documentsExported,
        });
    }

    stats.partitionsExported++;
    ctx.progressBar?.partitionFinished();
    output.logSuccess(`Partition ${partition.index} exported`, { documentsExported, pageRequests });

    return { partitionIndex: partition.index, filePath, documentsExported, pageRequests };
}

/**
 * Export the given partitions with at most `concurrency` in flight. Failed
 * partitions are collected; the others run to completion.
 */
export async function exportPartitions(
    ctx: ExportContext,
    partitions: Partition[],
    concurrency: number
): Promise<ExportRunResult> {
    fs.mkdirSync(ctx.exportPath, { recursive: true });

    const { results, errors } = await processInParallel(partitions, concurrency, (partition) =>
        exportPartition(ctx, partition)
    );

    const failures = errors.map(({ item, error }) => new PartitionExportError(item.index, error));
    for (const failure of failures) {
        ctx.stats.errors++;
        ctx.output.logError(failure.message, { partition: failure.partitionIndex });
    }

    results.sort((a, b) => a.partitionIndex - b.partitionIndex);
    failures.sort((a, b) => a.partitionIndex - b.partitionIndex);
    return { results, failures };
}
