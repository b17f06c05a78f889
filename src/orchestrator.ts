import type { Command, Config, Partition, PartitionFile, Stats, SupportedFieldType } from './types.js';
import type { Output } from './utils/output.js';
import type { SearchService, SearchServiceFactory } from './search/index.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { ProgressBarWrapper } from './utils/progress.js';
import { withRetry, type RetryOptions } from './utils/retry.js';
import {
    ExportFailedError,
    isRetryableError,
    PartitionFileMismatchError,
    SearchExportError,
    toError,
} from './utils/errors.js';
import { getOrderableType } from './bounds/orderable.js';
import { deserializeBound, findLowerBound, findUpperBound, serializeBound } from './bounds/bound.js';
import { generatePartitions } from './partition/generator.js';
import { defaultPartitionPath, readPartitionFile, writePartitionFile } from './partition/file.js';
import { resolvePartitionSelection } from './partition/selection.js';
import {
    exportPartitions,
    type ExportContext,
    type ExportRunResult,
    type PartitionExportResult,
} from './export/exporter.js';
import { askConfirmation, buildJsonOutput, displayPartitionTable, printSummary } from './output/display.js';
import { selectPartitions } from './interactive.js';

export interface CommandResult {
    success: boolean;
    stats: Stats;
    duration: number;
    error?: string;
}

export interface BoundsResult extends CommandResult {
    bounds?: {
        fieldName: string;
        fieldType: SupportedFieldType;
        lowerBound: string;
        upperBound: string;
    };
}

export interface PartitionResult extends CommandResult {
    partitionPath?: string;
    partitionFile?: PartitionFile;
}

export interface ExportResult extends CommandResult {
    cancelled?: boolean;
    results?: PartitionExportResult[];
}

export interface RunOptions {
    /** Base delay for retry backoff (ms) */
    retryDelay?: number;
}

export interface ExportOptions extends RunOptions {
    yes: boolean;
    interactive: boolean;
    confirm?: (message: string) => Promise<boolean>;
    choosePartitions?: (file: PartitionFile, preselected: Partition[]) => Promise<Partition[]>;
}

export function createEmptyStats(): Stats {
    return { partitionsExported: 0, documentsExported: 0, pageRequests: 0, errors: 0 };
}

function requireValue(value: string | null, label: string): string {
    if (!value) {
        throw new SearchExportError(`${label} is required`, 'MISSING_CONFIG');
    }
    return value;
}

function retryOptions(config: Config, output: Output, options: RunOptions): RetryOptions {
    return {
        retries: config.retries,
        baseDelay: options.retryDelay,
        shouldRetry: isRetryableError,
        onRetry: (attempt, max, error, delay) => {
            output.logError(`Retry ${attempt}/${max}`, { error: error.message, delay });
        },
    };
}

function elapsedSeconds(startTime: number): number {
    return (Date.now() - startTime) / 1000;
}

function reportFailure(
    command: Command,
    config: Config,
    stats: Stats,
    startTime: number,
    error: unknown,
    output: Output
): CommandResult {
    const err = toError(error);
    const duration = elapsedSeconds(startTime);

    output.logError(`${command} failed`, {
        error: err.message,
        ...(err instanceof SearchExportError ? { code: err.code } : {}),
    });
    if (config.json) {
        output.json(buildJsonOutput(command, false, config, stats, duration, err.message));
    } else {
        output.error(`\n❌ ${err.message}`);
    }

    return { success: false, stats, duration, error: err.message };
}

// =============================================================================
// get-bounds
// =============================================================================

export async function runGetBounds(
    config: Config,
    output: Output,
    service: SearchService,
    options: RunOptions = {}
): Promise<BoundsResult> {
    const startTime = Date.now();
    const stats = createEmptyStats();

    try {
        const fieldName = requireValue(config.fieldName, 'Field name');
        await service.checkConnectivity(output);

        const field = await service.getPartitionField(fieldName);
        const orderable = getOrderableType(field.type);
        const backend = service.createBackend(orderable);
        const retry = retryOptions(config, output, options);

        const lower = await withRetry(() => findLowerBound(backend, field.name, orderable), retry);
        const upper = await withRetry(() => findUpperBound(backend, field.name, orderable), retry);
        const bounds = {
            fieldName: field.name,
            fieldType: field.type,
            lowerBound: serializeBound(lower, orderable),
            upperBound: serializeBound(upper, orderable),
        };

        output.print(`Lower Bound ${bounds.lowerBound}`);
        output.print(`Upper Bound ${bounds.upperBound}`);
        output.logSuccess('Bounds found', bounds);

        const duration = elapsedSeconds(startTime);
        output.json(buildJsonOutput('get-bounds', true, config, stats, duration, undefined, { bounds }));
        return { success: true, stats, duration, bounds };
    } catch (error) {
        return reportFailure('get-bounds', config, stats, startTime, error, output);
    }
}

// =============================================================================
// partition-index
// =============================================================================

export async function runPartitionIndex(
    config: Config,
    output: Output,
    service: SearchService,
    options: RunOptions = {}
): Promise<PartitionResult> {
    const startTime = Date.now();
    const stats = createEmptyStats();

    try {
        const indexName = requireValue(config.indexName, 'Index name');
        const fieldName = requireValue(config.fieldName, 'Field name');
        const partitionPath = config.partitionPath ?? defaultPartitionPath(indexName);
        await service.checkConnectivity(output);

        const field = await service.getPartitionField(fieldName);
        const orderable = getOrderableType(field.type);
        const backend = service.createBackend(orderable);
        const retry = retryOptions(config, output, options);

        const lower =
            config.lowerBound !== null
                ? deserializeBound(config.lowerBound, orderable)
                : await withRetry(() => findLowerBound(backend, field.name, orderable), retry);
        const upper =
            config.upperBound !== null
                ? deserializeBound(config.upperBound, orderable)
                : await withRetry(() => findUpperBound(backend, field.name, orderable), retry);

        output.info(
            `🧩 Partitioning ${field.name} between ${serializeBound(lower, orderable)} and ${serializeBound(upper, orderable)}...`
        );

        const result = await generatePartitions(backend, field.name, orderable, lower, upper, {
            retry,
            progress: {
                onRangeCounted: (range, count) => {
                    output.info(`   ✓ ${range}: ${count} documents`);
                    output.logInfo('Partition found', { range, count });
                },
                onRangeSplit: (range, count) => {
                    output.logInfo('Splitting range', { range, count });
                },
            },
        });

        if (result.rangeDocumentCount !== result.totalDocumentCount) {
            output.warn(
                `⚠️  The index changed while partitioning: ${result.rangeDocumentCount} documents in range, ` +
                    `partitions add up to ${result.totalDocumentCount}`
            );
            output.logWarn('Document count drifted during partitioning', {
                rangeDocumentCount: result.rangeDocumentCount,
                totalDocumentCount: result.totalDocumentCount,
            });
        }

        const partitionFile: PartitionFile = {
            endpoint: service.endpoint,
            indexName,
            fieldName: field.name,
            fieldType: field.type,
            totalDocumentCount: result.totalDocumentCount,
            partitions: result.partitions,
        };
        writePartitionFile(partitionPath, partitionFile);

        if (!output.isQuiet && !output.isJson) {
            output.blank();
            displayPartitionTable(partitionFile.partitions, partitionFile.fieldType);
            output.blank();
        }
        output.print(`Wrote partitions to ${partitionPath}`);
        output.logSuccess('Partition file written', {
            partitionPath,
            partitions: partitionFile.partitions.length,
            totalDocumentCount: partitionFile.totalDocumentCount,
            countQueries: result.countQueries,
        });

        const duration = elapsedSeconds(startTime);
        output.json(
            buildJsonOutput('partition-index', true, config, stats, duration, undefined, {
                partitionPath,
                partitions: partitionFile.partitions.length,
                totalDocumentCount: partitionFile.totalDocumentCount,
            })
        );
        return { success: true, stats, duration, partitionPath, partitionFile };
    } catch (error) {
        return reportFailure('partition-index', config, stats, startTime, error, output);
    }
}

// =============================================================================
// export-partitions
// =============================================================================

function normalizeEndpoint(endpoint: string): string {
    return endpoint.replace(/\/+$/, '').toLowerCase();
}

/**
 * The partition file names the endpoint and index it was built from. Settings
 * given alongside it must agree with the file.
 */
function checkPartitionFileTarget(config: Config, partitionPath: string, partitionFile: PartitionFile): void {
    if (config.endpoint && normalizeEndpoint(config.endpoint) !== normalizeEndpoint(partitionFile.endpoint)) {
        throw new PartitionFileMismatchError(partitionPath, 'endpoint', partitionFile.endpoint, config.endpoint);
    }
    if (config.indexName && config.indexName !== partitionFile.indexName) {
        throw new PartitionFileMismatchError(partitionPath, 'index', partitionFile.indexName, config.indexName);
    }
}

export async function runExportPartitions(
    config: Config,
    output: Output,
    connect: SearchServiceFactory,
    options: ExportOptions
): Promise<ExportResult> {
    const startTime = Date.now();
    const stats = createEmptyStats();
    const confirm = options.confirm ?? askConfirmation;
    const choosePartitions = options.choosePartitions ?? selectPartitions;

    try {
        const partitionPath =
            config.partitionPath ??
            defaultPartitionPath(requireValue(config.indexName, 'Index name or partition path'));
        const partitionFile = readPartitionFile(partitionPath);
        checkPartitionFileTarget(config, partitionPath, partitionFile);
        output.info(`📚 ${partitionFile.indexName} @ ${partitionFile.endpoint} (from ${partitionPath})`);

        // Local checks first: a bad selection fails before any remote call
        let selected = resolvePartitionSelection(partitionFile.partitions, {
            include: config.includePartitions,
            exclude: config.excludePartitions,
        });
        if (options.interactive) {
            selected = await choosePartitions(partitionFile, selected);
        }

        const selectedDocuments = selected.reduce((sum, partition) => sum + partition.documentCount, 0);
        output.info(
            `📄 ${selected.length} of ${partitionFile.partitions.length} partitions selected (${selectedDocuments} documents)`
        );
        if (!output.isQuiet && !output.isJson) {
            displayPartitionTable(selected, partitionFile.fieldType, partitionFile.partitions.length - 1);
        }
        output.blank();

        if (selected.length === 0) {
            output.info('Nothing to export');
            return { success: true, stats, duration: elapsedSeconds(startTime), results: [] };
        }

        if (!options.yes) {
            const confirmed = await confirm(`Export ${selected.length} partition(s) to ${config.exportPath}?`);
            if (!confirmed) {
                output.info('🚫 Export cancelled');
                return { success: true, stats, duration: elapsedSeconds(startTime), cancelled: true };
            }
        }

        const service = connect(partitionFile.endpoint, partitionFile.indexName);
        await service.checkConnectivity(output);

        const orderable = getOrderableType(partitionFile.fieldType);
        const backend = service.createBackend(orderable);
        const pageSize = Math.min(config.pageSize, backend.maxPageSize);

        const rateLimiter = config.rateLimit > 0 ? new RateLimiter(config.rateLimit) : null;
        if (rateLimiter) {
            output.info(`⏱️  Rate limiting enabled: ${config.rateLimit} docs/s\n`);
        }

        const progressBar = output.isQuiet || output.isJson ? null : new ProgressBarWrapper();
        progressBar?.start(selectedDocuments, selected.length, stats);

        const ctx: ExportContext = {
            backend,
            partitionFile,
            orderable,
            exportPath: config.exportPath,
            pageSize,
            retries: config.retries,
            retryDelay: options.retryDelay,
            stats,
            output,
            progressBar,
            rateLimiter,
        };

        let run: ExportRunResult;
        try {
            run = await exportPartitions(ctx, selected, config.concurrentPartitions);
        } finally {
            progressBar?.stop();
        }

        const duration = elapsedSeconds(startTime);
        output.logSummary(stats, duration.toFixed(2));

        if (run.failures.length > 0) {
            throw new ExportFailedError(run.failures);
        }

        output.logSuccess('Export completed', { ...stats, duration: duration.toFixed(2) });
        if (config.json) {
            output.json(
                buildJsonOutput('export-partitions', true, config, stats, duration, undefined, {
                    files: run.results.map((result) => result.filePath),
                })
            );
        } else {
            printSummary(stats, duration.toFixed(2), output.logFile);
        }

        return { success: true, stats, duration, results: run.results };
    } catch (error) {
        return reportFailure('export-partitions', config, stats, startTime, error, output);
    }
}
