import readline from 'node:readline';
import type { Command, Config, Partition, Stats, SupportedFieldType } from '../types.js';
import { SEPARATOR_LENGTH } from '../constants.js';
import { getOrderableType } from '../bounds/orderable.js';
import { maskAdminKey } from '../utils/credentials.js';

const COMMAND_TITLES: Record<Command, string> = {
    'get-bounds': '🔎 SEARCH-EXPORT - GET BOUNDS',
    'partition-index': '🧩 SEARCH-EXPORT - PARTITION INDEX',
    'export-partitions': '📦 SEARCH-EXPORT - EXPORT PARTITIONS',
};

function line(icon: string, label: string, value: string): void {
    console.log(`  ${icon} ${label.padEnd(22)} ${value}`);
}

function formatIndexList(indices: number[]): string {
    return indices.length > 0 ? indices.join(', ') : '(none)';
}

export function displayConfig(command: Command, config: Config): void {
    console.log('='.repeat(SEPARATOR_LENGTH));
    console.log(COMMAND_TITLES[command]);
    console.log('='.repeat(SEPARATOR_LENGTH));
    console.log('');
    const unset = command === 'export-partitions' ? '(from partition file)' : '(not set)';
    line('🌐', 'Endpoint:', config.endpoint ?? unset);
    line('🔑', 'Admin key:', config.adminKey ? maskAdminKey(config.adminKey) : '(not set)');
    line('📚', 'Index:', config.indexName ?? unset);

    if (command !== 'export-partitions') {
        line('🏷️ ', 'Field:', config.fieldName ?? '(not set)');
    }
    if (command === 'partition-index') {
        line('⬇️ ', 'Lower bound:', config.lowerBound ?? '(smallest value)');
        line('⬆️ ', 'Upper bound:', config.upperBound ?? '(largest value)');
    }
    if (command !== 'get-bounds') {
        line('📄', 'Partition file:', config.partitionPath ?? '(default)');
    }
    if (command === 'export-partitions') {
        line('📂', 'Export path:', config.exportPath);
        line('⚡', 'Concurrent partitions:', String(config.concurrentPartitions));
        line('📑', 'Page size:', String(config.pageSize));
        if (config.includePartitions.length > 0) {
            line('✅', 'Include partitions:', formatIndexList(config.includePartitions));
        }
        if (config.excludePartitions.length > 0) {
            line('🚫', 'Exclude partitions:', formatIndexList(config.excludePartitions));
        }
        if (config.rateLimit > 0) {
            line('⏱️ ', 'Rate limit:', `${config.rateLimit} docs/s`);
        }
    }
    line('🔄', 'Retries on error:', String(config.retries));

    console.log('');
    console.log('='.repeat(SEPARATOR_LENGTH));
}

/**
 * One row per partition: index, range and document count.
 * `lastIndex` is the index of the plan's final partition, whose range is closed.
 */
export function formatPartitionTable(
    partitions: Partition[],
    fieldType: SupportedFieldType,
    lastIndex: number = partitions[partitions.length - 1]?.index ?? -1
): string[] {
    const orderable = getOrderableType(fieldType);
    return partitions.map((partition) => {
        const close = partition.index === lastIndex ? ']' : ')';
        const range = `[${orderable.serialize(partition.lowerBound)}, ${orderable.serialize(partition.upperBound)}${close}`;
        return `  ${String(partition.index).padStart(4)}  ${range}  ${partition.documentCount} docs`;
    });
}

export function displayPartitionTable(
    partitions: Partition[],
    fieldType: SupportedFieldType,
    lastIndex?: number
): void {
    for (const row of formatPartitionTable(partitions, fieldType, lastIndex)) {
        console.log(row);
    }
}

export async function askConfirmation(message: string): Promise<boolean> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });

    return new Promise((resolve) => {
        rl.question(`\n${message} (y/N): `, (answer) => {
            rl.close();
            resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
        });
    });
}

export function printSummary(stats: Stats, duration: string, logFile?: string): void {
    console.log('\n' + '='.repeat(SEPARATOR_LENGTH));
    console.log('📊 EXPORT SUMMARY');
    console.log('='.repeat(SEPARATOR_LENGTH));
    console.log(`Partitions exported: ${stats.partitionsExported}`);
    console.log(`Documents exported:  ${stats.documentsExported}`);
    console.log(`Page requests:       ${stats.pageRequests}`);
    console.log(`Errors: ${stats.errors}`);
    console.log(`Duration: ${duration}s`);

    if (logFile) {
        console.log(`Log file: ${logFile}`);
    }

    if (stats.errors > 0) {
        console.log('\n⚠ Export finished with failed partitions');
    } else {
        console.log('\n✓ Export completed successfully');
    }
    console.log('='.repeat(SEPARATOR_LENGTH) + '\n');
}

export interface JsonOutput {
    success: boolean;
    error?: string;
    command: Command;
    endpoint: string | null;
    indexName: string | null;
    stats: Stats;
    duration: number;
    [key: string]: unknown;
}

export function buildJsonOutput(
    command: Command,
    success: boolean,
    config: Config,
    stats: Stats,
    duration: number,
    error?: string,
    details: Record<string, unknown> = {}
): JsonOutput {
    return {
        success,
        ...(error && { error }),
        command,
        endpoint: config.endpoint,
        indexName: config.indexName,
        stats: {
            partitionsExported: stats.partitionsExported,
            documentsExported: stats.documentsExported,
            pageRequests: stats.pageRequests,
            errors: stats.errors,
        },
        duration,
        ...details,
    };
}
