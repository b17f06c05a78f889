import fs from 'node:fs';
import path from 'node:path';
import type {
    Partition,
    PartitionFile,
    PersistedPartition,
    PersistedPartitionFile,
    SupportedFieldType,
} from '../types.js';
import { PARTITION_FILE_SUFFIX } from '../constants.js';
import { getOrderableType, isSupportedFieldType } from '../bounds/orderable.js';
import { InvalidBoundFormatError, InvalidPartitionFileError, toError } from '../utils/errors.js';

/** Field type assumed for partition files that do not record one */
export const DEFAULT_FIELD_TYPE: SupportedFieldType = 'Edm.DateTimeOffset';

export function defaultPartitionPath(indexName: string): string {
    return `${indexName}${PARTITION_FILE_SUFFIX}`;
}

export function toPersistedPartitionFile(file: PartitionFile): PersistedPartitionFile {
    const orderable = getOrderableType(file.fieldType);
    return {
        endpoint: file.endpoint,
        indexName: file.indexName,
        fieldName: file.fieldName,
        fieldType: file.fieldType,
        totalDocumentCount: file.totalDocumentCount,
        partitions: file.partitions.map((partition) => ({
            index: partition.index,
            lowerBound: orderable.serialize(partition.lowerBound),
            upperBound: orderable.serialize(partition.upperBound),
            documentCount: partition.documentCount,
        })),
    };
}

/**
 * Write the partition plan once. A temp file plus rename keeps a crashed
 * run from leaving a truncated plan behind.
 */
export function writePartitionFile(filePath: string, file: PartitionFile): void {
    const content = JSON.stringify(toPersistedPartitionFile(file), null, 2);
    const tempFile = `${filePath}.tmp`;

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }

    try {
        fs.writeFileSync(tempFile, content);
        fs.renameSync(tempFile, filePath);
    } catch (error) {
        if (fs.existsSync(tempFile)) {
            fs.unlinkSync(tempFile);
        }
        throw error;
    }
}

export function readPartitionFile(filePath: string): PartitionFile {
    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
        throw new InvalidPartitionFileError(filePath, [`file not found: ${absolutePath}`]);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
        throw new InvalidPartitionFileError(filePath, [`not valid JSON: ${toError(error).message}`]);
    }

    return parsePartitionFile(parsed, filePath);
}

// =============================================================================
// Validation
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function readString(record: Record<string, unknown>, key: string, problems: string[]): string {
    const value = record[key];
    if (typeof value !== 'string' || value.length === 0) {
        problems.push(`"${key}" must be a non-empty string`);
        return '';
    }
    return value;
}

function parsePersistedPartition(value: unknown, position: number, problems: string[]): PersistedPartition | null {
    if (!isRecord(value)) {
        problems.push(`partitions[${position}] must be an object`);
        return null;
    }
    const { index, lowerBound, upperBound, documentCount } = value;
    if (!isCount(index) || typeof lowerBound !== 'string' || typeof upperBound !== 'string' || !isCount(documentCount)) {
        problems.push(
            `partitions[${position}] must have an integer index, string lowerBound and upperBound, and an integer documentCount`
        );
        return null;
    }
    return { index, lowerBound, upperBound, documentCount };
}

/**
 * Turn parsed JSON into a PartitionFile, checking that the plan is a
 * contiguous, gap-free sequence of ranges.
 */
export function parsePartitionFile(value: unknown, filePath: string): PartitionFile {
    if (!isRecord(value)) {
        throw new InvalidPartitionFileError(filePath, ['top-level value must be an object']);
    }

    const problems: string[] = [];
    const endpoint = readString(value, 'endpoint', problems);
    const indexName = readString(value, 'indexName', problems);
    const fieldName = readString(value, 'fieldName', problems);

    const rawFieldType = value.fieldType ?? DEFAULT_FIELD_TYPE;
    let fieldType: SupportedFieldType = DEFAULT_FIELD_TYPE;
    if (typeof rawFieldType === 'string' && isSupportedFieldType(rawFieldType)) {
        fieldType = rawFieldType;
    } else {
        problems.push(`unsupported fieldType ${String(rawFieldType)}`);
    }

    const totalDocumentCount = value.totalDocumentCount;
    if (!isCount(totalDocumentCount)) {
        problems.push('"totalDocumentCount" must be a non-negative integer');
    }

    if (!Array.isArray(value.partitions)) {
        problems.push('"partitions" must be an array');
    }
    if (problems.length > 0 || !isCount(totalDocumentCount) || !Array.isArray(value.partitions)) {
        throw new InvalidPartitionFileError(filePath, problems);
    }

    const orderable = getOrderableType(fieldType);
    const partitions: Partition[] = [];
    value.partitions.forEach((entry: unknown, position: number) => {
        const persisted = parsePersistedPartition(entry, position, problems);
        if (!persisted) return;
        try {
            partitions.push({
                index: persisted.index,
                lowerBound: orderable.deserialize(persisted.lowerBound),
                upperBound: orderable.deserialize(persisted.upperBound),
                documentCount: persisted.documentCount,
            });
        } catch (error) {
            if (!(error instanceof InvalidBoundFormatError)) throw error;
            problems.push(`partitions[${position}]: ${error.message}`);
        }
    });

    problems.push(...validatePartitionPlan(partitions, orderable.compare));
    const sum = partitions.reduce((total, partition) => total + partition.documentCount, 0);
    if (sum !== totalDocumentCount) {
        problems.push(`totalDocumentCount is ${totalDocumentCount} but the partitions add up to ${sum}`);
    }

    if (problems.length > 0) {
        throw new InvalidPartitionFileError(filePath, problems);
    }

    return { endpoint, indexName, fieldName, fieldType, totalDocumentCount, partitions };
}

/**
 * Indices run 0..n-1 in order, no range is inverted, and each range starts
 * where the previous one ended.
 */
export function validatePartitionPlan(
    partitions: Partition[],
    compare: (a: number, b: number) => number
): string[] {
    const problems: string[] = [];

    partitions.forEach((partition, position) => {
        if (partition.index !== position) {
            problems.push(`partition at position ${position} has index ${partition.index}`);
        }
        if (compare(partition.lowerBound, partition.upperBound) > 0) {
            problems.push(`partition ${partition.index} has lowerBound greater than upperBound`);
        }
        const previous = partitions[position - 1];
        if (previous && compare(previous.upperBound, partition.lowerBound) !== 0) {
            problems.push(
                `partition ${partition.index} does not start where partition ${previous.index} ends`
            );
        }
    });

    return problems;
}

/** The last partition is the only one whose upper bound is inclusive */
export function isLastPartition(file: PartitionFile, partition: Partition): boolean {
    return partition.index === file.partitions.length - 1;
}
