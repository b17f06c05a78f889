// =============================================================================
// Error taxonomy
// =============================================================================

export class SearchExportError extends Error {
    constructor(
        message: string,
        readonly code: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class EmptyCollectionError extends SearchExportError {
    constructor(readonly fieldName: string) {
        super(`No documents with a value for "${fieldName}" were found in the index`, 'EMPTY_COLLECTION');
    }
}

export class InvalidBoundFormatError extends SearchExportError {
    constructor(
        readonly input: string,
        readonly fieldType: string
    ) {
        super(`Invalid bound "${input}" for a field of type ${fieldType}`, 'INVALID_BOUND_FORMAT');
    }
}

export class InvalidBoundRangeError extends SearchExportError {
    constructor(lowerBound: string, upperBound: string) {
        super(
            `Lower bound ${lowerBound} is greater than upper bound ${upperBound}`,
            'INVALID_BOUND_RANGE'
        );
    }
}

export class UnsplittablePartitionError extends SearchExportError {
    constructor(
        readonly lowerBound: string,
        readonly upperBound: string,
        readonly documentCount: number,
        readonly limit: number
    ) {
        super(
            `Range [${lowerBound}, ${upperBound}] holds ${documentCount} documents (limit ${limit}) ` +
                'and cannot be split further: too many documents share the same field value',
            'UNSPLITTABLE_PARTITION'
        );
    }
}

export class ConflictingSelectionError extends SearchExportError {
    constructor() {
        super(
            'Only pass either --include-partition or --exclude-partition, not both',
            'CONFLICTING_SELECTION'
        );
    }
}

export class InvalidPartitionSelectionError extends SearchExportError {
    constructor(readonly unknownIndices: number[]) {
        super(
            `Unknown partition index(es): ${unknownIndices.join(', ')}`,
            'INVALID_PARTITION_SELECTION'
        );
    }
}

export class InvalidPartitionFileError extends SearchExportError {
    constructor(
        readonly filePath: string,
        readonly problems: string[]
    ) {
        super(
            `Invalid partition file ${filePath}:\n   - ${problems.join('\n   - ')}`,
            'INVALID_PARTITION_FILE'
        );
    }
}

export class PartitionFileMismatchError extends SearchExportError {
    constructor(
        readonly filePath: string,
        readonly setting: 'endpoint' | 'index',
        readonly expected: string,
        readonly actual: string
    ) {
        super(
            `${filePath} was generated for ${setting} ${expected}, but ${actual} was given`,
            'PARTITION_FILE_MISMATCH'
        );
    }
}

export class InvalidFieldError extends SearchExportError {
    constructor(message: string) {
        super(message, 'INVALID_FIELD');
    }
}

export class PartitionExportError extends SearchExportError {
    constructor(
        readonly partitionIndex: number,
        readonly failure: Error
    ) {
        super(`Partition ${partitionIndex} failed: ${failure.message}`, 'PARTITION_EXPORT_FAILED');
    }
}

export class ExportFailedError extends SearchExportError {
    constructor(readonly failures: PartitionExportError[]) {
        super(
            `${failures.length} partition(s) failed:\n   - ${failures.map((f) => f.message).join('\n   - ')}`,
            'EXPORT_FAILED'
        );
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

// =============================================================================
// Remote error formatting
// =============================================================================

export interface SearchErrorInfo {
    message: string;
    suggestion?: string;
}

const statusMap: Record<number, SearchErrorInfo> = {
    400: {
        message: 'Invalid request',
        suggestion: 'Check the field name and bound values used in the filter',
    },
    401: {
        message: 'Invalid credentials',
        suggestion: 'Check --admin-key or the SEARCH_ADMIN_KEY environment variable',
    },
    403: {
        message: 'Permission denied',
        suggestion: 'An admin key is required to read the index schema',
    },
    404: {
        message: 'Resource not found',
        suggestion: 'Verify the endpoint and index name are correct',
    },
    429: {
        message: 'Request throttled',
        suggestion: 'Try reducing --concurrent-partitions or set --rate-limit',
    },
    503: {
        message: 'Service unavailable',
        suggestion: 'The service is overloaded. Reduce --concurrent-partitions or retry later',
    },
};

const networkCodes: Record<string, SearchErrorInfo> = {
    ENOTFOUND: {
        message: 'Service not reachable',
        suggestion: 'Check the --endpoint URL and your internet connection',
    },
    ECONNREFUSED: {
        message: 'Service not reachable',
        suggestion: 'Check the --endpoint URL and your internet connection',
    },
    ETIMEDOUT: {
        message: 'Request timeout',
        suggestion: 'Try reducing --page-size or check your network connection',
    },
};

function readStatusCode(error: Error): number | undefined {
    if ('statusCode' in error && typeof error.statusCode === 'number') {
        return error.statusCode;
    }
    return undefined;
}

function readCode(error: Error): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Client errors other than throttling fail the same way on every attempt.
 */
export function isRetryableError(error: Error): boolean {
    if (error instanceof SearchExportError) {
        return false;
    }
    const statusCode = readStatusCode(error);
    if (statusCode === undefined) {
        return true;
    }
    return statusCode === 408 || statusCode === 429 || statusCode >= 500;
}

export function formatSearchError(error: Error): SearchErrorInfo {
    if (error instanceof SearchExportError) {
        return { message: error.message };
    }

    const statusCode = readStatusCode(error);
    if (statusCode !== undefined) {
        const mapped = statusMap[statusCode];
        if (mapped) {
            return mapped;
        }
    }

    const code = readCode(error);
    if (code) {
        const mapped = networkCodes[code];
        if (mapped) {
            return mapped;
        }
    }

    const message = error.message.toLowerCase();

    if (message.includes('forbidden') || message.includes('denied')) {
        return statusMap[403];
    }
    if (message.includes('unauthorized') || message.includes('api key')) {
        return statusMap[401];
    }
    if (message.includes('throttl') || message.includes('too many requests')) {
        return statusMap[429];
    }
    if (message.includes('timeout') || message.includes('timed out')) {
        return networkCodes.ETIMEDOUT;
    }

    return {
        message: error.message,
    };
}
