// =============================================================================
// Shared Types
// =============================================================================

/**
 * Value of the ordering field. Timestamps are carried as epoch milliseconds,
 * numeric field types as plain numbers.
 */
export type OrderableValue = number;

export type SupportedFieldType = 'Edm.DateTimeOffset' | 'Edm.Int32' | 'Edm.Int64' | 'Edm.Double';

export type SearchDocument = Record<string, unknown>;

export interface Partition {
    index: number;
    lowerBound: OrderableValue;
    upperBound: OrderableValue;
    documentCount: number;
}

export interface PartitionFile {
    endpoint: string;
    indexName: string;
    fieldName: string;
    fieldType: SupportedFieldType;
    totalDocumentCount: number;
    partitions: Partition[];
}

/** On-disk shape of a partition: bounds in their canonical text form */
export interface PersistedPartition {
    index: number;
    lowerBound: string;
    upperBound: string;
    documentCount: number;
}

export interface PersistedPartitionFile {
    endpoint: string;
    indexName: string;
    fieldName: string;
    fieldType?: SupportedFieldType;
    totalDocumentCount: number;
    partitions: PersistedPartition[];
}

export type Command = 'get-bounds' | 'partition-index' | 'export-partitions';

export interface Config {
    endpoint: string | null;
    adminKey: string | null;
    indexName: string | null;
    fieldName: string | null;
    lowerBound: string | null;
    upperBound: string | null;
    partitionPath: string | null;
    exportPath: string;
    concurrentPartitions: number;
    pageSize: number;
    includePartitions: number[];
    excludePartitions: number[];
    retries: number;
    rateLimit: number;
    json: boolean;
}

/** Config whose service connection settings have been checked */
export type ServiceConfig = Config & {
    endpoint: string;
    adminKey: string;
    indexName: string;
};

export interface Stats {
    partitionsExported: number;
    documentsExported: number;
    pageRequests: number;
    errors: number;
}

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'SUCCESS';

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    data?: Record<string, unknown>;
}

export interface CliArgs {
    command?: Command;
    init?: string;
    config?: string;
    endpoint?: string;
    adminKey?: string;
    indexName?: string;
    fieldName?: string;
    lowerBound?: string;
    upperBound?: string;
    partitionPath?: string;
    exportPath?: string;
    concurrentPartitions?: number;
    pageSize?: number;
    includePartition?: number[];
    excludePartition?: number[];
    yes: boolean;
    log?: string;
    maxLogSize?: string;
    retries?: number;
    rateLimit?: number;
    quiet: boolean;
    json?: boolean;
    interactive?: boolean;
}
