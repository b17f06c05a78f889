import type { Command, Config, ServiceConfig } from '../types.js';
import { AZURE_MAX_PAGE_SIZE } from '../search/backend.js';
import { ADMIN_KEY_ENV } from '../constants.js';
import { isWellFormedBound } from '../bounds/bound.js';

/**
 * Validate a search service endpoint.
 * Returns an error message if invalid, null if valid.
 */
export function validateEndpoint(endpoint: string): string | null {
    let url: URL;
    try {
        url = new URL(endpoint);
    } catch {
        return `Endpoint "${endpoint}" is not a valid URL`;
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
        return `Endpoint "${endpoint}" must use http or https`;
    }
    return null;
}

function validateService(config: Config, errors: string[]): void {
    if (!config.endpoint) {
        errors.push('Endpoint is required (--endpoint or in config file)');
    } else {
        const endpointError = validateEndpoint(config.endpoint);
        if (endpointError) errors.push(endpointError);
    }
    if (!config.adminKey) {
        errors.push(`Admin key is required (--admin-key or ${ADMIN_KEY_ENV})`);
    }
    if (!config.indexName) {
        errors.push('Index name is required (--index-name or in config file)');
    }
    if (!Number.isInteger(config.retries) || config.retries < 0) {
        errors.push('Retries must be a non-negative integer');
    }
}

function validateField(config: Config, errors: string[]): void {
    if (!config.fieldName) {
        errors.push('Field name is required (--field-name or in config file)');
    }
}

export function validateBoundsConfig(config: Config): string[] {
    const errors: string[] = [];
    validateService(config, errors);
    validateField(config, errors);
    return errors;
}

export function validatePartitionConfig(config: Config): string[] {
    const errors: string[] = [];
    validateService(config, errors);
    validateField(config, errors);

    for (const [label, bound] of [
        ['Lower bound', config.lowerBound],
        ['Upper bound', config.upperBound],
    ] as const) {
        if (bound !== null && !isWellFormedBound(bound)) {
            errors.push(`${label} "${bound}" is not a timestamp or a number`);
        }
    }
    return errors;
}

/**
 * Export reads its endpoint and index from the partition file, so only the
 * key and a way to find the file are required.
 */
export function validateExportConfig(config: Config): string[] {
    const errors: string[] = [];
    if (config.endpoint) {
        const endpointError = validateEndpoint(config.endpoint);
        if (endpointError) errors.push(endpointError);
    }
    if (!config.adminKey) {
        errors.push(`Admin key is required (--admin-key or ${ADMIN_KEY_ENV})`);
    }
    if (!config.indexName && !config.partitionPath) {
        errors.push('Index name or partition path is required (--index-name or --partition-path)');
    }
    if (!Number.isInteger(config.retries) || config.retries < 0) {
        errors.push('Retries must be a non-negative integer');
    }

    if (!Number.isInteger(config.concurrentPartitions) || config.concurrentPartitions < 1) {
        errors.push('Concurrent partitions must be an integer of at least 1');
    }
    if (!Number.isInteger(config.pageSize) || config.pageSize < 1 || config.pageSize > AZURE_MAX_PAGE_SIZE) {
        errors.push(`Page size must be an integer between 1 and ${AZURE_MAX_PAGE_SIZE}`);
    }
    if (!Number.isFinite(config.rateLimit) || config.rateLimit < 0) {
        errors.push('Rate limit must be 0 (unlimited) or a positive number');
    }
    if (!config.exportPath) {
        errors.push('Export path cannot be empty');
    }
    for (const index of [...config.includePartitions, ...config.excludePartitions]) {
        if (!Number.isInteger(index) || index < 0) {
            errors.push(`Partition index ${index} must be a non-negative integer`);
        }
    }

    return errors;
}

export function validateConfig(command: Command, config: Config): string[] {
    switch (command) {
        case 'get-bounds':
            return validateBoundsConfig(config);
        case 'partition-index':
            return validatePartitionConfig(config);
        case 'export-partitions':
            return validateExportConfig(config);
    }
}

/**
 * Type guard to check that the service settings are present.
 */
export function isServiceConfig(config: Config): config is ServiceConfig {
    return (
        typeof config.endpoint === 'string' &&
        typeof config.adminKey === 'string' &&
        typeof config.indexName === 'string'
    );
}
