import {
    AzureKeyCredential,
    SearchClient,
    SearchIndexClient,
    type SearchField,
    type SimpleField,
} from '@azure/search-documents';
import type { SearchDocument, SupportedFieldType } from '../types.js';
import type { Output } from '../utils/output.js';
import { isSupportedFieldType, SUPPORTED_FIELD_TYPES, type OrderableType } from '../bounds/orderable.js';
import { formatSearchError, InvalidFieldError, toError } from '../utils/errors.js';
import { AzureSearchBackend, type QueryBackend } from './backend.js';

export {
    AzureSearchBackend,
    AZURE_MAX_PAGE_SIZE,
    AZURE_MAX_SKIP,
    type QueryBackend,
    type RangeFilter,
    type PageRequest,
    type SortDirection,
} from './backend.js';

export interface SearchConnection {
    endpoint: string;
    indexName: string;
    searchClient: SearchClient<SearchDocument>;
    indexClient: SearchIndexClient;
}

export interface PartitionField {
    name: string;
    type: SupportedFieldType;
}

export function createSearchConnection(endpoint: string, adminKey: string, indexName: string): SearchConnection {
    const credential = new AzureKeyCredential(adminKey);
    return {
        endpoint,
        indexName,
        searchClient: new SearchClient<SearchDocument>(endpoint, indexName, credential),
        indexClient: new SearchIndexClient(endpoint, credential),
    };
}

function isSimpleField(field: SearchField): field is SimpleField {
    return field.type !== 'Edm.ComplexType' && field.type !== 'Collection(Edm.ComplexType)';
}

/**
 * Look up the partitioning field in the index schema. It must be a top-level,
 * sortable and filterable field of a supported type.
 */
export function resolvePartitionField(fields: SearchField[], indexName: string, fieldName: string): PartitionField {
    const field = fields.find((candidate) => candidate.name === fieldName);

    if (!field) {
        throw new InvalidFieldError(`Could not find ${fieldName} in ${indexName}`);
    }
    if (!isSimpleField(field)) {
        throw new InvalidFieldError(`${fieldName} is a complex field and cannot be used to partition`);
    }
    if (!(field.sortable ?? false) || !(field.filterable ?? false)) {
        throw new InvalidFieldError(`${fieldName} must be sortable and filterable`);
    }
    if (!isSupportedFieldType(field.type)) {
        throw new InvalidFieldError(
            `${fieldName} is of type ${field.type}, supported types ${SUPPORTED_FIELD_TYPES.join(', ')}`
        );
    }

    return { name: field.name, type: field.type };
}

export async function getPartitionField(connection: SearchConnection, fieldName: string): Promise<PartitionField> {
    const index = await connection.indexClient.getIndex(connection.indexName);
    return resolvePartitionField(index.fields, connection.indexName, fieldName);
}

/**
 * Fail early with a readable message when the service or index cannot be reached.
 * Returns the number of documents in the index.
 */
export async function checkSearchConnectivity(connection: SearchConnection, output: Output): Promise<number> {
    output.info('🔌 Checking search service connectivity...');

    try {
        const documentCount = await connection.searchClient.getDocumentsCount();
        output.info(`   ✓ ${connection.indexName} @ ${connection.endpoint} - ${documentCount} documents`);
        output.blank();
        return documentCount;
    } catch (error) {
        const errorInfo = formatSearchError(toError(error));
        const hint = errorInfo.suggestion ? `\n   Hint: ${errorInfo.suggestion}` : '';
        throw new Error(
            `Cannot connect to index ${connection.indexName} (${connection.endpoint}): ${errorInfo.message}${hint}`
        );
    }
}

/** Everything the commands need from a search service */
export interface SearchService {
    readonly endpoint: string;
    readonly indexName: string;
    getPartitionField(fieldName: string): Promise<PartitionField>;
    checkConnectivity(output: Output): Promise<number>;
    createBackend(orderable: OrderableType): QueryBackend;
}

/** Connects to an index once its endpoint and name are known */
export type SearchServiceFactory = (endpoint: string, indexName: string) => SearchService;

export function createSearchService(endpoint: string, adminKey: string, indexName: string): SearchService {
    const connection = createSearchConnection(endpoint, adminKey, indexName);
    return {
        endpoint,
        indexName,
        getPartitionField: (fieldName) => getPartitionField(connection, fieldName),
        checkConnectivity: (output) => checkSearchConnectivity(connection, output),
        createBackend: (orderable) => new AzureSearchBackend(connection.searchClient, orderable),
    };
}
