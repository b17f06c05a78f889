import type { SearchClient } from '@azure/search-documents';
import type { OrderableValue, SearchDocument } from '../types.js';
import type { OrderableType } from '../bounds/orderable.js';
import { toODataFilter } from '../bounds/bound.js';

/** Azure AI Search rejects `$skip` above this value */
export const AZURE_MAX_SKIP = 100_000;

/** Azure AI Search returns at most this many documents per request */
export const AZURE_MAX_PAGE_SIZE = 1000;

export type SortDirection = 'asc' | 'desc';

export interface RangeFilter {
    field: string;
    lower: OrderableValue;
    upper: OrderableValue;
    upperInclusive: boolean;
}

export interface PageRequest {
    filter: RangeFilter | null;
    orderBy: { field: string; direction: SortDirection };
    skip: number;
    top: number;
    /** Leave out documents with no value in the ordering field */
    excludeMissing?: boolean;
}

/**
 * The operations the partitioning and export engine needs from a search service.
 */
export interface QueryBackend {
    /** Page-depth limit: the largest `skip` the service accepts */
    readonly maxSkip: number;
    readonly maxPageSize: number;
    count(filter: RangeFilter | null): Promise<number>;
    query(request: PageRequest): Promise<SearchDocument[]>;
}

export class AzureSearchBackend implements QueryBackend {
    readonly maxSkip = AZURE_MAX_SKIP;
    readonly maxPageSize = AZURE_MAX_PAGE_SIZE;

    constructor(
        private readonly client: SearchClient<SearchDocument>,
        private readonly orderable: OrderableType
    ) {}

    async count(filter: RangeFilter | null): Promise<number> {
        const response = await this.client.search('*', {
            filter: filter ? toODataFilter(filter, this.orderable) : undefined,
            includeTotalCount: true,
            top: 0,
        });
        return response.count ?? 0;
    }

    async query(request: PageRequest): Promise<SearchDocument[]> {
        const filters: string[] = [];
        if (request.filter) {
            filters.push(toODataFilter(request.filter, this.orderable));
        }
        if (request.excludeMissing) {
            filters.push(`${request.orderBy.field} ne null`);
        }

        const response = await this.client.search('*', {
            filter: filters.length > 0 ? filters.join(' and ') : undefined,
            orderBy: [`${request.orderBy.field} ${request.orderBy.direction}`],
            skip: request.skip,
            top: request.top,
        });

        const documents: SearchDocument[] = [];
        for await (const result of response.results) {
            documents.push({ ...result.document });
        }
        return documents;
    }
}
