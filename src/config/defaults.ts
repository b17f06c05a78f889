import type { Config } from '../types.js';

export const defaults: Config = {
    endpoint: null,
    adminKey: null,
    indexName: null,
    fieldName: null,
    lowerBound: null,
    upperBound: null,
    partitionPath: null,
    exportPath: '.',
    concurrentPartitions: 2,
    pageSize: 1000,
    includePartitions: [],
    excludePartitions: [],
    retries: 3,
    rateLimit: 0,
    json: false,
};

export const iniTemplate = `; search-export configuration file
; The admin key is not read from this file: use --admin-key or SEARCH_ADMIN_KEY

[service]
endpoint = https://my-service.search.windows.net
indexName = my-index
; Field used to partition the index. Must be sortable and filterable
fieldName = lastUpdated

[partition]
; Bounds default to the smallest and largest value in the index
; lowerBound = 2024-01-01T00:00:00.000Z
; upperBound = 2024-12-31T23:59:59.999Z
; Defaults to <indexName>-partitions.json
; partitionPath = my-index-partitions.json

[export]
exportPath = ./export
concurrentPartitions = 2
pageSize = 1000
; Comma-separated partition indices. Use only one of the two
; includePartitions = 0, 1
; excludePartitions = 2
retries = 3
; Documents per second across all partitions (0 = unlimited)
rateLimit = 0
`;

export const jsonTemplate = {
    endpoint: 'https://my-service.search.windows.net',
    indexName: 'my-index',
    fieldName: 'lastUpdated',
    lowerBound: null,
    upperBound: null,
    partitionPath: null,
    exportPath: './export',
    concurrentPartitions: 2,
    pageSize: 1000,
    includePartitions: [],
    excludePartitions: [],
    retries: 3,
    rateLimit: 0,
};
