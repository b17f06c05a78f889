import fs from 'node:fs';
import path from 'node:path';
import ini from 'ini';
import type { CliArgs, Config } from '../types.js';
import { resolveAdminKey } from '../utils/credentials.js';

export function getFileFormat(filePath: string): 'json' | 'ini' {
    const ext = path.extname(filePath).toLowerCase();
    if (ext === '.json') return 'json';
    return 'ini';
}

export function parseStringList(value: string | undefined): string[] {
    if (!value) return [];
    return value
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
}

/**
 * Parse partition indices from "0, 2, 5" or a JSON array.
 * Entries that are not non-negative integers are dropped with a warning.
 */
export function parseIndexList(value: unknown): number[] {
    let items: unknown[];
    if (Array.isArray(value)) {
        items = value;
    } else if (typeof value === 'string') {
        items = parseStringList(value);
    } else if (typeof value === 'number') {
        items = [value];
    } else {
        return [];
    }

    const indices: number[] = [];
    for (const item of items) {
        const index = typeof item === 'number' ? item : Number(String(item).trim());
        if (!Number.isInteger(index) || index < 0) {
            console.warn(`⚠️  Invalid partition index: "${String(item)}"`);
            continue;
        }
        indices.push(index);
    }
    return indices;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
    const value = parsed[name];
    return isRecord(value) ? value : {};
}

function readText(source: Record<string, unknown>, key: string): string | null {
    const value = source[key];
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
    if (typeof value === 'number') return String(value);
    return null;
}

function readNumber(source: Record<string, unknown>, key: string): number | undefined {
    const value = source[key];
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value.trim());
        return Number.isNaN(parsed) ? undefined : parsed;
    }
    return undefined;
}

function readConfigValues(
    service: Record<string, unknown>,
    partition: Record<string, unknown>,
    exporting: Record<string, unknown>
): Partial<Config> {
    const config: Partial<Config> = {
        endpoint: readText(service, 'endpoint'),
        indexName: readText(service, 'indexName'),
        fieldName: readText(service, 'fieldName'),
        lowerBound: readText(partition, 'lowerBound'),
        upperBound: readText(partition, 'upperBound'),
        partitionPath: readText(partition, 'partitionPath'),
        includePartitions: parseIndexList(exporting.includePartitions),
        excludePartitions: parseIndexList(exporting.excludePartitions),
    };

    const exportPath = readText(exporting, 'exportPath');
    if (exportPath !== null) config.exportPath = exportPath;

    const concurrentPartitions = readNumber(exporting, 'concurrentPartitions');
    if (concurrentPartitions !== undefined) config.concurrentPartitions = concurrentPartitions;

    const pageSize = readNumber(exporting, 'pageSize');
    if (pageSize !== undefined) config.pageSize = pageSize;

    const retries = readNumber(exporting, 'retries');
    if (retries !== undefined) config.retries = retries;

    const rateLimit = readNumber(exporting, 'rateLimit');
    if (rateLimit !== undefined) config.rateLimit = rateLimit;

    return config;
}

export function parseIniConfig(content: string): Partial<Config> {
    const parsed: Record<string, unknown> = ini.parse(content);
    return readConfigValues(
        section(parsed, 'service'),
        section(parsed, 'partition'),
        section(parsed, 'export')
    );
}

export function parseJsonConfig(content: string): Partial<Config> {
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
        throw new Error('JSON config must be an object');
    }
    return readConfigValues(parsed, parsed, parsed);
}

export function loadConfigFile(configPath?: string): Partial<Config> {
    if (!configPath) return {};

    const absolutePath = path.resolve(configPath);
    if (!fs.existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    const content = fs.readFileSync(absolutePath, 'utf-8');
    const format = getFileFormat(absolutePath);

    console.log(`📄 Loaded config from: ${absolutePath} (${format.toUpperCase()})\n`);

    return format === 'json' ? parseJsonConfig(content) : parseIniConfig(content);
}

function pickList(cliValue: number[] | undefined, fileValue: number[] | undefined, fallback: number[]): number[] {
    if (cliValue && cliValue.length > 0) return cliValue;
    if (fileValue && fileValue.length > 0) return fileValue;
    return fallback;
}

/**
 * Command line wins over the config file, which wins over defaults.
 * The admin key never comes from a file.
 */
export function mergeConfig(
    defaultConfig: Config,
    fileConfig: Partial<Config>,
    cliArgs: CliArgs,
    env: NodeJS.ProcessEnv = process.env
): Config {
    return {
        endpoint: cliArgs.endpoint ?? fileConfig.endpoint ?? defaultConfig.endpoint,
        adminKey: resolveAdminKey(cliArgs.adminKey, env) ?? defaultConfig.adminKey,
        indexName: cliArgs.indexName ?? fileConfig.indexName ?? defaultConfig.indexName,
        fieldName: cliArgs.fieldName ?? fileConfig.fieldName ?? defaultConfig.fieldName,
        lowerBound: cliArgs.lowerBound ?? fileConfig.lowerBound ?? defaultConfig.lowerBound,
        upperBound: cliArgs.upperBound ?? fileConfig.upperBound ?? defaultConfig.upperBound,
        partitionPath:
            cliArgs.partitionPath ?? fileConfig.partitionPath ?? defaultConfig.partitionPath,
        exportPath: cliArgs.exportPath ?? fileConfig.exportPath ?? defaultConfig.exportPath,
        concurrentPartitions:
            cliArgs.concurrentPartitions ??
            fileConfig.concurrentPartitions ??
            defaultConfig.concurrentPartitions,
        pageSize: cliArgs.pageSize ?? fileConfig.pageSize ?? defaultConfig.pageSize,
        includePartitions: pickList(
            cliArgs.includePartition,
            fileConfig.includePartitions,
            defaultConfig.includePartitions
        ),
        excludePartitions: pickList(
            cliArgs.excludePartition,
            fileConfig.excludePartitions,
            defaultConfig.excludePartitions
        ),
        retries: cliArgs.retries ?? fileConfig.retries ?? defaultConfig.retries,
        rateLimit: cliArgs.rateLimit ?? fileConfig.rateLimit ?? defaultConfig.rateLimit,
        json: cliArgs.json ?? defaultConfig.json,
    };
}
