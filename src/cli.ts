#!/usr/bin/env node

import { hideBin } from 'yargs/helpers';
import type { CliArgs, Command, Config } from './types.js';
import { createParser, parseArgs } from './args.js';
import {
    defaults,
    generateConfigFile,
    isServiceConfig,
    loadConfigFile,
    mergeConfig,
    validateConfig,
} from './config/index.js';
import { Output, parseSize } from './utils/output.js';
import { toError } from './utils/errors.js';
import { createSearchService } from './search/index.js';
import { displayConfig } from './output/display.js';
import { promptForAdminKey } from './interactive.js';
import { runExportPartitions, runGetBounds, runPartitionIndex, type CommandResult } from './orchestrator.js';

// =============================================================================
// Main
// =============================================================================

async function resolveConfig(argv: CliArgs): Promise<Config> {
    const fileConfig = loadConfigFile(argv.config);
    const config = mergeConfig(defaults, fileConfig, argv);

    if (!config.adminKey && argv.interactive) {
        return { ...config, adminKey: await promptForAdminKey() };
    }
    return config;
}

async function runCommand(command: Command, argv: CliArgs, config: Config, output: Output): Promise<CommandResult> {
    if (command === 'export-partitions') {
        const { adminKey } = config;
        if (!adminKey) {
            throw new Error('Admin key is required');
        }
        // Endpoint and index come from the partition file
        return runExportPartitions(
            config,
            output,
            (endpoint, indexName) => createSearchService(endpoint, adminKey, indexName),
            { yes: argv.yes, interactive: argv.interactive ?? false }
        );
    }

    if (!isServiceConfig(config)) {
        throw new Error('Endpoint, admin key and index name are required');
    }
    const service = createSearchService(config.endpoint, config.adminKey, config.indexName);
    return command === 'get-bounds' ? runGetBounds(config, output, service) : runPartitionIndex(config, output, service);
}

async function main(argv: CliArgs): Promise<number> {
    if (argv.init !== undefined) {
        return generateConfigFile(argv.init) ? 0 : 1;
    }

    const { command } = argv;
    if (!command) {
        createParser([]).showHelp();
        return 1;
    }

    let config: Config;
    try {
        config = await resolveConfig(argv);
    } catch (error) {
        console.error(`\n❌ ${toError(error).message}`);
        return 1;
    }

    const errors = validateConfig(command, config);
    if (errors.length > 0) {
        console.error('\n❌ Configuration errors:');
        errors.forEach((err) => console.error(`   - ${err}`));
        return 1;
    }

    const output = new Output({
        quiet: argv.quiet,
        json: config.json,
        logFile: argv.log,
        title: `search-export ${command} log`,
        maxLogSize: parseSize(argv.maxLogSize),
    });
    output.init();
    output.logInfo(`Starting ${command}`, { endpoint: config.endpoint, indexName: config.indexName });

    if (!output.isQuiet && !output.isJson) {
        displayConfig(command, config);
        console.log('');
    }

    const result = await runCommand(command, argv, config, output);
    return result.success ? 0 : 1;
}

process.exitCode = await main(parseArgs(hideBin(process.argv)));
