import yargs from 'yargs';
import type { CliArgs, Command } from './types.js';
import { ADMIN_KEY_ENV } from './constants.js';

export const COMMANDS: readonly Command[] = ['get-bounds', 'partition-index', 'export-partitions'];

function isCommand(value: unknown): value is Command {
    return COMMANDS.some((command) => command === value);
}

export function createParser(args: string[]) {
    return yargs(args)
        .scriptName('search-export')
        .usage('$0 <command> [options]')
        .command('get-bounds', 'Print the smallest and largest value of the partition field')
        .command('partition-index', 'Split the index into partitions and write a partition file')
        .command('export-partitions', 'Export the partitions of a partition file to .jsonl files')
        .option('init', {
            type: 'string',
            description: 'Generate a config template file (.ini by default, .json if specified)',
            nargs: 1,
        })
        .option('config', {
            alias: 'f',
            type: 'string',
            description: 'Path to config file (.ini or .json)',
        })
        .option('endpoint', {
            type: 'string',
            description: 'Search service endpoint (https://<service>.search.windows.net)',
        })
        .option('admin-key', {
            type: 'string',
            description: `Search service admin key (default: $${ADMIN_KEY_ENV})`,
        })
        .option('index-name', {
            type: 'string',
            description: 'Name of the index to export',
        })
        .option('field-name', {
            type: 'string',
            description: 'Sortable, filterable field used to partition the index',
        })
        .option('lower-bound', {
            type: 'string',
            description: 'Smallest field value to partition (default: smallest value in the index)',
        })
        .option('upper-bound', {
            type: 'string',
            description: 'Largest field value to partition (default: largest value in the index)',
        })
        .option('partition-path', {
            type: 'string',
            description: 'Partition file to write or read (default: <index-name>-partitions.json)',
        })
        .option('export-path', {
            type: 'string',
            description: 'Directory for the exported .jsonl files (default: .)',
        })
        .option('concurrent-partitions', {
            type: 'number',
            description: 'Number of partitions exported at the same time (default: 2)',
        })
        .option('page-size', {
            type: 'number',
            description: 'Documents requested per page, at most 1000 (default: 1000)',
        })
        .option('include-partition', {
            type: 'number',
            array: true,
            description: 'Only export these partition indices',
        })
        .option('exclude-partition', {
            type: 'number',
            array: true,
            description: 'Export every partition except these indices',
        })
        .option('yes', {
            alias: 'y',
            type: 'boolean',
            description: 'Skip confirmation prompt',
            default: false,
        })
        .option('log', {
            type: 'string',
            description: 'Path to log file for run details',
        })
        .option('max-log-size', {
            type: 'string',
            description: 'Rotate the log file when it exceeds this size (e.g. 10MB)',
        })
        .option('retries', {
            type: 'number',
            description: 'Number of retries on error (default: 3)',
        })
        .option('rate-limit', {
            type: 'number',
            description: 'Limit export rate (documents per second, 0 = unlimited)',
        })
        .option('quiet', {
            alias: 'q',
            type: 'boolean',
            description: 'Minimal output (no progress bar)',
            default: false,
        })
        .option('json', {
            type: 'boolean',
            description: 'Output results in JSON format (for CI/CD)',
        })
        .option('interactive', {
            alias: 'i',
            type: 'boolean',
            description: 'Pick partitions and enter a missing admin key interactively',
        })
        .example('$0 --init search-export.ini', 'Generate INI config template (default)')
        .example('$0 get-bounds -f search-export.ini', 'Show the range of the partition field')
        .example('$0 partition-index -f search-export.ini', 'Write the partition file')
        .example('$0 export-partitions -f search-export.ini -y', 'Export every partition')
        .example('$0 export-partitions -f search-export.ini --include-partition 0 1', 'Export partitions 0 and 1')
        .example('$0 export-partitions -f search-export.ini -i', 'Pick partitions interactively')
        .help();
}

export function parseArgs(args: string[]): CliArgs {
    const argv = createParser(args).parseSync();
    const [command] = argv._;

    return {
        command: isCommand(command) ? command : undefined,
        init: argv.init,
        config: argv.config,
        endpoint: argv.endpoint,
        adminKey: argv.adminKey,
        indexName: argv.indexName,
        fieldName: argv.fieldName,
        lowerBound: argv.lowerBound,
        upperBound: argv.upperBound,
        partitionPath: argv.partitionPath,
        exportPath: argv.exportPath,
        concurrentPartitions: argv.concurrentPartitions,
        pageSize: argv.pageSize,
        includePartition: argv.includePartition,
        excludePartition: argv.excludePartition,
        yes: argv.yes,
        log: argv.log,
        maxLogSize: argv.maxLogSize,
        retries: argv.retries,
        rateLimit: argv.rateLimit,
        quiet: argv.quiet,
        json: argv.json,
        interactive: argv.interactive,
    };
}
