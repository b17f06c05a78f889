import { checkbox, password } from '@inquirer/prompts';
import type { Partition, PartitionFile } from './types.js';
import { ADMIN_KEY_ENV, PICKER_PAGE_SIZE, SEPARATOR_LENGTH } from './constants.js';
import { formatPartitionTable } from './output/display.js';

export async function promptForAdminKey(): Promise<string> {
    console.log(`🔑 No admin key given (--admin-key or ${ADMIN_KEY_ENV})`);
    return password({
        message: 'Admin key:',
        mask: '*',
        validate: (value) => value.length > 0 || 'Admin key is required',
    });
}

/**
 * Let the user pick partitions from the plan. Partitions already selected
 * on the command line start checked.
 */
export async function selectPartitions(file: PartitionFile, preselected: Partition[]): Promise<Partition[]> {
    console.log('\n' + '='.repeat(SEPARATOR_LENGTH));
    console.log('📦 SEARCH-EXPORT - INTERACTIVE MODE');
    console.log('='.repeat(SEPARATOR_LENGTH) + '\n');
    console.log(`📄 ${file.indexName}: ${file.partitions.length} partitions, ${file.totalDocumentCount} documents\n`);

    const checked = new Set(preselected.map((partition) => partition.index));
    const rows = formatPartitionTable(file.partitions, file.fieldType);

    const selected = await checkbox({
        message: 'Select partitions to export:',
        pageSize: PICKER_PAGE_SIZE,
        choices: file.partitions.map((partition, position) => ({
            name: rows[position]?.trim() ?? String(partition.index),
            value: partition.index,
            checked: checked.has(partition.index),
        })),
        validate: (value) => value.length > 0 || 'Select at least one partition',
    });

    const chosen = new Set(selected);
    return file.partitions.filter((partition) => chosen.has(partition.index));
}
