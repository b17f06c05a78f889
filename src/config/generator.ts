import fs from 'node:fs';
import path from 'node:path';
import { ADMIN_KEY_ENV } from '../constants.js';
import { getFileFormat } from './parser.js';
import { iniTemplate, jsonTemplate } from './defaults.js';

export function renderConfigTemplate(filePath: string): string {
    return getFileFormat(filePath) === 'json' ? JSON.stringify(jsonTemplate, null, 4) + '\n' : iniTemplate;
}

/**
 * Write a config template for `--init`. An existing file is left untouched.
 */
export function generateConfigFile(outputPath: string): boolean {
    const filePath = path.resolve(outputPath);

    if (fs.existsSync(filePath)) {
        console.error(`❌ ${filePath} already exists, choose another name or remove it first`);
        return false;
    }

    fs.writeFileSync(filePath, renderConfigTemplate(filePath), 'utf-8');

    console.log(`✓ Config template created: ${filePath}`);
    console.log('');
    console.log(`Set the endpoint, index and field, export ${ADMIN_KEY_ENV}, then run:`);
    for (const command of ['get-bounds', 'partition-index', 'export-partitions']) {
        console.log(`  search-export ${command} -f ${outputPath}`);
    }

    return true;
}
