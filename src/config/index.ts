export { defaults, iniTemplate, jsonTemplate } from './defaults.js';
export {
    getFileFormat,
    parseStringList,
    parseIndexList,
    parseIniConfig,
    parseJsonConfig,
    loadConfigFile,
    mergeConfig,
} from './parser.js';
export {
    validateEndpoint,
    validateBoundsConfig,
    validatePartitionConfig,
    validateExportConfig,
    validateConfig,
    isServiceConfig,
} from './validator.js';
export { generateConfigFile, renderConfigTemplate } from './generator.js';
