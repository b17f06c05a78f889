import fs from 'node:fs';
import type { LogEntry, LogLevel, Stats } from '../types.js';
import { DEFAULT_MAX_LOG_FILES } from '../constants.js';
import { rotateFileIfNeeded } from './file-rotation.js';

const SIZE_UNITS: Record<string, number> = {
    B: 1,
    KB: 1024,
    MB: 1024 ** 2,
    GB: 1024 ** 3,
};

/**
 * Bytes in a size such as "512", "10KB" or "1.5GB" (units are case-insensitive).
 * Returns 0, meaning no limit, for anything else.
 */
export function parseSize(sizeStr: string | undefined): number {
    const match = /^(\d+(?:\.\d+)?)\s*([KMG]?B)?$/i.exec(sizeStr?.trim() ?? '');
    if (!match) return 0;

    const unit = SIZE_UNITS[(match[2] ?? 'B').toUpperCase()] ?? 1;
    return Math.floor(Number.parseFloat(match[1]) * unit);
}

/** `[timestamp] [LEVEL] message {data}` */
export function formatLogLine(entry: LogEntry): string {
    const { timestamp, level, message, data } = entry;
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
    return `[${timestamp}] [${level}] ${message}${suffix}\n`;
}

export function formatLogSummary(stats: Stats, duration: string): string {
    return [
        '',
        '# Summary',
        `# Partitions: ${stats.partitionsExported}`,
        `# Documents: ${stats.documentsExported}`,
        `# Page requests: ${stats.pageRequests}`,
        `# Errors: ${stats.errors}`,
        `# Duration: ${duration}s`,
        '',
    ].join('\n');
}

export interface OutputOptions {
    quiet: boolean;
    json: boolean;
    logFile?: string;
    /** First line of a new log file */
    title: string;
    /** Rotate the log file on init once it reaches this many bytes (0 = never) */
    maxLogSize: number;
    maxLogFiles: number;
}

/**
 * Console and log file output for one command run.
 *
 * `--quiet` keeps only results, warnings and errors on the console; `--json`
 * keeps only the final JSON object. The log file gets every entry either way.
 */
export class Output {
    private readonly options: OutputOptions;
    private readonly startTime = new Date();

    constructor(options: Partial<OutputOptions> = {}) {
        this.options = {
            quiet: options.quiet ?? false,
            json: options.json ?? false,
            logFile: options.logFile,
            title: options.title ?? 'search-export log',
            maxLogSize: options.maxLogSize ?? 0,
            maxLogFiles: options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES,
        };
    }

    /** Start a fresh log file, moving an oversized previous one aside */
    init(): void {
        const { logFile, maxLogSize, maxLogFiles, title } = this.options;
        if (!logFile) return;

        rotateFileIfNeeded(logFile, { maxSize: maxLogSize, maxFiles: maxLogFiles });
        fs.writeFileSync(logFile, `# ${title}\n# Started: ${this.startTime.toISOString()}\n\n`);
    }

    // ==========================================================================
    // Console
    // ==========================================================================

    /** Results: shown in quiet mode, hidden in JSON mode */
    print(message: string): void {
        if (!this.options.json) {
            console.log(message);
        }
    }

    /** Progress and status: hidden in quiet and JSON mode */
    info(message: string): void {
        if (!this.options.quiet && !this.options.json) {
            console.log(message);
        }
    }

    blank(): void {
        this.info('');
    }

    warn(message: string): void {
        if (!this.options.json) {
            console.warn(message);
        }
    }

    error(message: string): void {
        if (!this.options.json) {
            console.error(message);
        }
    }

    /** The machine-readable result, printed in JSON mode only */
    json(data: unknown): void {
        if (this.options.json) {
            console.log(JSON.stringify(data, null, 2));
        }
    }

    // ==========================================================================
    // Log file
    // ==========================================================================

    log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (!this.options.logFile) return;

        const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, data };
        fs.appendFileSync(this.options.logFile, formatLogLine(entry));
    }

    logInfo(message: string, data?: Record<string, unknown>): void {
        this.log('INFO', message, data);
    }

    logWarn(message: string, data?: Record<string, unknown>): void {
        this.log('WARN', message, data);
    }

    logError(message: string, data?: Record<string, unknown>): void {
        this.log('ERROR', message, data);
    }

    logSuccess(message: string, data?: Record<string, unknown>): void {
        this.log('SUCCESS', message, data);
    }

    logSummary(stats: Stats, duration: string): void {
        if (this.options.logFile) {
            fs.appendFileSync(this.options.logFile, formatLogSummary(stats, duration));
        }
    }

    get isQuiet(): boolean {
        return this.options.quiet;
    }

    get isJson(): boolean {
        return this.options.json;
    }

    get logFile(): string | undefined {
        return this.options.logFile;
    }
}
