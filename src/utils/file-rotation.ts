import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_MAX_LOG_FILES } from '../constants.js';

export interface RotationOptions {
    /** Rotate once the file reaches this many bytes (0 = never) */
    maxSize: number;
    /** Numbered backups to keep */
    maxFiles?: number;
}

/** `run.log` -> `run.<n>.log` */
export function numberedPath(filePath: string, n: number): string {
    const ext = path.extname(filePath);
    return path.join(path.dirname(filePath), `${path.basename(filePath, ext)}.${n}${ext}`);
}

/**
 * Move a file that has grown past `maxSize` to `<name>.1<ext>`, shifting older
 * backups up by one and dropping the oldest. Returns the backup path, or null
 * when nothing was rotated.
 */
export function rotateFileIfNeeded(filePath: string, options: RotationOptions): string | null {
    const maxFiles = options.maxFiles ?? DEFAULT_MAX_LOG_FILES;
    if (!filePath || options.maxSize <= 0 || maxFiles < 1) return null;
    if (!fs.existsSync(filePath) || fs.statSync(filePath).size < options.maxSize) return null;

    fs.rmSync(numberedPath(filePath, maxFiles), { force: true });
    for (let n = maxFiles - 1; n >= 1; n--) {
        const from = numberedPath(filePath, n);
        if (fs.existsSync(from)) {
            fs.renameSync(from, numberedPath(filePath, n + 1));
        }
    }

    const backup = numberedPath(filePath, 1);
    fs.renameSync(filePath, backup);
    return backup;
}
