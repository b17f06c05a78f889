import { ADMIN_KEY_ENV } from '../constants.js';

/** Admin key from the command line, else from the environment */
export function resolveAdminKey(
    argumentKey: string | null | undefined,
    env: NodeJS.ProcessEnv = process.env
): string | null {
    if (argumentKey && argumentKey.length > 0) {
        return argumentKey;
    }

    const envKey = env[ADMIN_KEY_ENV];
    if (envKey && envKey.length > 0) {
        return envKey;
    }

    return null;
}

/** Show only enough of the key to tell two keys apart */
export function maskAdminKey(key: string): string {
    if (key.length <= 4) {
        return '*'.repeat(key.length);
    }
    return `${'*'.repeat(key.length - 4)}${key.slice(-4)}`;
}
