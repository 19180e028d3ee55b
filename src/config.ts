import * as path from 'path';

// Default paths and constants
export const DEFAULT_STORAGE_FILE = 'file.json';

export const PROMPT = '(hbnb) ';

export interface AppConfig {
    /** Absolute path of the JSON document the object table is persisted to. */
    storageFile: string;
    debug: boolean;
}

const TRUTHY = new Set(['1', 'true', 'yes']);

/**
 * Reads the console's settings from the environment
 * (after `dotenv.config()` has merged any `.env` file into it).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, resolveFn = path.resolve): AppConfig {
    const storageFile = env.HBNB_STORAGE_FILE?.trim() || DEFAULT_STORAGE_FILE;
    return {
        storageFile: resolveFn(storageFile),
        debug: TRUTHY.has((env.HBNB_DEBUG ?? '').trim().toLowerCase()),
    };
}
