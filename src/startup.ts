import { CorruptStoreError, IOFailureError, UnknownKindError } from './errors';
import { FileStorage } from './storage/FileStorage';

export const STARTUP_ERROR = 1;

type ErrorFn = (s: string) => void;
type ExitFn = (code: number) => never;

/**
 * Loads the storage file before the first command is read.
 * A store that cannot be loaded ends the process with `STARTUP_ERROR`;
 * anything unexpected is re-thrown.
 */
export async function loadStorageOrExit(
    storage: FileStorage,
    errorFn: ErrorFn = console.error,
    exitFn: ExitFn = (code) => process.exit(code),
): Promise<void> {
    try {
        await storage.reload();
    } catch (error: unknown) {
        const reason = startupFailureReason(error);
        if (reason === undefined) {
            throw error;
        }
        errorFn(`Unable to load storage file ${storage.filePath}: ${reason}`);
        exitFn(STARTUP_ERROR);
    }
}

function startupFailureReason(error: unknown): string | undefined {
    if (error instanceof UnknownKindError) {
        return `unknown class "${error.kind}"`;
    }
    if (error instanceof CorruptStoreError || error instanceof IOFailureError) {
        return error.reason;
    }
    return undefined;
}
