import { Clock, IdGenerator } from '../src/models/types';
import { FileStorageDependencies } from '../src/storage/FileStorage';

function missing(path: string): Error {
    return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
}

/** In-memory stand-in for the file system functions FileStorage uses. */
export class MemoryFiles {
    readonly files = new Map<string, string>();

    readonly deps: FileStorageDependencies = {
        readFileFn: async (path) => {
            const data = this.files.get(path);
            if (data === undefined) {
                throw missing(path);
            }
            return data;
        },
        writeFileFn: async (path, data) => {
            this.files.set(path, data);
        },
        renameFn: async (from, to) => {
            const data = this.files.get(from);
            if (data === undefined) {
                throw missing(from);
            }
            this.files.set(to, data);
            this.files.delete(from);
        },
        unlinkFn: async (path) => {
            if (!this.files.delete(path)) {
                throw missing(path);
            }
        },
    };
}

/** A clock that starts at `start` and advances `stepMs` on every reading. */
export function steppingClock(start = '2024-01-01T00:00:00.000Z', stepMs = 1000): Clock {
    let next = Date.parse(start);
    return () => {
        const now = new Date(next);
        next += stepMs;
        return now;
    };
}

export function sequentialIds(prefix = 'id'): IdGenerator {
    let n = 0;
    return () => `${prefix}-${++n}`;
}
