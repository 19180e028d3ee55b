import * as fs from 'fs/promises';
import { CorruptStoreError, IOFailureError, MalformedAttributeError } from '../errors';
import { Entity } from '../models/Entity';
import { KindRegistry } from '../models/registry';
import { AttributeValue, CLASS_KEY, SerializedEntity } from '../models/types';
import { dbg } from '../utils';

type ReadFileFn = (path: string) => Promise<string>;
type WriteFileFn = (path: string, data: string) => Promise<void>;
type RenameFn = (from: string, to: string) => Promise<void>;
type UnlinkFn = (path: string) => Promise<void>;

export interface FileStorageDependencies {
    readFileFn?: ReadFileFn;
    writeFileFn?: WriteFileFn;
    renameFn?: RenameFn;
    unlinkFn?: UnlinkFn;
}

/**
 * Owns the table of live entities and mirrors it to a JSON document.
 * Keys are `<Kind>.<id>`; the table keeps insertion order.
 *
 * Mutations (`put`, `remove`) only touch memory. Callers decide when to
 * `persist`, which rewrites the whole document.
 */
export class FileStorage {
    private objects = new Map<string, Entity>();

    private readonly readFile: ReadFileFn;
    private readonly writeFile: WriteFileFn;
    private readonly rename: RenameFn;
    private readonly unlink: UnlinkFn;

    constructor(
        private readonly registry: KindRegistry,
        readonly filePath: string,
        deps?: FileStorageDependencies,
    ) {
        this.readFile = deps?.readFileFn || ((p: string) => fs.readFile(p, 'utf-8'));
        this.writeFile = deps?.writeFileFn || ((p: string, data: string) => fs.writeFile(p, data, 'utf-8'));
        this.rename = deps?.renameFn || fs.rename;
        this.unlink = deps?.unlinkFn || fs.unlink;
    }

    static keyFor(kind: string, id: string): string {
        return `${kind}.${id}`;
    }

    /**
     * Replaces the table with the contents of the storage file.
     * A missing file yields an empty table. On any failure the current table
     * is left as it was.
     * @throws CorruptStoreError if the document is not a valid object table.
     * @throws UnknownKindError if an entry names an unregistered kind.
     * @throws IOFailureError if the file exists but cannot be read.
     */
    async reload(): Promise<void> {
        dbg(`FileStorage: Loading objects from ${this.filePath}`);
        let data: string;
        try {
            data = await this.readFile(this.filePath);
        } catch (error: unknown) {
            if (isMissingFile(error)) {
                dbg(`FileStorage: ${this.filePath} not found. Starting with an empty table.`);
                this.objects = new Map();
                return;
            }
            throw new IOFailureError(this.filePath, 'load', error);
        }

        let document: unknown;
        try {
            document = JSON.parse(data);
        } catch (error: unknown) {
            throw new CorruptStoreError(this.filePath, 'not valid JSON', { cause: error });
        }
        if (!isRecord(document)) {
            throw new CorruptStoreError(this.filePath, 'top level is not an object');
        }

        const loaded = new Map<string, Entity>();
        for (const [key, entry] of Object.entries(document)) {
            if (!isRecord(entry)) {
                throw new CorruptStoreError(this.filePath, `entry ${key} is not an object`);
            }
            const className = entry[CLASS_KEY];
            const kind = typeof className === 'string' ? className : key.split('.')[0];
            const constructor = this.registry.resolve(kind);
            let entity: Entity;
            try {
                entity = constructor.restore(entry);
            } catch (error: unknown) {
                if (error instanceof MalformedAttributeError) {
                    throw new CorruptStoreError(this.filePath, `entry ${key}: ${error.message}`, { cause: error });
                }
                throw error;
            }
            const expectedKey = FileStorage.keyFor(entity.kind, entity.id);
            if (key !== expectedKey) {
                throw new CorruptStoreError(this.filePath, `entry ${key} does not match ${expectedKey}`);
            }
            loaded.set(key, entity);
        }
        this.objects = loaded;
        dbg(`FileStorage: Loaded ${loaded.size} objects.`);
    }

    /**
     * Writes the whole table to the storage file. The document goes to a
     * temporary sibling first and is renamed into place, so a failed save
     * leaves the previous file intact.
     * @throws IOFailureError if the document cannot be written.
     */
    async persist(): Promise<void> {
        const document: Record<string, SerializedEntity> = {};
        for (const [key, entity] of this.objects) {
            document[key] = { [CLASS_KEY]: entity.kind, ...entity.toSerializable() };
        }
        const data = JSON.stringify(document, null, 2);
        const tempPath = `${this.filePath}.tmp`;
        dbg(`FileStorage: Saving ${this.objects.size} objects to ${this.filePath}`);
        try {
            await this.writeFile(tempPath, data);
            await this.rename(tempPath, this.filePath);
        } catch (error: unknown) {
            await this.discard(tempPath);
            throw new IOFailureError(this.filePath, 'save', error);
        }
    }

    /** Adds the entity to the table, or replaces the one with the same kind and id. */
    put(entity: Entity): void {
        this.objects.set(FileStorage.keyFor(entity.kind, entity.id), entity);
    }

    /** The live entity (not a copy), or `undefined` if the table has no such key. */
    get(kind: string, id: string): Entity | undefined {
        return this.objects.get(FileStorage.keyFor(kind, id));
    }

    /** Live entities in insertion order, optionally restricted to one kind. */
    *all(kind?: string): Generator<Entity> {
        for (const entity of this.objects.values()) {
            if (kind === undefined || entity.kind === kind) {
                yield entity;
            }
        }
    }

    /**
     * Drops an entity from the table. The file changes only on the next `persist`.
     * @returns Whether an entity was removed.
     */
    remove(kind: string, id: string): boolean {
        return this.objects.delete(FileStorage.keyFor(kind, id));
    }

    /** Number of entities in the table, or of one kind. */
    count(kind?: string): number {
        if (kind === undefined) {
            return this.objects.size;
        }
        return [...this.all(kind)].length;
    }

    private async discard(tempPath: string): Promise<void> {
        try {
            await this.unlink(tempPath);
        } catch (error: unknown) {
            if (!isMissingFile(error)) {
                dbg(`FileStorage: Could not remove ${tempPath}: ${error}`);
            }
        }
    }
}

function isRecord(value: unknown): value is Record<string, AttributeValue> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
