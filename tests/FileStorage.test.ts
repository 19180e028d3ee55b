import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { CorruptStoreError, IOFailureError, UnknownKindError } from '../src/errors';
import { createDefaultRegistry, KindRegistry } from '../src/models/registry';
import { FileStorage } from '../src/storage/FileStorage';
import { MemoryFiles, sequentialIds, steppingClock } from './helpers';

const FILE_PATH = '/data/file.json';

async function expectRejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    expect.fail('expected the promise to reject');
}

describe('FileStorage', () => {
    let registry: KindRegistry;
    let files: MemoryFiles;
    let storage: FileStorage;

    beforeEach(() => {
        registry = createDefaultRegistry({ clock: steppingClock(), newId: sequentialIds() });
        files = new MemoryFiles();
        storage = new FileStorage(registry, FILE_PATH, files.deps);
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('table operations', () => {
        it('should store, find and remove entities by kind and id', () => {
            const user = registry.resolve('User').create();
            storage.put(user);

            expect(storage.get('User', user.id)).to.equal(user);
            expect(storage.get('State', user.id)).to.be.undefined;
            expect(storage.remove('User', user.id)).to.be.true;
            expect(storage.remove('User', user.id)).to.be.false;
            expect(storage.count()).to.equal(0);
        });

        it('should return the same live object for repeated lookups', () => {
            const user = registry.resolve('User').create();
            storage.put(user);

            storage.get('User', 'id-1')?.update([['first_name', 'Betty']]);

            expect(storage.get('User', 'id-1')?.get('first_name')).to.equal('Betty');
        });

        it('should enumerate in insertion order and filter by kind', () => {
            for (const kind of ['User', 'State', 'User']) {
                storage.put(registry.resolve(kind).create());
            }

            expect([...storage.all()].map(e => e.id)).to.deep.equal(['id-1', 'id-2', 'id-3']);
            expect([...storage.all('User')].map(e => e.id)).to.deep.equal(['id-1', 'id-3']);
            expect([...storage.all('User')].map(e => e.id)).to.deep.equal(['id-1', 'id-3']);
            expect(storage.count('User')).to.equal(2);
            expect(storage.count('Place')).to.equal(0);
            expect(storage.count()).to.equal(3);
        });
    });

    describe('persist', () => {
        it('should write every entity under its composite key with its class', async () => {
            const state = registry.resolve('State').create();
            state.update([['name', 'California']]);
            storage.put(state);

            await storage.persist();

            const document = JSON.parse(files.files.get(FILE_PATH) ?? '{}');
            expect(document).to.deep.equal({
                'State.id-1': {
                    __class__: 'State',
                    id: 'id-1',
                    created_at: '2024-01-01T00:00:00.000Z',
                    updated_at: '2024-01-01T00:00:01.000Z',
                    name: 'California',
                },
            });
            expect(files.files.has(`${FILE_PATH}.tmp`)).to.be.false;
        });

        it('should keep the previous file when the rename fails', async () => {
            files.files.set(FILE_PATH, '{}');
            sinon.stub(files.deps, 'renameFn').rejects(new Error('disk full'));
            storage = new FileStorage(registry, FILE_PATH, files.deps);
            storage.put(registry.resolve('User').create());

            const error = await expectRejection(storage.persist());

            expect(error).to.be.instanceOf(IOFailureError);
            expect(error).to.have.property('message', 'unable to save /data/file.json: disk full');
            expect(files.files.get(FILE_PATH)).to.equal('{}');
            expect(files.files.has(`${FILE_PATH}.tmp`)).to.be.false;
            expect(storage.count()).to.equal(1);
        });
    });

    describe('reload', () => {
        it('should start empty when the file does not exist', async () => {
            storage.put(registry.resolve('User').create());

            await storage.reload();

            expect(storage.count()).to.equal(0);
        });

        it('should reproduce a persisted table exactly', async () => {
            const user = registry.resolve('User').create();
            user.update([['first_name', 'Betty'], ['age', '89']]);
            const place = registry.resolve('Place').create();
            place.update([['number_rooms', '3'], ['latitude', '37.77'], ['amenity_ids', ['a-1']]]);
            storage.put(user);
            storage.put(place);
            await storage.persist();

            const reloaded = new FileStorage(createDefaultRegistry(), FILE_PATH, files.deps);
            await reloaded.reload();

            expect([...reloaded.all()].map(e => e.toSerializable()))
                .to.deep.equal([...storage.all()].map(e => e.toSerializable()));
            expect(reloaded.get('User', user.id)?.updatedAt.getTime()).to.equal(user.updatedAt.getTime());
            expect(reloaded.get('User', user.id)?.get('age')).to.equal(89);
        });

        it('should load documents with microsecond, zone-less timestamps', async () => {
            files.files.set(FILE_PATH, JSON.stringify({
                'User.abcd-efgh': {
                    __class__: 'User',
                    id: 'abcd-efgh',
                    email: 'test@example.com',
                    created_at: '2023-01-01T13:00:00.000000',
                    updated_at: '2023-01-01T13:00:00.000000',
                },
            }));

            await storage.reload();

            const user = storage.get('User', 'abcd-efgh');
            expect(user?.get('email')).to.equal('test@example.com');
            expect(user?.get('created_at')).to.equal('2023-01-01T13:00:00.000Z');
        });

        it('should fall back to the key prefix when __class__ is absent', async () => {
            files.files.set(FILE_PATH, JSON.stringify({
                'City.c-1': { id: 'c-1', created_at: '2024-01-01T00:00:00Z', updated_at: '2024-01-01T00:00:00Z' },
            }));

            await storage.reload();

            expect(storage.get('City', 'c-1')?.kind).to.equal('City');
        });

        it('should reject invalid JSON and keep the current table', async () => {
            storage.put(registry.resolve('User').create());
            files.files.set(FILE_PATH, '{"User.1": ');

            const error = await expectRejection(storage.reload());

            expect(error).to.be.instanceOf(CorruptStoreError);
            expect(storage.count()).to.equal(1);
        });

        it('should reject a document that is not an object table', async () => {
            files.files.set(FILE_PATH, '[1, 2]');

            const error = await expectRejection(storage.reload());

            expect(error).to.be.instanceOf(CorruptStoreError);
            expect(error).to.have.property('message', '/data/file.json is corrupt: top level is not an object');
        });

        it('should reject entries that fail to restore', async () => {
            files.files.set(FILE_PATH, JSON.stringify({
                'User.u-1': { __class__: 'User', id: 'u-1', created_at: 'soon', updated_at: 'later' },
            }));

            const error = await expectRejection(storage.reload());

            expect(error).to.be.instanceOf(CorruptStoreError);
            expect(error).to.have.property('message', '/data/file.json is corrupt: entry User.u-1: created_at must be a timestamp');
        });

        it('should reject entries filed under the wrong key', async () => {
            files.files.set(FILE_PATH, JSON.stringify({
                'User.u-2': { __class__: 'User', id: 'u-1', created_at: '2024-01-01T00:00:00Z', updated_at: '2024-01-01T00:00:00Z' },
            }));

            const error = await expectRejection(storage.reload());

            expect(error).to.be.instanceOf(CorruptStoreError);
        });

        it('should propagate unknown kinds and load nothing', async () => {
            files.files.set(FILE_PATH, JSON.stringify({
                'User.u-1': { __class__: 'User', id: 'u-1', created_at: '2024-01-01T00:00:00Z', updated_at: '2024-01-01T00:00:00Z' },
                'Spaceship.s-1': { __class__: 'Spaceship', id: 's-1', created_at: '2024-01-01T00:00:00Z', updated_at: '2024-01-01T00:00:00Z' },
            }));

            const error = await expectRejection(storage.reload());

            expect(error).to.be.instanceOf(UnknownKindError);
            expect(storage.count()).to.equal(0);
        });

        it('should report read failures other than a missing file', async () => {
            sinon.stub(files.deps, 'readFileFn').rejects(Object.assign(new Error('permission denied'), { code: 'EACCES' }));
            storage = new FileStorage(registry, FILE_PATH, files.deps);

            const error = await expectRejection(storage.reload());

            expect(error).to.be.instanceOf(IOFailureError);
            expect(error).to.have.property('message', 'unable to load /data/file.json: permission denied');
        });
    });
});
