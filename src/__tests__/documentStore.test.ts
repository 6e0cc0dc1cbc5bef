// src/__tests__/documentStore.test.ts
import { DocumentStore, DocumentCollection, storeErrorStatus } from '../services/documentStore';
import { StoreError, StoreFailure } from '../utils/errors';
import { MemoryCollectionDriver } from './support/memoryDriver';

const failureOf = async (promise: Promise<unknown>): Promise<StoreFailure | 'none'> => {
  try {
    await promise;
  } catch (err) {
    if (err instanceof StoreError) {
      return err.kind;
    }
    throw err;
  }
  return 'none';
};

describe('DocumentStore', () => {
  let driver: MemoryCollectionDriver;
  let items: DocumentCollection;
  let tick: number;

  beforeEach(() => {
    driver = new MemoryCollectionDriver();
    tick = 0;
    const store = new DocumentStore(driver, () => new Date(Date.UTC(2026, 0, 1) + 1000 * tick++));
    items = store.collection('items');
  });

  it('should hand out the same collection for the same name', () => {
    const store = new DocumentStore(driver);

    expect(store.collection('items')).toBe(store.collection('items'));
    expect(store.collection('items')).not.toBe(store.collection('users'));
  });

  describe('insert', () => {
    it('should assign an id and version 1', async () => {
      const doc = await items.insert({ owner: 'alice', title: 'Alien' });

      expect(doc.id).toMatch(/^[0-9a-f]{24}$/);
      expect(doc.version).toBe(1);
      expect(doc.createdAt).toEqual(doc.updatedAt);
      expect(await items.findOne({ id: doc.id })).toEqual(doc);
    });

    it('should keep body fields named like the metadata apart from it', async () => {
      const doc = await items.insert({ _id: 'other', id: 'other', version: 9, title: 'Alien' });

      const found = await items.findOne({ id: doc.id });
      expect(found?.version).toBe(1);
      expect(found?.body).toEqual({ _id: 'other', id: 'other', version: 9, title: 'Alien' });
    });

    it('should refuse a duplicate without writing', async () => {
      await items.insert({ owner: 'alice', title: 'Alien' }, { owner: 'alice', title: 'Alien' });
      const writes = driver.writes;

      const failure = await failureOf(
        items.insert({ owner: 'alice', title: 'Alien', rating: 5 }, { owner: 'alice', title: 'Alien' })
      );

      expect(failure).toBe('Conflict');
      expect(driver.writes).toBe(writes);
      expect(driver.count('items')).toBe(1);
    });

    it('should allow the same title for another owner', async () => {
      await items.insert({ owner: 'alice', title: 'Alien' }, { owner: 'alice', title: 'Alien' });
      await items.insert({ owner: 'bob', title: 'Alien' }, { owner: 'bob', title: 'Alien' });

      expect(driver.count('items')).toBe(2);
    });

    it('should report a backend duplicate key as a conflict', async () => {
      const duplicate = Object.assign(new Error('E11000 duplicate key error'), { code: 11000 });
      driver.isDuplicateKeyError = (err: unknown) => err === duplicate;
      jest.spyOn(driver, 'insert').mockRejectedValueOnce(duplicate);

      expect(await failureOf(items.insert({ owner: 'alice', title: 'Alien' }))).toBe('Conflict');
    });
  });

  describe('query', () => {
    beforeEach(async () => {
      for (const title of ['Alien', 'Aliens', 'Heat', 'Ran']) {
        await items.insert({ owner: 'alice', title });
      }
      await items.insert({ owner: 'bob', title: 'Alien' });
    });

    it('should return every match of an equality filter', async () => {
      const docs = await items.query({ owner: 'alice' });

      expect(docs.map(doc => doc.body.title)).toEqual(['Alien', 'Aliens', 'Heat', 'Ran']);
    });

    it('should apply skip and limit', async () => {
      const docs = await items.query({ owner: 'alice' }, { skip: 1, limit: 2 });

      expect(docs.map(doc => doc.body.title)).toEqual(['Aliens', 'Heat']);
    });

    it('should treat a limit below 1 as no limit', async () => {
      const docs = await items.query({ owner: 'alice' }, { skip: 2, limit: 0 });

      expect(docs.map(doc => doc.body.title)).toEqual(['Heat', 'Ran']);
    });

    it('should match string fields against a pattern', async () => {
      const docs = await items.query({ owner: 'alice', title: /alien/i });

      expect(docs.map(doc => doc.body.title)).toEqual(['Alien', 'Aliens']);
    });

    it('should return an empty list when nothing matches', async () => {
      expect(await items.query({ owner: 'carol' })).toEqual([]);
      expect(await items.findOne({ owner: 'carol' })).toBeNull();
    });
  });

  describe('deleteOne', () => {
    it('should remove the matching document', async () => {
      const doc = await items.insert({ owner: 'alice', title: 'Alien' });

      await items.deleteOne({ id: doc.id, owner: 'alice' });

      expect(driver.count('items')).toBe(0);
    });

    it('should fail with NotFound when nothing matches', async () => {
      const doc = await items.insert({ owner: 'alice', title: 'Alien' });

      expect(await failureOf(items.deleteOne({ id: doc.id, owner: 'bob' }))).toBe('NotFound');
      expect(driver.count('items')).toBe(1);
    });
  });

  describe('replaceOne', () => {
    it('should replace the body and bump the version', async () => {
      const doc = await items.insert({ owner: 'alice', title: 'Alien', rating: 4 });

      const next = await items.replaceOne({ id: doc.id }, { owner: 'alice', title: 'Alien', rating: 5 });

      expect(next.version).toBe(2);
      expect(next.createdAt).toEqual(doc.createdAt);
      expect(next.updatedAt.getTime()).toBeGreaterThan(doc.updatedAt.getTime());
      expect(await items.findOne({ id: doc.id })).toEqual(next);
    });

    it('should fail with NotFound for a missing document', async () => {
      const failure = await failureOf(items.replaceOne({ id: '0123456789abcdef01234567' }, { title: 'Heat' }));

      expect(failure).toBe('NotFound');
    });

    it('should fail with NotFound when the body is unchanged', async () => {
      const doc = await items.insert({ owner: 'alice', title: 'Alien' });
      const writes = driver.writes;

      const failure = await failureOf(items.replaceOne({ id: doc.id }, { owner: 'alice', title: 'Alien' }));

      expect(failure).toBe('NotFound');
      expect(driver.writes).toBe(writes);
      expect((await items.findOne({ id: doc.id }))?.version).toBe(1);
    });

    it('should not overwrite a document that changed since it was read', async () => {
      const doc = await items.insert({ owner: 'alice', title: 'Alien' });
      const realFind = driver.find.bind(driver);
      jest.spyOn(driver, 'find').mockImplementationOnce(async (collection, filter, page) => {
        const found = await realFind(collection, filter, page);
        // Another writer lands between the read and the conditional write
        await driver.replace('items', { id: doc.id }, { ...doc, version: 2, body: { owner: 'alice', title: 'Heat' } });
        return found;
      });

      const failure = await failureOf(items.replaceOne({ id: doc.id }, { owner: 'alice', title: 'Ran' }));

      expect(failure).toBe('NotFound');
      expect((await items.findOne({ id: doc.id }))?.body.title).toBe('Heat');
    });
  });

  describe('transport failures', () => {
    beforeEach(() => {
      driver.offline = true;
    });

    const operations: Array<[string, () => Promise<unknown>]> = [
      ['query', () => items.query({})],
      ['insert', () => items.insert({ title: 'Alien' }, { title: 'Alien' })],
      ['deleteOne', () => items.deleteOne({ title: 'Alien' })],
      ['replaceOne', () => items.replaceOne({ title: 'Alien' }, { title: 'Heat' })]
    ];

    it.each(operations)('should classify a failing %s as a transport error', async (_name, operation) => {
      expect(await failureOf(operation())).toBe('TransportError');
    });
  });

  describe('storeErrorStatus', () => {
    it('should map every failure to its status', () => {
      expect(storeErrorStatus(new StoreError('NotFound', 'x'))).toBe(400);
      expect(storeErrorStatus(new StoreError('Conflict', 'x'))).toBe(409);
      expect(storeErrorStatus(new StoreError('TransportError', 'x'))).toBe(500);
    });
  });
});
