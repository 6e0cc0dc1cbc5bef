// src/__tests__/mongoDriver.test.ts
import mongoose from 'mongoose';
import { MongoCollectionDriver, MongoDocument, NativeCollection, RawDocument } from '../services/drivers/mongo.driver';
import { StoredDocument } from '../types/store.types';

class RecordingCollection implements NativeCollection {
  readonly finds: Array<{ filter: MongoDocument; options: { skip?: number; limit?: number } }> = [];
  readonly inserted: MongoDocument[] = [];
  readonly deletes: MongoDocument[] = [];
  readonly replaces: Array<{ filter: MongoDocument; replacement: MongoDocument }> = [];
  readonly indexes: Array<{ keys: { [field: string]: 1 }; unique: boolean }> = [];
  documents: RawDocument[] = [];
  matched = 1;
  cursorsClosed = 0;

  find(filter: MongoDocument, options: { skip?: number; limit?: number }) {
    this.finds.push({ filter, options });
    return {
      toArray: async () => this.documents,
      close: async () => {
        this.cursorsClosed++;
      }
    };
  }

  async insertOne(document: MongoDocument): Promise<void> {
    this.inserted.push(document);
  }

  async deleteOne(filter: MongoDocument): Promise<number> {
    this.deletes.push(filter);
    return this.matched;
  }

  async replaceOne(filter: MongoDocument, replacement: MongoDocument): Promise<number> {
    this.replaces.push({ filter, replacement });
    return this.matched;
  }

  async createIndex(keys: { [field: string]: 1 }, options: { unique: boolean }): Promise<void> {
    this.indexes.push({ keys, unique: options.unique });
  }
}

describe('MongoCollectionDriver', () => {
  const id = '0123456789abcdef01234567';
  const created = new Date('2026-01-01T00:00:00.000Z');
  const updated = new Date('2026-01-02T00:00:00.000Z');

  let native: RecordingCollection;
  let names: string[];
  let driver: MongoCollectionDriver;

  beforeEach(() => {
    native = new RecordingCollection();
    names = [];
    driver = new MongoCollectionDriver(name => {
      names.push(name);
      return native;
    });
  });

  const stored = (body: StoredDocument['body'], version = 1): StoredDocument => ({
    id,
    version,
    createdAt: created,
    updatedAt: updated,
    body
  });

  describe('insert', () => {
    it('should keep the body apart from the identifier and metadata', async () => {
      await driver.insert('items', stored({ _id: 'other', version: 9, title: 'Alien' }));

      expect(names).toEqual(['items']);
      expect(native.inserted).toHaveLength(1);
      const [document] = native.inserted;
      expect(document._id).toBeInstanceOf(mongoose.Types.ObjectId);
      expect(document._id.toHexString()).toBe(id);
      expect(document.version).toBe(1);
      expect(document.createdAt).toBe(created);
      expect(document.updatedAt).toBe(updated);
      expect(document.body).toEqual({ _id: 'other', version: 9, title: 'Alien' });
    });
  });

  describe('find', () => {
    it('should map id to _id and body fields under body', async () => {
      await driver.find('items', { id, version: 2, owner: 'alice', title: /alien/i }, { skip: 5, limit: 10 });

      const [{ filter, options }] = native.finds;
      expect(filter._id).toBeInstanceOf(mongoose.Types.ObjectId);
      expect(filter._id.toHexString()).toBe(id);
      expect(filter.version).toBe(2);
      expect(filter['body.owner']).toBe('alice');
      expect(filter['body.title']).toEqual(/alien/i);
      expect(Object.keys(filter).sort()).toEqual(['_id', 'body.owner', 'body.title', 'version']);
      expect(options).toEqual({ skip: 5, limit: 10 });
    });

    it('should pass an id that is not an ObjectId through unchanged', async () => {
      await driver.find('items', { id: 'not-an-object-id' });

      expect(native.finds[0].filter).toEqual({ _id: 'not-an-object-id' });
    });

    it('should rebuild stored documents and close the cursor', async () => {
      native.documents = [
        {
          _id: new mongoose.Types.ObjectId(id),
          version: 3,
          createdAt: created,
          updatedAt: updated,
          body: { title: 'Alien', version: 9 }
        }
      ];

      const documents = await driver.find('items', {});

      expect(documents).toEqual([stored({ title: 'Alien', version: 9 }, 3)]);
      expect(native.cursorsClosed).toBe(1);
    });

    it('should read a document without a body as an empty body', async () => {
      native.documents = [{ _id: new mongoose.Types.ObjectId(id), version: 1, createdAt: created, updatedAt: updated }];

      const [document] = await driver.find('items', {});

      expect(document.body).toEqual({});
    });
  });

  describe('replace', () => {
    it('should condition the write on the version and report the modified count', async () => {
      native.matched = 0;

      const modified = await driver.replace('items', { id, version: 1 }, stored({ title: 'Heat' }, 2));

      expect(modified).toBe(0);
      const [{ filter, replacement }] = native.replaces;
      expect(filter._id.toHexString()).toBe(id);
      expect(filter.version).toBe(1);
      expect(replacement).toEqual({ version: 2, createdAt: created, updatedAt: updated, body: { title: 'Heat' } });
    });
  });

  describe('delete', () => {
    it('should report the deleted count', async () => {
      await expect(driver.delete('photos', { filepath: 'a.jpg', owner: 'alice' })).resolves.toBe(1);

      expect(native.deletes).toEqual([{ 'body.filepath': 'a.jpg', 'body.owner': 'alice' }]);
    });
  });

  describe('isDuplicateKeyError', () => {
    it('should recognise duplicate key errors only', () => {
      expect(driver.isDuplicateKeyError(Object.assign(new Error('E11000'), { code: 11000 }))).toBe(true);
      expect(driver.isDuplicateKeyError(Object.assign(new Error('other'), { code: 2 }))).toBe(false);
      expect(driver.isDuplicateKeyError('E11000')).toBe(false);
      expect(driver.isDuplicateKeyError(null)).toBe(false);
    });
  });

  describe('ensureUniqueIndex', () => {
    it('should index the body fields', async () => {
      await driver.ensureUniqueIndex('items', ['owner', 'title']);

      expect(native.indexes).toEqual([{ keys: { 'body.owner': 1, 'body.title': 1 }, unique: true }]);
    });
  });

  it('should fail each call while the connection is not open', async () => {
    const closed = new MongoCollectionDriver();

    await expect(closed.find('items', {})).rejects.toThrow('MongoDB connection is not open');
  });
});
