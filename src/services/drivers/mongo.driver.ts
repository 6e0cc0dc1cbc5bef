// src/services/drivers/mongo.driver.ts
import mongoose from 'mongoose';
import { CollectionDriver, Fields, Filter, Pagination, StoredDocument } from '../../types/store.types';

export type MongoDocument = mongoose.mongo.Document;
export type RawDocument = mongoose.mongo.WithId<MongoDocument>;

/**
 * The part of a native collection the driver uses.
 */
export interface NativeCollection {
  find(filter: MongoDocument, options: { skip?: number; limit?: number }): {
    toArray(): Promise<RawDocument[]>;
    close(): Promise<void>;
  };
  insertOne(document: MongoDocument): Promise<void>;
  deleteOne(filter: MongoDocument): Promise<number>;
  replaceOne(filter: MongoDocument, replacement: MongoDocument): Promise<number>;
  createIndex(keys: { [field: string]: 1 }, options: { unique: boolean }): Promise<void>;
}

export type CollectionResolver = (name: string) => NativeCollection;

const { ObjectId } = mongoose.Types;

const DUPLICATE_KEY = 11000;

const METADATA_FIELDS = new Set(['version', 'createdAt', 'updatedAt']);

const toDate = (value: unknown): Date =>
  value instanceof Date ? value : new Date(typeof value === 'string' || typeof value === 'number' ? value : 0);

const isFields = (value: unknown): value is Fields =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Reads through mongoose's open connection. Fails per call while the
 * connection is not open.
 */
export const fromConnection =
  (connection: mongoose.Connection = mongoose.connection): CollectionResolver =>
  name => {
    const db = connection.db;
    if (!db) {
      throw new Error('MongoDB connection is not open');
    }

    const collection = db.collection<MongoDocument>(name);
    return {
      find: (filter, options) => collection.find(filter, options),
      insertOne: async document => {
        await collection.insertOne(document);
      },
      deleteOne: async filter => (await collection.deleteOne(filter)).deletedCount,
      replaceOne: async (filter, replacement) => (await collection.replaceOne(filter, replacement)).modifiedCount,
      createIndex: async (keys, options) => {
        await collection.createIndex(keys, options);
      }
    };
  };

const toMongoField = (field: string): string => {
  if (field === 'id') return '_id';
  return METADATA_FIELDS.has(field) ? field : `body.${field}`;
};

const toMongoFilter = (filter: Filter): MongoDocument => {
  const query: MongoDocument = {};
  for (const [field, value] of Object.entries(filter)) {
    if (field === 'id') {
      // A string that is not an ObjectId can never match, so it is passed through as is
      query._id = typeof value === 'string' && ObjectId.isValid(value) ? new ObjectId(value) : value;
    } else {
      query[toMongoField(field)] = value;
    }
  }
  return query;
};

const toMongoFields = ({ body, version, createdAt, updatedAt }: StoredDocument): MongoDocument => ({
  version,
  createdAt,
  updatedAt,
  body
});

const fromMongo = (raw: RawDocument): StoredDocument => ({
  id: raw._id.toHexString(),
  version: Number(raw.version),
  createdAt: toDate(raw.createdAt),
  updatedAt: toDate(raw.updatedAt),
  body: isFields(raw.body) ? raw.body : {}
});

/**
 * Collection access through the native driver behind mongoose's connection.
 * The body is kept in its own `body` sub-document so its keys never collide
 * with _id, version or the timestamps.
 */
export class MongoCollectionDriver implements CollectionDriver {
  constructor(private readonly collection: CollectionResolver = fromConnection()) {}

  async find(collection: string, filter: Filter, page: Pagination = {}): Promise<StoredDocument[]> {
    const cursor = this.collection(collection).find(toMongoFilter(filter), {
      skip: page.skip,
      limit: page.limit
    });

    try {
      const documents = await cursor.toArray();
      return documents.map(fromMongo);
    } finally {
      await cursor.close();
    }
  }

  async insert(collection: string, document: StoredDocument): Promise<void> {
    await this.collection(collection).insertOne({
      _id: new ObjectId(document.id),
      ...toMongoFields(document)
    });
  }

  async delete(collection: string, filter: Filter): Promise<number> {
    return this.collection(collection).deleteOne(toMongoFilter(filter));
  }

  async replace(collection: string, filter: Filter, document: StoredDocument): Promise<number> {
    return this.collection(collection).replaceOne(toMongoFilter(filter), toMongoFields(document));
  }

  isDuplicateKeyError(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === DUPLICATE_KEY;
  }

  /**
   * Lets MongoDB enforce a uniqueness rule the store otherwise only pre-checks.
   */
  async ensureUniqueIndex(collection: string, fields: string[]): Promise<void> {
    const keys: { [field: string]: 1 } = {};
    for (const field of fields) {
      keys[toMongoField(field)] = 1;
    }
    await this.collection(collection).createIndex(keys, { unique: true });
    console.log(`[DB] Unique index on ${collection}(${fields.join(', ')}) ready`);
  }
}
