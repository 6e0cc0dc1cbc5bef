// src/services/documentStore.ts
import mongoose from 'mongoose';
import { isDeepStrictEqual } from 'util';
import { StoreError, StoreFailure, errorMessage } from '../utils/errors';
import { CollectionDriver, Fields, Filter, Pagination, StoredDocument } from '../types/store.types';

const FAILURE_STATUS: Record<StoreFailure, number> = {
  NotFound: 400,
  Conflict: 409,
  TransportError: 500
};

/**
 * HTTP status a route handler should answer with for a store failure.
 */
export const storeErrorStatus = (err: StoreError): number => FAILURE_STATUS[err.kind];

/**
 * Operations on one named collection. Every failure surfaces as a
 * StoreError whose kind is NotFound, Conflict or TransportError.
 */
export class DocumentCollection {
  constructor(
    readonly name: string,
    private readonly driver: CollectionDriver,
    private readonly clock: () => Date
  ) {}

  /**
   * A limit below 1 means no limit.
   */
  async query(filter: Filter = {}, page?: Pagination): Promise<StoredDocument[]> {
    const bounded = page?.limit !== undefined && page.limit < 1 ? { skip: page.skip } : page;
    return this.call('querying', () => this.driver.find(this.name, filter, bounded));
  }

  async findOne(filter: Filter): Promise<StoredDocument | null> {
    const [document] = await this.query(filter, { limit: 1 });
    return document ?? null;
  }

  /**
   * Inserts a new document. When `uniqueBy` matches an existing document
   * nothing is written. The check and the write are not atomic; a backend
   * unique index closes that gap and is reported as a Conflict too.
   */
  async insert(body: Fields, uniqueBy?: Filter): Promise<StoredDocument> {
    if (uniqueBy) {
      const existing = await this.call('checking', () => this.driver.find(this.name, uniqueBy, { limit: 1 }));
      if (existing.length > 0) {
        throw new StoreError('Conflict', `Document already exists in the ${this.name} collection`);
      }
    }

    const now = this.clock();
    const document: StoredDocument = {
      id: new mongoose.Types.ObjectId().toHexString(),
      version: 1,
      createdAt: now,
      updatedAt: now,
      body
    };

    await this.call('inserting', () => this.driver.insert(this.name, document));
    console.log(`[DB] Inserted document ${document.id} into ${this.name}`);
    return document;
  }

  async deleteOne(filter: Filter): Promise<void> {
    const deleted = await this.call('deleting', () => this.driver.delete(this.name, filter));
    if (deleted === 0) {
      throw new StoreError('NotFound', 'Item not found, the ID might be incorrect');
    }
  }

  /**
   * Replaces the body of the first matching document and bumps its version.
   * A missing document and an unchanged body both fail with NotFound.
   */
  async replaceOne(filter: Filter, body: Fields): Promise<StoredDocument> {
    const current = await this.findOne(filter);
    if (!current || isDeepStrictEqual(current.body, body)) {
      throw new StoreError('NotFound', 'Item not found, the ID might be incorrect or the item is the same');
    }

    const next: StoredDocument = {
      ...current,
      version: current.version + 1,
      updatedAt: this.clock(),
      body
    };

    const modified = await this.call('replacing', () =>
      this.driver.replace(this.name, { id: current.id, version: current.version }, next)
    );
    if (modified === 0) {
      throw new StoreError('NotFound', 'Item not found, the ID might be incorrect or the item is the same');
    }
    return next;
  }

  private async call<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (this.driver.isDuplicateKeyError?.(err)) {
        throw new StoreError('Conflict', `Document already exists in the ${this.name} collection`, { cause: err });
      }
      console.error(`[DB] Error ${action} ${this.name}:`, errorMessage(err));
      throw new StoreError('TransportError', `Error ${action} the ${this.name} collection`, { cause: err });
    }
  }
}

export class DocumentStore {
  private readonly collections = new Map<string, DocumentCollection>();

  constructor(
    private readonly driver: CollectionDriver,
    private readonly clock: () => Date = () => new Date()
  ) {}

  collection(name: string): DocumentCollection {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new DocumentCollection(name, this.driver, this.clock);
      this.collections.set(name, collection);
    }
    return collection;
  }
}
