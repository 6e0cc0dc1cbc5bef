// src/types/store.types.ts

export type FieldValue =
  | string
  | number
  | boolean
  | null
  | Date
  | FieldValue[]
  | { [key: string]: FieldValue };

export type Fields = { [key: string]: FieldValue };

/**
 * Conjunction of constraints. A RegExp matches string fields by pattern,
 * any other value by equality. The `id` key addresses the identifier.
 */
export type FilterValue = string | number | boolean | null | RegExp;
export type Filter = { [field: string]: FilterValue };

export interface Pagination {
  skip?: number;
  limit?: number;
}

export interface StoredDocument {
  id: string;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  body: Fields;
}

/**
 * Backend-specific access to named collections. Implementations report
 * counts and throw on transport failures; they never classify outcomes.
 */
export interface CollectionDriver {
  find(collection: string, filter: Filter, page?: Pagination): Promise<StoredDocument[]>;
  insert(collection: string, document: StoredDocument): Promise<void>;
  delete(collection: string, filter: Filter): Promise<number>;
  replace(collection: string, filter: Filter, document: StoredDocument): Promise<number>;
  isDuplicateKeyError?(err: unknown): boolean;
}
