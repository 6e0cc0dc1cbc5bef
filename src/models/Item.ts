// src/models/Item.ts
import { Fields, StoredDocument } from '../types/store.types';

export const ITEMS_COLLECTION = 'items';

export type CatalogItemInput = {
  title: string;
  releaseDate: string;
  rentalPrice: number;
  rating: number;
  category: string;
};

export type CatalogItem = CatalogItemInput & {
  _id: string;
  owner: string;
  version: number;
  date: string; // last modification, ISO 8601
};

export const itemBody = (input: CatalogItemInput, owner: string): Fields => ({
  title: input.title,
  releaseDate: input.releaseDate,
  rentalPrice: input.rentalPrice,
  rating: input.rating,
  category: input.category,
  owner
});

const text = (value: unknown): string => (typeof value === 'string' ? value : '');
const numeric = (value: unknown): number => (typeof value === 'number' ? value : 0);

/**
 * JSON view of a stored item. Missing or mistyped fields fall back to
 * empty values rather than failing the whole listing.
 */
export const toItem = (doc: StoredDocument): CatalogItem => ({
  _id: doc.id,
  title: text(doc.body.title),
  releaseDate: text(doc.body.releaseDate),
  rentalPrice: numeric(doc.body.rentalPrice),
  rating: numeric(doc.body.rating),
  category: text(doc.body.category),
  owner: text(doc.body.owner),
  version: doc.version,
  date: doc.updatedAt.toISOString()
});
