// src/models/Photo.ts
import { Fields, StoredDocument } from '../types/store.types';

export const PHOTOS_COLLECTION = 'photos';

export interface Photo {
  _id: string;
  owner: string;
  filepath: string; // storage key of the image
  caption: string;
  createdAt: string;
}

export const photoBody = (owner: string, filepath: string, caption = ''): Fields => ({
  owner,
  filepath,
  caption
});

export const toPhoto = (doc: StoredDocument): Photo => ({
  _id: doc.id,
  owner: typeof doc.body.owner === 'string' ? doc.body.owner : '',
  filepath: typeof doc.body.filepath === 'string' ? doc.body.filepath : '',
  caption: typeof doc.body.caption === 'string' ? doc.body.caption : '',
  createdAt: doc.createdAt.toISOString()
});
