// src/models/User.ts
import { Fields, StoredDocument } from '../types/store.types';

export const USERS_COLLECTION = 'users';

export interface Credential {
  id: string;
  username: string;
  password: string; // argon2id hash, hex
  salt: string; // hex
  createdAt: Date;
  version: number;
}

export const credentialBody = (username: string, hash: string, salt: string): Fields => ({
  username,
  password: hash,
  salt
});

export const toCredential = (doc: StoredDocument): Credential | null => {
  const { username, password, salt } = doc.body;
  if (typeof username !== 'string' || typeof password !== 'string' || typeof salt !== 'string') {
    return null;
  }

  return { id: doc.id, username, password, salt, createdAt: doc.createdAt, version: doc.version };
};
