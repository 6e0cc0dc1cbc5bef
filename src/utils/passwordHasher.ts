// src/utils/passwordHasher.ts
import * as argon2 from 'argon2';
import crypto from 'crypto';
import { HashParameters, DEFAULT_HASH_PARAMETERS } from '../config/env';

export interface HashSalt {
  hash: string; // hex
  salt: string; // hex
}

/**
 * Salted argon2id password hashing. Cost parameters are fixed at
 * construction and never taken from a request.
 */
export class PasswordHasher {
  constructor(private readonly params: HashParameters = DEFAULT_HASH_PARAMETERS) {}

  async hash(password: string, salt?: string): Promise<HashSalt> {
    const saltBytes = salt ? Buffer.from(salt, 'hex') : crypto.randomBytes(this.params.saltLength);

    const derived = await argon2.hash(password, {
      type: argon2.argon2id,
      salt: saltBytes,
      timeCost: this.params.timeCost,
      memoryCost: this.params.memoryCost,
      parallelism: this.params.parallelism,
      hashLength: this.params.hashLength,
      raw: true
    });

    return { hash: derived.toString('hex'), salt: saltBytes.toString('hex') };
  }

  async compare(password: string, salt: string, expectedHash: string): Promise<boolean> {
    const { hash } = await this.hash(password, salt);

    const actual = Buffer.from(hash, 'hex');
    const expected = Buffer.from(expectedHash, 'hex');
    if (actual.length !== expected.length) {
      return false;
    }
    return crypto.timingSafeEqual(actual, expected);
  }
}
