// src/services/token.service.ts
import jwt, { JwtPayload } from 'jsonwebtoken';
import crypto from 'crypto';
import { AuthError } from '../utils/errors';

export type Clock = () => number; // epoch milliseconds

export interface SessionTokenOptions {
  secret: string;
  ttlSeconds: number;
  clock?: Clock;
}

interface SessionClaims extends JwtPayload {
  username: string;
}

const toSeconds = (ms: number): number => Math.floor(ms / 1000);

const isSessionClaims = (decoded: string | JwtPayload): decoded is SessionClaims =>
  typeof decoded === 'object' && typeof decoded.username === 'string' && decoded.username.length > 0;

/**
 * Tokens revoked before their natural expiry. An entry is dropped once the
 * token it names has expired, since validation would reject it anyway.
 */
export class RevocationSet {
  private readonly revokedAt = new Map<string, number>();
  private readonly expiresAt = new Map<string, number>();

  add(token: string, revokedAt: number, expiresAt: number): void {
    this.revokedAt.set(token, revokedAt);
    this.expiresAt.set(token, expiresAt);
  }

  has(token: string): boolean {
    return this.revokedAt.has(token);
  }

  prune(now: number): number {
    let removed = 0;
    for (const [token, expiry] of this.expiresAt) {
      if (expiry <= now) {
        this.expiresAt.delete(token);
        this.revokedAt.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.revokedAt.size;
  }
}

export class SessionTokenManager {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly clock: Clock;
  readonly revocations = new RevocationSet();

  constructor({ secret, ttlSeconds, clock = Date.now }: SessionTokenOptions) {
    if (!secret) {
      throw new Error('A token signing secret is required');
    }
    this.secret = secret;
    this.ttlSeconds = ttlSeconds;
    this.clock = clock;
  }

  issue(identity: string): string {
    const issuedAt = toSeconds(this.clock());
    const claims: SessionClaims = {
      username: identity,
      iat: issuedAt,
      exp: issuedAt + this.ttlSeconds
    };

    return jwt.sign(claims, this.secret, { algorithm: 'HS256', jwtid: crypto.randomUUID() });
  }

  /**
   * Resolves the identity a token was issued to.
   * Signature and expiry are checked before the revocation set.
   */
  validate(token: string | undefined): string {
    if (!token) {
      throw new AuthError('Missing', 'No token provided');
    }

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        clockTimestamp: toSeconds(this.clock())
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw new AuthError('Expired', 'Token has expired', { cause: err });
      }
      if (err instanceof jwt.JsonWebTokenError && err.message === 'invalid signature') {
        throw new AuthError('InvalidSignature', 'Token signature is invalid', { cause: err });
      }
      throw new AuthError('Malformed', 'Token is malformed', { cause: err });
    }

    if (!isSessionClaims(decoded)) {
      throw new AuthError('Malformed', 'Token does not name a user');
    }

    if (this.revocations.has(token)) {
      throw new AuthError('Revoked', 'Token has been revoked');
    }

    return decoded.username;
  }

  revoke(token: string): void {
    const now = this.clock();
    const decoded = jwt.decode(token);
    const expiresAt = decoded !== null && typeof decoded === 'object' && typeof decoded.exp === 'number'
      ? decoded.exp * 1000
      : now + this.ttlSeconds * 1000;

    this.revocations.prune(now);
    this.revocations.add(token, now, expiresAt);
  }
}
