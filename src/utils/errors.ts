// src/utils/errors.ts

export type AuthFailure = 'Missing' | 'Malformed' | 'InvalidSignature' | 'Expired' | 'Revoked';
export type StoreFailure = 'NotFound' | 'Conflict' | 'TransportError';
export type ProtocolFailure = 'MalformedMessage' | 'UnexpectedFirstMessage';
export type TransportFailure = 'Disconnected' | 'WriteFailed';

/**
 * Base class for every classified failure in the service.
 * `kind` carries the classification so callers can switch on it.
 */
export abstract class AppError<K extends string> extends Error {
  abstract readonly category: 'auth' | 'store' | 'protocol' | 'transport';

  constructor(public readonly kind: K, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthError extends AppError<AuthFailure> {
  readonly category = 'auth';
}

export class StoreError extends AppError<StoreFailure> {
  readonly category = 'store';
}

export class ProtocolError extends AppError<ProtocolFailure> {
  readonly category = 'protocol';
}

export class TransportError extends AppError<TransportFailure> {
  readonly category = 'transport';
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
