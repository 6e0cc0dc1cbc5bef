// src/types/request.types.ts

/**
 * Set by the auth middleware once a bearer token validates.
 */
declare global {
  namespace Express {
    interface Request {
      identity?: string;
      token?: string;
    }
  }
}

export {};
