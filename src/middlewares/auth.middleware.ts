// src/middlewares/auth.middleware.ts
import { RequestHandler } from 'express';
import { SessionTokenManager } from '../services/token.service';
import { AuthError } from '../utils/errors';
import '../types/request.types';

const extractToken = (authHeader: string | undefined, fallback: string | undefined): string | undefined => {
  if (authHeader) {
    return authHeader.startsWith('Bearer ') ? authHeader.slice(7).trim() : authHeader.trim();
  }
  return fallback;
};

/**
 * Resolves the bearer token to an identity and stores both on the request.
 */
export const createAuthMiddleware = (tokens: SessionTokenManager): RequestHandler => (req, res, next) => {
  const token = extractToken(req.header('authorization'), req.header('x-auth-token'));

  try {
    req.identity = tokens.validate(token);
    req.token = token;
    next();
  } catch (err) {
    if (err instanceof AuthError) {
      console.log(`[AUTH] Request rejected: ${err.kind}`);
      res.status(401).json({ message: err.kind === 'Missing' ? 'No token, authorization denied' : 'Token is not valid' });
      return;
    }
    next(err);
  }
};

export default createAuthMiddleware;
