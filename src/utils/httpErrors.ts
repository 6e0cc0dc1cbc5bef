// src/utils/httpErrors.ts
import { Response } from 'express';
import { storeErrorStatus } from '../services/documentStore';
import { StoreError, errorMessage } from './errors';

/**
 * Answers a failed store call with the status its kind maps to.
 * Anything else is logged and reported as a 500.
 */
export const sendStoreError = (res: Response, err: unknown, context: string): Response => {
  if (err instanceof StoreError) {
    return res.status(storeErrorStatus(err)).json({ message: err.message });
  }

  console.error(`${context}:`, errorMessage(err));
  return res.status(500).json({ message: 'Server error' });
};
