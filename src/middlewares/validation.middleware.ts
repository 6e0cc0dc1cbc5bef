// src/middlewares/validation.middleware.ts
import { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import { body, validationResult } from 'express-validator';

/**
 * Validate MongoDB ObjectId in route parameters
 */
export const validateObjectId = (paramName: string) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.params[paramName];

    if (!id) {
      return res.status(400).json({ message: `${paramName} is required` });
    }

    if (!mongoose.Types.ObjectId.isValid(id)) {
      return res.status(400).json({ message: `Invalid ${paramName} format` });
    }

    next();
  };
};

/**
 * Handle validation errors from express-validator
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    return res.status(400).json({
      message: 'Validation failed',
      errors: errors.array().map(error => ({
        field: error.type === 'field' ? error.path : error.type,
        message: error.msg
      }))
    });
  }

  next();
};

/**
 * Validate skip/limit query parameters
 */
export const validatePagination = (req: Request, res: Response, next: NextFunction) => {
  const { skip, limit } = req.query;

  if (skip !== undefined && (typeof skip !== 'string' || !/^\d+$/.test(skip))) {
    return res.status(400).json({ message: 'Skip must be a non-negative number' });
  }

  if (limit !== undefined && (typeof limit !== 'string' || !/^\d+$/.test(limit) || Number(limit) < 1 || Number(limit) > 100)) {
    return res.status(400).json({ message: 'Limit must be between 1 and 100' });
  }

  next();
};

export const validateCredentials = [
  body('username')
    .isString()
    .trim()
    .isLength({ min: 3, max: 30 })
    .withMessage('Username must be between 3 and 30 characters')
    .matches(/^[a-zA-Z0-9_]+$/)
    .withMessage('Username can only contain letters, numbers and underscores'),

  body('password')
    .isString()
    .isLength({ min: 6 })
    .withMessage('Password must be at least 6 characters long'),

  handleValidationErrors
];

export const validateLogin = [
  body('username').isString().trim().notEmpty().withMessage('Username is required'),
  body('password').isString().notEmpty().withMessage('Password is required'),
  handleValidationErrors
];

export const validateItem = [
  body('title')
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Title is required and must be less than 200 characters'),

  body('releaseDate')
    .isISO8601()
    .withMessage('Release date must be a valid date'),

  body('rentalPrice')
    .isFloat({ min: 0 })
    .withMessage('Rental price must be a non-negative number')
    .toFloat(),

  body('rating')
    .isInt({ min: 0, max: 10 })
    .withMessage('Rating must be an integer between 0 and 10')
    .toInt(),

  body('category')
    .isString()
    .trim()
    .notEmpty()
    .withMessage('Category is required'),

  handleValidationErrors
];

export const validatePhoto = [
  body('filepath')
    .isString()
    .trim()
    .notEmpty()
    .withMessage('Filepath is required'),

  body('caption')
    .optional()
    .isString()
    .isLength({ max: 2200 })
    .withMessage('Caption cannot exceed 2200 characters'),

  handleValidationErrors
];
