import { body, validationResult } from 'express-validator';
import { Request, Response, NextFunction } from 'express';

export const MAX_FIELD_LENGTH = 50000;

/**
 * Middleware to handle validation errors
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    return res.status(400).json({
      success: false,
      error: 'Validation failed',
      code: 'INPUT_002',
      errors: errors.array().map((err) => ({
        field: err.type === 'field' ? err.path : undefined,
        message: err.msg,
      })),
    });
  }
  next();
};

const optionalText = (field: string) =>
  body(field)
    .optional({ values: 'null' })
    .isString()
    .withMessage(`${field} must be a string`)
    .bail()
    .isLength({ max: MAX_FIELD_LENGTH })
    .withMessage(`${field} must be at most ${MAX_FIELD_LENGTH} characters`);

/**
 * Body of POST /parse-email: optional subject and body strings
 */
export const parseEmailValidation = [optionalText('subject'), optionalText('body'), handleValidationErrors];
