import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { isDomainError, wrapError } from '../errors';
import logger from '../utils/logger';

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * 404 handler
 */
export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({
    success: false,
    error: 'Route not found',
  });
}

/**
 * Error handler: DomainErrors map to their HTTP status and code
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isMalformedJson(err)) {
    res.status(400).json({ success: false, error: 'Malformed JSON body', code: 'INPUT_002' });
    return;
  }

  const error = wrapError(err);

  if (error.httpStatus >= 500) {
    logger.error('Unhandled error', error.toJSON());
  } else {
    logger.warn('Request rejected', { error: error.message, code: error.code });
  }

  const exposeMessage = isDomainError(err) || config.env === 'development';
  res.status(error.httpStatus).json({
    success: false,
    error: exposeMessage ? error.message : 'Internal server error',
    code: error.code,
  });
}
