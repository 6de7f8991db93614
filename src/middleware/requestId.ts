import { Request, Response, NextFunction } from 'express';
import { createRequestContext, runWithContext } from '../utils/requestContext';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Attaches a correlation/request ID to each request and runs the rest of
 * the chain inside its async-local context.
 */
export function requestId(req: Request, res: Response, next: NextFunction) {
  const headerId = req.header('x-request-id')?.trim();
  const context = headerId ? createRequestContext('http', headerId) : createRequestContext('http');

  req.requestId = context.requestId;
  res.setHeader('x-request-id', context.requestId);
  runWithContext(context, next);
}
