import { Router, Request, Response, NextFunction } from 'express';
import { EmailParsingPipeline, serializeParseResult } from '../extraction';
import type { ParseResult } from '../extraction';
import { parseEmailValidation } from '../middleware/validation';

/**
 * Built-in request answered by GET /parse-email/test
 */
export const SAMPLE_REQUEST = {
  subject: 'PMS Statement Request',
  body: 'Send me portfolio statement as on 15-Mar-2024 for PAN ABCDE1234F and DI D0131848',
} as const;

function toResponse(result: ParseResult) {
  return {
    ...serializeParseResult(result),
    success: true,
    processed_at: result.metadata.processedAt,
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createParseEmailRouter(pipeline: EmailParsingPipeline): Router {
  const router = Router();

  /**
   * POST /parse-email
   * Parse one email into a structured statement request
   */
  router.post('/', parseEmailValidation, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await pipeline.parseEmail(optionalString(req.body?.subject), optionalString(req.body?.body));
      res.json(toResponse(result));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /parse-email/test
   * Parse the built-in sample request
   */
  router.get('/test', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await pipeline.parseEmail(SAMPLE_REQUEST.subject, SAMPLE_REQUEST.body);
      res.json(toResponse(result));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
