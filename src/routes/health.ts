import { Router, Request, Response } from 'express';
import type { EmailParsingPipeline } from '../extraction';

export const SERVICE_NAME = 'Statement Request Parser API';

export function createHealthRouter(pipeline: EmailParsingPipeline): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      classifier: pipeline.hasClassifier ? 'ready' : 'disabled',
      modelVersion: pipeline.modelVersion,
    });
  });

  /**
   * GET /healthz (liveness)
   */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.json({ status: 'ok', uptimeSeconds: Math.round(process.uptime()) });
  });

  return router;
}
