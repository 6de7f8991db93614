import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { config } from './config';
import type { EmailParsingPipeline } from './extraction';
import logger from './utils/logger';
import { apiLimiter } from './middleware/rateLimiter';
import { requestId } from './middleware/requestId';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createParseEmailRouter } from './routes/parseEmail';
import { createHealthRouter } from './routes/health';

export interface AppDependencies {
  pipeline: EmailParsingPipeline;
}

export function createApp({ pipeline }: AppDependencies): express.Express {
  const app = express();

  // Security and parsing middleware
  app.use(helmet());
  app.use(requestId);
  app.use(cors({
    origin: config.cors.origin,
    credentials: true,
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(apiLimiter);
  app.use(morgan('combined', {
    stream: {
      write: (message: string) => logger.info(message.trim()),
    },
    skip: () => config.env === 'test',
  }));

  // Routes
  app.use('/', createHealthRouter(pipeline));
  app.use(`${config.apiPrefix}/parse-email`, createParseEmailRouter(pipeline));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
