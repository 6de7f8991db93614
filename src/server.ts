import path from 'path';
import { createApp } from './app';
import { createStatementClassifier } from './classifier';
import { config } from './config';
import { loadExtractionConfig } from './config/extraction';
import { EmailParsingPipeline } from './extraction';
import { LoggerOutcomeRecorder } from './services/OutcomeRecorder';
import logger from './utils/logger';

function registerDiagnostics() {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  });

  process.on('warning', (warning) => {
    logger.warn('Process warning', { name: warning.name, message: warning.message, stack: warning.stack });
  });
}

registerDiagnostics();

async function start() {
  const extractionConfig = await loadExtractionConfig(path.resolve(config.extractionConfigDir));
  logger.info('Extraction configuration loaded', {
    version: extractionConfig.version,
    identifierKinds: extractionConfig.identifiers.map((p) => p.kind),
    categories: extractionConfig.keywords.categories.map((c) => c.category),
  });

  const pipeline = new EmailParsingPipeline({
    config: extractionConfig,
    classifier: createStatementClassifier(config.classifier, extractionConfig.keywords),
    recorder: new LoggerOutcomeRecorder(extractionConfig.thresholds),
  });

  const app = createApp({ pipeline });

  // Start server
  const PORT = config.port;
  const server = app.listen(PORT, () => {
    logger.info(`Server started on port ${PORT}`);
    logger.info(`Environment: ${config.env}`);
    logger.info(`API prefix: ${config.apiPrefix}`);
  });

  // Graceful shutdown
  function shutdown(signal: string) {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((err: unknown) => {
  logger.error('Failed to start server', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
