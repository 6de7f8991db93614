import path from 'path';
import winston from 'winston';
import { config } from '../config';
import { getRequestContext } from './requestContext';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

// Adds the async-local request id and source to every entry
const withRequestContext = winston.format((info) => {
  const ctx = getRequestContext();
  if (ctx && info.requestId === undefined) {
    info.requestId = ctx.requestId;
    info.source = ctx.source;
  }
  return info;
});

const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  const scope = typeof component === 'string' ? ` (${component})` : '';
  let msg = `${timestamp} [${level}]${scope}: ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(
    withRequestContext(),
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
    }),
  ],
});

if (config.env === 'production') {
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logDir, 'error.log'),
      level: 'error',
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logDir, 'combined.log'),
    })
  );
}

/**
 * Structured JSON trail of parse outcomes, one entry per request.
 * Only written to disk in production.
 */
export const auditLogger = winston.createLogger({
  level: 'info',
  format: combine(withRequestContext(), timestamp(), json()),
  transports: [
    config.env === 'production'
      ? new winston.transports.File({ filename: path.join(config.logDir, 'parse-outcomes.log') })
      : new winston.transports.Console({ silent: true }),
  ],
});

/**
 * Logger tagged with the emitting component.
 */
export function getLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export default logger;
