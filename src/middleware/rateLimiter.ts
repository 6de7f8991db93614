import rateLimit from 'express-rate-limit';
import { config } from '../config';

/**
 * Factory function to create rate limiters (in-memory store)
 */
export function createRateLimiter(options: { windowMs: number; max: number; message?: string }) {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    message: {
      success: false,
      error: options.message || 'Rate limit exceeded. Please try again later.',
    },
    skip: (req) => req.path === '/health',
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Rate limiter for the parsing API
 */
export const apiLimiter = createRateLimiter({
  windowMs: config.rateLimit.api.windowMs,
  max: config.rateLimit.api.max,
  message: 'Too many requests. Please try again in a minute.',
});
