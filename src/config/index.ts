import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

// Environment variables schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('5000'),
  API_PREFIX: z.string().default('/api'),

  // Extraction configuration (regex patterns, keyword dictionaries, weights)
  EXTRACTION_CONFIG_DIR: z.string().default('./config'),

  // Rate Limiting
  RATE_LIMIT_API_WINDOW_MS: z.string().default((1 * 60 * 1000).toString()), // 1 minute
  RATE_LIMIT_API_MAX: z.string().default('120'),

  // Statistical classifier
  CLASSIFIER_ENABLED: z.string().default('true'),
  ANTHROPIC_API_KEY: z.string().optional(),
  AI_MODEL: z.string().default('claude-3-5-haiku-20241022'),
  AI_MAX_TOKENS: z.string().default('1024'),
  AI_TEMPERATURE: z.string().default('0.0'),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIR: z.string().default('./logs'),
});

// Parse and validate environment variables
const env = envSchema.parse(process.env);

// Export typed configuration
export const config = {
  env: env.NODE_ENV,
  port: parseInt(env.PORT, 10),
  apiPrefix: env.API_PREFIX,

  extractionConfigDir: env.EXTRACTION_CONFIG_DIR,

  rateLimit: {
    api: {
      windowMs: parseInt(env.RATE_LIMIT_API_WINDOW_MS, 10),
      max: parseInt(env.RATE_LIMIT_API_MAX, 10),
    },
  },

  classifier: {
    enabled: env.CLASSIFIER_ENABLED === 'true',
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    model: env.AI_MODEL,
    maxTokens: parseInt(env.AI_MAX_TOKENS, 10),
    temperature: parseFloat(env.AI_TEMPERATURE),
  },

  cors: {
    origin: env.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean),
  },

  logLevel: env.LOG_LEVEL,
  logDir: env.LOG_DIR,
};

export type AppConfig = typeof config;

export default config;
