import type { KeywordConfig } from '../config/extraction';
import type { AppConfig } from '../config';
import logger from '../utils/logger';
import { AnthropicStatementClassifier } from './AnthropicStatementClassifier';
import type { StatisticalClassifier } from './types';

export type { ClassifierDateRange, ClassifierLabel, ClassifierPrediction, ClassifyOptions, StatisticalClassifier } from './types';
export { AnthropicStatementClassifier } from './AnthropicStatementClassifier';

/**
 * Create the configured classifier, or null when it is disabled or has no
 * API key. The pipeline then runs rule-based only.
 */
export function createStatementClassifier(
  settings: AppConfig['classifier'],
  keywords: KeywordConfig
): StatisticalClassifier | null {
  if (!settings.enabled) {
    logger.info('Statistical classifier disabled by configuration');
    return null;
  }

  if (!settings.anthropicApiKey) {
    logger.warn('Anthropic API key not configured - classifier fallback will be skipped');
    return null;
  }

  logger.info('Statistical classifier initialized', { model: settings.model });

  return new AnthropicStatementClassifier({
    apiKey: settings.anthropicApiKey,
    model: settings.model,
    maxTokens: settings.maxTokens,
    temperature: settings.temperature,
    keywords,
  });
}
