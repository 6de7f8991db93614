import path from 'path';
import { readFileSync } from 'fs';
import { buildExtractionConfig, ExtractionConfig, RawExtractionConfig } from '../../config/extraction';

export const CONFIG_DIR = path.resolve(__dirname, '../../../config');

export function readRawConfig(): RawExtractionConfig {
  const read = (file: string): unknown => JSON.parse(readFileSync(path.join(CONFIG_DIR, file), 'utf-8'));
  return {
    patterns: read('regex_patterns.json'),
    keywords: read('statement_keywords.json'),
    model: read('model_config.json'),
  };
}

/**
 * The shipped extraction configuration
 */
export function shippedConfig(): ExtractionConfig {
  return buildExtractionConfig(readRawConfig());
}

/** Fixed processing date: Saturday 15 June 2024, midday local time */
export const PROCESSING_DATE = new Date(2024, 5, 15, 12, 0, 0);
