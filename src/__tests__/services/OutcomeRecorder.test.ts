/**
 * Unit Tests for OutcomeRecorder
 */

import { EmailParsingPipeline } from '../../extraction';
import { confidenceLevel, LoggerOutcomeRecorder } from '../../services/OutcomeRecorder';
import { auditLogger } from '../../utils/logger';
import { PROCESSING_DATE, shippedConfig } from '../helpers/testConfig';

describe('confidenceLevel', () => {
  it('should follow the configured thresholds', () => {
    const thresholds = { high: 80, medium: 50 };

    expect(confidenceLevel(80, thresholds)).toBe('high');
    expect(confidenceLevel(79.99, thresholds)).toBe('medium');
    expect(confidenceLevel(50, thresholds)).toBe('medium');
    expect(confidenceLevel(49.99, thresholds)).toBe('low');
  });

  it('should move with the thresholds', () => {
    expect(confidenceLevel(85, { high: 90, medium: 70 })).toBe('medium');
    expect(confidenceLevel(65, { high: 90, medium: 70 })).toBe('low');
  });
});

describe('LoggerOutcomeRecorder', () => {
  it('should write one audit entry per parse', async () => {
    const config = shippedConfig();
    const pipeline = new EmailParsingPipeline({
      config,
      recorder: new LoggerOutcomeRecorder(config.thresholds),
      clock: () => PROCESSING_DATE,
    });

    await pipeline.parseEmail('AIF statement', 'for DI D0131848 as on 31-03-2024');

    expect(auditLogger.info).toHaveBeenCalledTimes(1);
    expect(auditLogger.info).toHaveBeenCalledWith('parse_outcome', {
      confidence: 40.5,
      confidenceLevel: 'low',
      ruleConfidence: 80.5,
      parsingMethod: 'rule_based',
      fallbackState: 'RULE_SUFFICIENT',
      requestedState: 'RULE_SUFFICIENT',
      mlSkipped: false,
      mlSkipReason: undefined,
      dateProvenance: 'explicit-single',
      categories: [],
      businessRulesApplied: ['category_identifier_requirements'],
      modelVersion: '2.0.0',
    });
  });
});
