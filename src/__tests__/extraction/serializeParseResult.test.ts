/**
 * Unit Tests for the parse result wire format
 */

import type { StatisticalClassifier } from '../../classifier/types';
import { EmailParsingPipeline } from '../../extraction/EmailParsingPipeline';
import { serializeParseResult } from '../../extraction/serializeParseResult';
import { NoopOutcomeRecorder } from '../../services/OutcomeRecorder';
import { PROCESSING_DATE, shippedConfig } from '../helpers/testConfig';

describe('serializeParseResult', () => {
  const createPipeline = (classifier: StatisticalClassifier | null) =>
    new EmailParsingPipeline({
      config: shippedConfig(),
      classifier,
      recorder: new NoopOutcomeRecorder(),
      clock: () => PROCESSING_DATE,
    });

  it('should flatten a rule-based result', async () => {
    const result = await createPipeline(null).parseEmail(
      'PMS Statement Request',
      'Send me portfolio statement as on 15-Mar-2024 for PAN ABCDE1234F and DI D0131848'
    );

    const serialized = serializeParseResult(result);

    expect(serialized).toEqual({
      statement_category: ['PMS'],
      statement_types: ['Portfolio_Appraisal'],
      aif_folio: [],
      di_code: ['D0131848'],
      account_code: [],
      pan_numbers: ['ABCDE1234F'],
      from_date: '2024-03-15',
      to_date: '2024-03-15',
      confidence: 92.5,
      confidence_breakdown: { statement_type: 100, date_parsing: 100, identifiers: 75 },
      metadata: {
        date_source: 'email',
        date_provenance: 'explicit-single',
        date_fuzzy_corrected: false,
        parsing_method: 'rule_based',
        fallback_state: 'RULE_SUFFICIENT',
        ml_skipped: false,
        rule_confidence: 92.5,
        model_version: '2.0.0',
        has_identifiers: true,
        business_rules_applied: [],
        processing_time_ms: result.metadata.processingTimeMs,
      },
      raw_text:
        'subject: pms statement request body: send me portfolio statement as on 15-mar-2024 for pan abcde1234f and di d0131848',
    });
  });

  it('should carry classifier details when it was consulted', async () => {
    const classifier: StatisticalClassifier = {
      name: 'stub',
      classify: jest.fn(async () => ({
        labels: [{ category: 'PMS', type: 'Portfolio_Appraisal', score: 0.7 }],
        confidence: 0.7,
      })),
    };

    const serialized = serializeParseResult(await createPipeline(classifier).parseEmail('', 'please send statement'));

    expect(serialized.confidence_breakdown).toEqual({
      statement_type: 70,
      date_parsing: 20,
      identifiers: 0,
      classifier: 70,
    });
    expect(serialized.metadata.classifier).toBe('stub');
    expect(serialized.metadata.fallback_state).toBe('ML_FALLBACK');
    expect(serialized.metadata.date_source).toBe('default');
    expect(serialized.metadata).not.toHaveProperty('ml_skip_reason');
  });

  it('should report why the classifier was skipped', async () => {
    const serialized = serializeParseResult(await createPipeline(null).parseEmail('', 'please send statement'));

    expect(serialized.metadata.ml_skipped).toBe(true);
    expect(serialized.metadata.ml_skip_reason).toBe('unavailable');
    expect(serialized.metadata).not.toHaveProperty('classifier');
  });
});
