/**
 * Unit Tests for ResultMerger
 */

import type { ClassifierPrediction } from '../../classifier/types';
import { scoreConfidence } from '../../extraction/ConfidenceScorer';
import { resolveDateRange } from '../../extraction/DateRangeResolver';
import { buildIdentifierSet, extractIdentifiers } from '../../extraction/IdentifierExtractor';
import { mergeExtractions, predictionToFields } from '../../extraction/ResultMerger';
import { classifyStatements } from '../../extraction/StatementClassifier';
import { DateRange, ExtractionFields, StatementCategoryMatch } from '../../extraction/types';
import { PROCESSING_DATE, shippedConfig } from '../helpers/testConfig';

const config = shippedConfig();

const defaultRange: DateRange = {
  from: '1990-01-01',
  to: '2024-06-14',
  provenance: 'default',
  fuzzyCorrected: false,
};

const explicitRange: DateRange = {
  from: '2024-01-01',
  to: '2024-03-31',
  provenance: 'explicit-range',
  fuzzyCorrected: false,
};

function category(name: string, types: Array<[string, number]>): StatementCategoryMatch {
  return {
    category: name,
    weight: Math.max(...types.map(([, weight]) => weight)),
    types: types.map(([type, weight]) => ({ type, weight, matchedKeywords: [] })),
  };
}

function fields(
  categories: StatementCategoryMatch[],
  dateRange: DateRange = defaultRange,
  pan: string[] = []
): ExtractionFields {
  return { identifiers: buildIdentifierSet({ pan }), dateRange, statements: { categories } };
}

function rulesFor(text: string): ExtractionFields {
  return {
    identifiers: extractIdentifiers(text, config.identifiers),
    dateRange: resolveDateRange(text, {
      now: PROCESSING_DATE,
      defaultFromDate: config.dates.defaultFromDate,
      fuzzyMatchThreshold: config.dates.fuzzyMatchThreshold,
    }),
    statements: classifyStatements(text, config.keywords),
  };
}

describe('ResultMerger', () => {
  const mergeOptions = {
    conflictMargin: config.classifier.conflictMargin,
    patterns: config.identifiers,
  };

  describe('predictionToFields', () => {
    it('should keep configured labels above the minimum weight', () => {
      const prediction: ClassifierPrediction = {
        labels: [
          { category: 'PMS', type: 'Portfolio_Appraisal', score: 0.7 },
          { category: 'PMS', type: 'Unknown_Type', score: 0.9 },
          { category: 'MF', type: 'Account_Statement', score: 0.9 },
          { category: 'PMS', type: 'Bank_Book', score: 0.2 },
        ],
        confidence: 0.7,
      };

      const result = predictionToFields(prediction, {
        keywords: config.keywords,
        patterns: config.identifiers,
        fallbackRange: defaultRange,
      });

      expect(result.statements.categories).toEqual([
        {
          category: 'PMS',
          weight: 0.7,
          types: [{ type: 'Portfolio_Appraisal', weight: 0.7, matchedKeywords: [] }],
        },
      ]);
      expect(result.dateRange).toBe(defaultRange);
    });

    it('should validate proposed identifiers', () => {
      const prediction: ClassifierPrediction = {
        labels: [],
        confidence: 0.5,
        identifiers: { pan: ['abcde1234f', 'not-a-pan'], account_code: ['15032024'] },
      };

      const result = predictionToFields(prediction, {
        keywords: config.keywords,
        patterns: config.identifiers,
        fallbackRange: defaultRange,
      });

      expect(result.identifiers.pan).toEqual(['ABCDE1234F']);
      expect(result.identifiers.account_code).toEqual([]);
    });

    it('should order a proposed date range and ignore invalid ones', () => {
      const convert = (from: string, to: string) =>
        predictionToFields(
          { labels: [], confidence: 0.5, dateRange: { from, to } },
          { keywords: config.keywords, patterns: config.identifiers, fallbackRange: defaultRange }
        ).dateRange;

      expect(convert('2024-03-31', '2024-01-01')).toEqual(explicitRange);
      expect(convert('2024-02-30', '2024-03-31')).toBe(defaultRange);
      expect(convert('31/03/2024', '2024-03-31')).toBe(defaultRange);
    });
  });

  describe('mergeExtractions', () => {
    it('should return an equal value when merging fields with themselves', () => {
      const rules = rulesFor(
        'subject: pms statement request body: send me portfolio statement and factsheet as on 15-mar-2024 for pan abcde1234f'
      );

      expect(mergeExtractions(rules, rules, { ...mergeOptions, primarySource: 'rule' })).toEqual(rules);
      expect(mergeExtractions(rules, rules, { ...mergeOptions, primarySource: 'ml' })).toEqual(rules);
    });

    it('should leave the confidence unchanged when merging fields with themselves', () => {
      const rules = rulesFor('subject: bank book body: for pan abcde1234f and folio 5123456789 for last quarter');
      const merged = mergeExtractions(rules, rules, { ...mergeOptions, primarySource: 'rule' });

      expect(scoreConfidence(merged, config.scoring)).toEqual(scoreConfidence(rules, config.scoring));
    });

    it('should union identifiers with the primary source first', () => {
      const primary = fields([], defaultRange, ['FGHIJ5678K']);
      const secondary = fields([], defaultRange, ['ABCDE1234F', 'FGHIJ5678K']);

      const result = mergeExtractions(primary, secondary, { ...mergeOptions, primarySource: 'rule' });

      expect(result.identifiers.pan).toEqual(['FGHIJ5678K', 'ABCDE1234F']);
    });

    it('should keep the rule date range unless it is the default', () => {
      const explicitRule = fields([], { ...explicitRange, from: '2023-04-01' });

      expect(
        mergeExtractions(fields([]), fields([], explicitRange), { ...mergeOptions, primarySource: 'rule' }).dateRange
      ).toBe(explicitRange);
      expect(
        mergeExtractions(explicitRule, fields([], explicitRange), { ...mergeOptions, primarySource: 'rule' }).dateRange
          .from
      ).toBe('2023-04-01');
    });

    it('should let a clearly stronger source decide the types of a category', () => {
      const rule = fields([category('PMS', [['Portfolio_Appraisal', 0.3]])]);
      const ml = fields([category('PMS', [['Performance_Appraisal', 0.8]])]);

      const result = mergeExtractions(rule, ml, { ...mergeOptions, primarySource: 'rule' });

      expect(result.statements.categories).toEqual([category('PMS', [['Performance_Appraisal', 0.8]])]);
    });

    it('should union the types when the weights are close', () => {
      const rule = fields([category('PMS', [['Portfolio_Appraisal', 0.6]])]);
      const ml = fields([category('PMS', [['Performance_Appraisal', 0.7]])]);

      const result = mergeExtractions(rule, ml, { ...mergeOptions, primarySource: 'rule' });

      expect(result.statements.categories).toEqual([
        category('PMS', [
          ['Portfolio_Appraisal', 0.6],
          ['Performance_Appraisal', 0.7],
        ]),
      ]);
    });

    it('should add classifier-only categories when enhancing', () => {
      const rule = fields([category('PMS', [['Portfolio_Appraisal', 0.6]])]);
      const ml = fields([category('AIF', [['AIF_Statement', 0.8]])]);

      const result = mergeExtractions(rule, ml, { ...mergeOptions, primarySource: 'rule' });

      expect(result.statements.categories.map((c) => c.category)).toEqual(['PMS', 'AIF']);
    });

    it('should drop rule-only categories when the classifier is primary', () => {
      const rule = fields([
        category('PMS', [['Portfolio_Appraisal', 0.3]]),
        category('AIF', [['AIF_Statement', 0.3]]),
      ]);
      const ml = fields([category('PMS', [['Portfolio_Appraisal', 0.7]])]);

      const result = mergeExtractions(ml, rule, { ...mergeOptions, primarySource: 'ml' });

      expect(result.statements.categories.map((c) => c.category)).toEqual(['PMS']);
    });

    it('should keep rule categories when the classifier proposed none', () => {
      const rule = fields([category('PMS', [['Portfolio_Appraisal', 0.3]])]);

      const result = mergeExtractions(fields([]), rule, { ...mergeOptions, primarySource: 'ml' });

      expect(result.statements.categories).toEqual([category('PMS', [['Portfolio_Appraisal', 0.3]])]);
    });
  });
});
