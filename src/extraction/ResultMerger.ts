/**
 * Result Merger
 *
 * Reconciles rule-based fields with fields proposed by the statistical
 * classifier. Merging a value with itself returns an equal value.
 */

import type { IdentifierPatternConfig, KeywordConfig } from '../config/extraction';
import type { ClassifierPrediction } from '../classifier/types';
import { buildIdentifierSet, validateIdentifier } from './IdentifierExtractor';
import { isCalendarDate } from './DateRangeResolver';
import {
  DateRange,
  ExtractionFields,
  IDENTIFIER_KINDS,
  IdentifierKind,
  IdentifierSet,
  StatementCategoryMatch,
  StatementSelection,
  StatementTypeMatch,
} from './types';

export type ExtractionSource = 'rule' | 'ml';

export interface MergeOptions {
  /** Category weight gap above which one source's type set replaces the other's */
  conflictMargin: number;
  /** Which side of the merge is authoritative */
  primarySource: ExtractionSource;
  patterns: readonly IdentifierPatternConfig[];
}

export interface PredictionConversionOptions {
  keywords: KeywordConfig;
  patterns: readonly IdentifierPatternConfig[];
  /** Range to carry when the prediction proposes none */
  fallbackRange: DateRange;
}

function freezeType(match: StatementTypeMatch): StatementTypeMatch {
  return Object.freeze({ ...match, matchedKeywords: Object.freeze([...match.matchedKeywords]) });
}

function freezeCategory(category: string, types: StatementTypeMatch[]): StatementCategoryMatch {
  return Object.freeze({
    category,
    weight: types.reduce((max, t) => Math.max(max, t.weight), 0),
    types: Object.freeze(types.map(freezeType)),
  });
}

// ============================================================================
// Classifier prediction -> extraction fields
// ============================================================================

function predictionIdentifiers(
  prediction: ClassifierPrediction,
  patterns: readonly IdentifierPatternConfig[]
): IdentifierSet {
  const values: Partial<Record<IdentifierKind, string[]>> = {};
  for (const kind of IDENTIFIER_KINDS) {
    const accepted: string[] = [];
    for (const raw of prediction.identifiers?.[kind] ?? []) {
      const value = validateIdentifier(kind, raw, patterns);
      if (value !== null) {
        accepted.push(value);
      }
    }
    values[kind] = accepted;
  }
  return buildIdentifierSet(values);
}

function predictionDateRange(prediction: ClassifierPrediction, fallback: DateRange): DateRange {
  const proposed = prediction.dateRange;
  if (!proposed || !isCalendarDate(proposed.from) || !isCalendarDate(proposed.to)) {
    return fallback;
  }
  const [from, to] = proposed.from <= proposed.to ? [proposed.from, proposed.to] : [proposed.to, proposed.from];
  return Object.freeze({ from, to, provenance: 'explicit-range', fuzzyCorrected: false });
}

function predictionStatements(prediction: ClassifierPrediction, keywords: KeywordConfig): StatementSelection {
  const categories: StatementCategoryMatch[] = [];

  for (const categoryConfig of keywords.categories) {
    const types: StatementTypeMatch[] = [];
    for (const typeConfig of categoryConfig.types) {
      const scores = prediction.labels
        .filter((label) => label.category === categoryConfig.category && label.type === typeConfig.type)
        .map((label) => Math.min(1, Math.max(0, label.score)));
      const weight = scores.length > 0 ? Math.max(...scores) : 0;
      if (weight > keywords.minTypeWeight) {
        types.push({ type: typeConfig.type, weight, matchedKeywords: [] });
      }
    }
    if (types.length > 0) {
      categories.push(freezeCategory(categoryConfig.category, types));
    }
  }

  return Object.freeze({ categories: Object.freeze(categories) });
}

/**
 * Convert a classifier prediction into extraction fields. Labels outside the
 * configured categories and identifiers failing their pattern are dropped.
 */
export function predictionToFields(
  prediction: ClassifierPrediction,
  options: PredictionConversionOptions
): ExtractionFields {
  return Object.freeze({
    identifiers: predictionIdentifiers(prediction, options.patterns),
    dateRange: predictionDateRange(prediction, options.fallbackRange),
    statements: predictionStatements(prediction, options.keywords),
  });
}

// ============================================================================
// Merge
// ============================================================================

function mergeIdentifiers(
  primary: IdentifierSet,
  secondary: IdentifierSet,
  patterns: readonly IdentifierPatternConfig[]
): IdentifierSet {
  const values: Partial<Record<IdentifierKind, string[]>> = {};
  for (const kind of IDENTIFIER_KINDS) {
    const merged: string[] = [];
    for (const raw of [...primary[kind], ...secondary[kind]]) {
      const value = validateIdentifier(kind, raw, patterns);
      if (value !== null && !merged.includes(value)) {
        merged.push(value);
      }
    }
    values[kind] = merged;
  }
  return buildIdentifierSet(values);
}

function mergeDateRange(rule: DateRange, ml: DateRange): DateRange {
  if (rule.provenance === 'default' && ml.provenance !== 'default') {
    return ml;
  }
  return rule;
}

function unionTypes(first: StatementCategoryMatch, second: StatementCategoryMatch): StatementTypeMatch[] {
  const merged = new Map<string, StatementTypeMatch>();
  for (const match of [...first.types, ...second.types]) {
    const existing = merged.get(match.type);
    if (!existing) {
      merged.set(match.type, match);
      continue;
    }
    merged.set(match.type, {
      type: match.type,
      weight: Math.max(existing.weight, match.weight),
      matchedKeywords: [...new Set([...existing.matchedKeywords, ...match.matchedKeywords])],
    });
  }
  return [...merged.values()];
}

function sameTypeSet(a: StatementCategoryMatch, b: StatementCategoryMatch): boolean {
  const types = new Set(a.types.map((t) => t.type));
  return a.types.length === b.types.length && b.types.every((t) => types.has(t.type));
}

/**
 * Reconcile one category present in both sources. Rule-based types come
 * first in a union.
 */
function mergeCategory(
  rule: StatementCategoryMatch,
  ml: StatementCategoryMatch,
  conflictMargin: number
): StatementCategoryMatch {
  if (!sameTypeSet(rule, ml)) {
    if (rule.weight - ml.weight > conflictMargin) {
      return freezeCategory(rule.category, [...rule.types]);
    }
    if (ml.weight - rule.weight > conflictMargin) {
      return freezeCategory(ml.category, [...ml.types]);
    }
  }
  return freezeCategory(rule.category, unionTypes(rule, ml));
}

function mergeStatements(
  rule: StatementSelection,
  ml: StatementSelection,
  options: Pick<MergeOptions, 'conflictMargin' | 'primarySource'>
): StatementSelection {
  const [primary, secondary] = options.primarySource === 'rule' ? [rule, ml] : [ml, rule];
  const ruleOnlyIsCorroboration = options.primarySource === 'ml' && ml.categories.length > 0;

  const order = [...primary.categories, ...secondary.categories]
    .map((c) => c.category)
    .filter((category, index, all) => all.indexOf(category) === index);

  const categories: StatementCategoryMatch[] = [];
  for (const name of order) {
    const ruleCategory = rule.categories.find((c) => c.category === name);
    const mlCategory = ml.categories.find((c) => c.category === name);

    if (ruleCategory && mlCategory) {
      categories.push(mergeCategory(ruleCategory, mlCategory, options.conflictMargin));
    } else if (mlCategory) {
      categories.push(freezeCategory(mlCategory.category, [...mlCategory.types]));
    } else if (ruleCategory && !ruleOnlyIsCorroboration) {
      categories.push(freezeCategory(ruleCategory.category, [...ruleCategory.types]));
    }
  }

  return Object.freeze({ categories: Object.freeze(categories) });
}

/**
 * Merge two sets of extraction fields.
 *
 * Identifiers are unioned (primary first, every value re-validated). The
 * rule-based date range stands unless it is the default and the classifier
 * proposed an explicit one. Statement categories are reconciled per
 * category; with the classifier as primary, categories only the rules found
 * are kept only when the classifier proposed nothing.
 */
export function mergeExtractions(
  primary: ExtractionFields,
  secondary: ExtractionFields,
  options: MergeOptions
): ExtractionFields {
  const [rule, ml] = options.primarySource === 'rule' ? [primary, secondary] : [secondary, primary];

  return Object.freeze({
    identifiers: mergeIdentifiers(primary.identifiers, secondary.identifiers, options.patterns),
    dateRange: mergeDateRange(rule.dateRange, ml.dateRange),
    statements: mergeStatements(rule.statements, ml.statements, options),
  });
}
