/**
 * Statement Request Extraction Types
 *
 * Value objects shared by the extraction pipeline. Every value is
 * request-scoped and treated as immutable once produced.
 */

import type { ClassifierFailureReason } from '../errors';

/**
 * Identifier kinds recognised in statement requests
 */
export type IdentifierKind = 'pan' | 'di_code' | 'account_code' | 'aif_folio';

export const IDENTIFIER_KINDS: readonly IdentifierKind[] = ['pan', 'di_code', 'account_code', 'aif_folio'];

/**
 * Matched identifiers per kind, in order of first appearance, uppercase, deduplicated
 */
export type IdentifierSet = Readonly<Record<IdentifierKind, readonly string[]>>;

/**
 * Lower-cased, whitespace-collapsed `subject: ... body: ...` analysis string
 */
export interface NormalizedText {
  readonly text: string;
  readonly isEmpty: boolean;
}

/** ISO calendar date, `yyyy-MM-dd` */
export type CalendarDate = string;

/**
 * Where a resolved date range came from
 */
export type DateProvenance =
  | 'explicit-single'
  | 'explicit-range'
  | 'fiscal-year'
  | 'relative'
  | 'default';

export interface DateRange {
  /** Inclusive start, never after `to` */
  readonly from: CalendarDate;
  /** Inclusive end */
  readonly to: CalendarDate;
  readonly provenance: DateProvenance;
  /** Fragment of the normalized text the range was resolved from */
  readonly matchedText?: string;
  /** True when the range was only found after typo correction */
  readonly fuzzyCorrected: boolean;
}

export interface StatementTypeMatch {
  readonly type: string;
  /** Accumulated keyword weight, 0-1 */
  readonly weight: number;
  readonly matchedKeywords: readonly string[];
}

export interface StatementCategoryMatch {
  readonly category: string;
  /** Highest weight among the category's types */
  readonly weight: number;
  readonly types: readonly StatementTypeMatch[];
}

export interface StatementSelection {
  readonly categories: readonly StatementCategoryMatch[];
}

/**
 * The three extracted fields, from either extraction source
 */
export interface ExtractionFields {
  readonly identifiers: IdentifierSet;
  readonly dateRange: DateRange;
  readonly statements: StatementSelection;
}

export interface ConfidenceComponents {
  readonly statementType: number;
  readonly dateParsing: number;
  readonly identifiers: number;
}

/**
 * Overall confidence (0-100) with the sub-scores it was composed from
 */
export interface ConfidenceScore {
  readonly overall: number;
  readonly components: ConfidenceComponents;
  /** Classifier confidence (0-100), present when it was folded in */
  readonly classifier?: number;
}

export type ParsingMethod = 'rule_based' | 'ml_enhanced' | 'ml_fallback';

/**
 * Fallback decision taken from the rule-based confidence
 */
export enum FallbackState {
  RuleSufficient = 'RULE_SUFFICIENT',
  MlEnhance = 'ML_ENHANCE',
  MlFallback = 'ML_FALLBACK',
}

export type MlSkipReason = ClassifierFailureReason;

export interface ParseMetadata {
  /** State the orchestrator settled in */
  readonly fallbackState: FallbackState;
  /** State the rule-based confidence asked for, before any degradation */
  readonly requestedState: FallbackState;
  readonly mlSkipped: boolean;
  readonly mlSkipReason?: MlSkipReason;
  readonly classifierName?: string;
  readonly ruleConfidence: number;
  readonly dateSource: 'email' | 'default';
  readonly modelVersion: string;
  readonly hasIdentifiers: boolean;
  readonly businessRulesApplied: readonly string[];
  readonly processingTimeMs: number;
  readonly processedAt: string;
}

/**
 * Final output of a single parse
 */
export interface ParseResult extends ExtractionFields {
  readonly confidence: ConfidenceScore;
  readonly parsingMethod: ParsingMethod;
  readonly metadata: ParseMetadata;
  readonly rawText: string;
}
