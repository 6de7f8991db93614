/**
 * Wire format for parse results (snake_case, flat identifier lists)
 */

import { MlSkipReason, ParseResult, ParsingMethod } from './types';

export interface SerializedParseResult {
  statement_category: string[];
  statement_types: string[];
  aif_folio: string[];
  di_code: string[];
  account_code: string[];
  pan_numbers: string[];
  from_date: string;
  to_date: string;
  confidence: number;
  confidence_breakdown: {
    statement_type: number;
    date_parsing: number;
    identifiers: number;
    classifier?: number;
  };
  metadata: {
    date_source: 'email' | 'default';
    date_provenance: string;
    date_fuzzy_corrected: boolean;
    parsing_method: ParsingMethod;
    fallback_state: string;
    ml_skipped: boolean;
    ml_skip_reason?: MlSkipReason;
    classifier?: string;
    rule_confidence: number;
    model_version: string;
    has_identifiers: boolean;
    business_rules_applied: string[];
    processing_time_ms: number;
  };
  raw_text: string;
}

export function serializeParseResult(result: ParseResult): SerializedParseResult {
  const { identifiers, dateRange, statements, confidence, metadata } = result;

  return {
    statement_category: statements.categories.map((c) => c.category),
    statement_types: statements.categories.flatMap((c) => c.types.map((t) => t.type)),
    aif_folio: [...identifiers.aif_folio],
    di_code: [...identifiers.di_code],
    account_code: [...identifiers.account_code],
    pan_numbers: [...identifiers.pan],
    from_date: dateRange.from,
    to_date: dateRange.to,
    confidence: confidence.overall,
    confidence_breakdown: {
      statement_type: confidence.components.statementType,
      date_parsing: confidence.components.dateParsing,
      identifiers: confidence.components.identifiers,
      ...(confidence.classifier !== undefined && { classifier: confidence.classifier }),
    },
    metadata: {
      date_source: metadata.dateSource,
      date_provenance: dateRange.provenance,
      date_fuzzy_corrected: dateRange.fuzzyCorrected,
      parsing_method: result.parsingMethod,
      fallback_state: metadata.fallbackState,
      ml_skipped: metadata.mlSkipped,
      ...(metadata.mlSkipReason !== undefined && { ml_skip_reason: metadata.mlSkipReason }),
      ...(metadata.classifierName !== undefined && { classifier: metadata.classifierName }),
      rule_confidence: metadata.ruleConfidence,
      model_version: metadata.modelVersion,
      has_identifiers: metadata.hasIdentifiers,
      business_rules_applied: [...metadata.businessRulesApplied],
      processing_time_ms: metadata.processingTimeMs,
    },
    raw_text: result.rawText,
  };
}
