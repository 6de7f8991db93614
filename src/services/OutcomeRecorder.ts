/**
 * Outcome Recorder
 * Records each parse outcome to the process log and the audit trail
 */

import type { ThresholdConfig } from '../config/extraction';
import { auditLogger, getLogger } from '../utils/logger';
import { ParseResult } from '../extraction/types';

export interface OutcomeRecorder {
  record(result: ParseResult): void;
}

const log = getLogger('ParseOutcome');

export type ConfidenceLevel = 'high' | 'medium' | 'low';

export function confidenceLevel(confidence: number, thresholds: ThresholdConfig): ConfidenceLevel {
  if (confidence >= thresholds.high) return 'high';
  if (confidence >= thresholds.medium) return 'medium';
  return 'low';
}

export class LoggerOutcomeRecorder implements OutcomeRecorder {
  constructor(private readonly thresholds: ThresholdConfig) {}

  record(result: ParseResult): void {
    const { identifiers, dateRange, statements, metadata } = result;
    const level = confidenceLevel(result.confidence.overall, this.thresholds);

    log.info('Parsing completed', {
      confidence: result.confidence.overall,
      confidenceLevel: level,
      method: result.parsingMethod,
      processingTimeMs: metadata.processingTimeMs,
    });
    log.debug('Categories and types', {
      categories: statements.categories.map((c) => c.category),
      types: statements.categories.flatMap((c) => c.types.map((t) => t.type)),
    });
    log.debug('Identifiers found', {
      pan: identifiers.pan.length,
      di: identifiers.di_code.length,
      accounts: identifiers.account_code.length,
      folios: identifiers.aif_folio.length,
    });
    log.debug(`Date range: ${dateRange.from} to ${dateRange.to} (${metadata.dateSource})`);

    auditLogger.info('parse_outcome', {
      confidence: result.confidence.overall,
      confidenceLevel: level,
      ruleConfidence: metadata.ruleConfidence,
      parsingMethod: result.parsingMethod,
      fallbackState: metadata.fallbackState,
      requestedState: metadata.requestedState,
      mlSkipped: metadata.mlSkipped,
      mlSkipReason: metadata.mlSkipReason,
      dateProvenance: dateRange.provenance,
      categories: statements.categories.map((c) => c.category),
      businessRulesApplied: metadata.businessRulesApplied,
      modelVersion: metadata.modelVersion,
    });
  }
}

/**
 * Recorder that drops every outcome
 */
export class NoopOutcomeRecorder implements OutcomeRecorder {
  record(): void {}
}
