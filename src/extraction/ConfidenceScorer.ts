/**
 * Confidence Scorer
 * Combines statement, date and identifier sub-scores into one 0-100 value
 */

import { assertWeightsSumToOne, ScoringConfig } from '../config/extraction';
import { maxTypeWeight } from './StatementClassifier';
import { ConfidenceComponents, ConfidenceScore, ExtractionFields, IDENTIFIER_KINDS, IdentifierSet } from './types';

const MAX_SCORE = 100;

function clamp(value: number): number {
  return Math.min(MAX_SCORE, Math.max(0, value));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function scoreIdentifiers(identifiers: IdentifierSet, scoring: ScoringConfig): number {
  let score = 0;
  for (const kind of IDENTIFIER_KINDS) {
    const values = identifiers[kind];
    if (values.length > 0) {
      score += scoring.identifierScores[kind] + scoring.identifierExtraMatchBonus * (values.length - 1);
    }
  }
  return clamp(score);
}

export function scoreComponents(fields: ExtractionFields, scoring: ScoringConfig): ConfidenceComponents {
  const { dateRange } = fields;
  const datePenalty = dateRange.fuzzyCorrected ? scoring.fuzzyCorrectionPenalty : 0;

  return {
    statementType: round2(clamp(maxTypeWeight(fields.statements) * MAX_SCORE)),
    dateParsing: clamp(scoring.dateConfidence[dateRange.provenance] - datePenalty),
    identifiers: scoreIdentifiers(fields.identifiers, scoring),
  };
}

/**
 * Weighted confidence over the extracted fields
 */
export function scoreConfidence(fields: ExtractionFields, scoring: ScoringConfig): ConfidenceScore {
  const { weights } = scoring;
  assertWeightsSumToOne(weights);

  const components = scoreComponents(fields, scoring);
  const overall =
    components.statementType * weights.statementType +
    components.dateParsing * weights.dateParsing +
    components.identifiers * weights.identifiers;

  return Object.freeze({
    overall: round2(clamp(overall)),
    components: Object.freeze(components),
  });
}

/**
 * Fold the classifier's own confidence (0-1) into the overall score.
 * `weight` is the classifier's share of the result.
 */
export function blendClassifierConfidence(
  score: ConfidenceScore,
  classifierConfidence: number,
  weight: number
): ConfidenceScore {
  const classifier = round2(clamp(classifierConfidence * MAX_SCORE));
  const share = Math.min(1, Math.max(0, weight));

  return Object.freeze({
    overall: round2(clamp(score.overall * (1 - share) + classifier * share)),
    components: score.components,
    classifier,
  });
}
