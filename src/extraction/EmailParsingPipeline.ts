/**
 * Email Parsing Pipeline
 *
 * Caller-facing entry point. Normalizes the email, runs the rule-based
 * extractors, lets the fallback orchestrator consult the classifier,
 * applies business rules and returns one frozen ParseResult.
 */

import type { ExtractionConfig } from '../config/extraction';
import type { StatisticalClassifier } from '../classifier/types';
import { InputError } from '../errors';
import { LoggerOutcomeRecorder, OutcomeRecorder } from '../services/OutcomeRecorder';
import { deepFreeze } from '../utils/deepFreeze';
import { getLogger } from '../utils/logger';
import { blendClassifierConfidence, scoreConfidence } from './ConfidenceScorer';
import { resolveDateRange } from './DateRangeResolver';
import { FallbackOrchestrator } from './FallbackOrchestrator';
import { buildIdentifierSet, extractIdentifiers, hasAnyIdentifier } from './IdentifierExtractor';
import { classifyStatements } from './StatementClassifier';
import { TextNormalizer } from './TextNormalizer';
import {
  ConfidenceScore,
  ExtractionFields,
  IdentifierKind,
  NormalizedText,
  ParseResult,
  StatementSelection,
} from './types';

const log = getLogger('EmailParsingPipeline');

export const CATEGORY_IDENTIFIER_RULE = 'category_identifier_requirements';

export interface PipelineDependencies {
  config: ExtractionConfig;
  /** Omit or pass null to run rule-based only */
  classifier?: StatisticalClassifier | null;
  recorder?: OutcomeRecorder;
  /** Processing clock */
  clock?: () => Date;
  normalizer?: TextNormalizer;
}

export interface RuleBasedAnalysis {
  fields: ExtractionFields;
  confidence: ConfidenceScore;
}

/**
 * Drop categories whose required identifier kinds are all missing
 */
export function applyCategoryIdentifierRequirements(
  fields: ExtractionFields,
  requirements: Readonly<Record<string, readonly IdentifierKind[]>>
): { fields: ExtractionFields; applied: boolean } {
  const kept = fields.statements.categories.filter((category) => {
    const required = requirements[category.category];
    if (!required || required.length === 0) {
      return true;
    }
    return required.some((kind) => fields.identifiers[kind].length > 0);
  });

  if (kept.length === fields.statements.categories.length) {
    return { fields, applied: false };
  }

  const statements: StatementSelection = { categories: kept };
  return { fields: { ...fields, statements }, applied: true };
}

export class EmailParsingPipeline {
  private readonly config: ExtractionConfig;
  private readonly orchestrator: FallbackOrchestrator;
  private readonly recorder: OutcomeRecorder;
  private readonly clock: () => Date;
  private readonly normalizer: TextNormalizer;
  private readonly classifierName: string | null;

  constructor(deps: PipelineDependencies) {
    this.config = deps.config;
    this.orchestrator = new FallbackOrchestrator(deps.config, deps.classifier ?? null);
    this.recorder = deps.recorder ?? new LoggerOutcomeRecorder(deps.config.thresholds);
    this.clock = deps.clock ?? (() => new Date());
    this.normalizer = deps.normalizer ?? new TextNormalizer();
    this.classifierName = deps.classifier?.name ?? null;
  }

  get modelVersion(): string {
    return this.config.version;
  }

  get hasClassifier(): boolean {
    return this.classifierName !== null;
  }

  /**
   * Rule-based extraction and scoring over normalized text
   */
  analyze(text: NormalizedText, now: Date): RuleBasedAnalysis {
    const fields: ExtractionFields = {
      identifiers: text.isEmpty ? buildIdentifierSet({}) : extractIdentifiers(text.text, this.config.identifiers),
      dateRange: resolveDateRange(text.text, {
        now,
        defaultFromDate: this.config.dates.defaultFromDate,
        fuzzyMatchThreshold: this.config.dates.fuzzyMatchThreshold,
      }),
      statements: classifyStatements(text.text, this.config.keywords),
    };

    return { fields, confidence: scoreConfidence(fields, this.config.scoring) };
  }

  /**
   * Score fields changed after orchestration, keeping the classifier's
   * share when one took part.
   */
  private rescore(fields: ExtractionFields, previous: ConfidenceScore): ConfidenceScore {
    const score = scoreConfidence(fields, this.config.scoring);
    if (previous.classifier === undefined) {
      return score;
    }
    return blendClassifierConfidence(score, previous.classifier / 100, this.config.classifier.confidenceWeight);
  }

  /**
   * Parse one email. Throws InputError when subject and body are both empty.
   */
  async parseEmail(subject?: string | null, body?: string | null): Promise<ParseResult> {
    const startedAt = Date.now();
    const text = this.normalizer.normalize(subject, body);

    if (text.isEmpty) {
      throw InputError.emptyEmail();
    }

    const now = this.clock();
    const rules = this.analyze(text, now);
    const outcome = await this.orchestrator.run(text, rules.fields, rules.confidence);

    const businessRulesApplied: string[] = [];
    let confidence = outcome.confidence;
    const checked = applyCategoryIdentifierRequirements(outcome.fields, this.config.categoryIdentifierRequirements);
    if (checked.applied) {
      businessRulesApplied.push(CATEGORY_IDENTIFIER_RULE);
      confidence = this.rescore(checked.fields, outcome.confidence);
      log.debug('Categories removed by identifier requirements', {
        before: outcome.fields.statements.categories.map((c) => c.category),
        after: checked.fields.statements.categories.map((c) => c.category),
        confidence: confidence.overall,
      });
    }
    const fields = checked.fields;

    const result = deepFreeze<ParseResult>({
      identifiers: fields.identifiers,
      dateRange: fields.dateRange,
      statements: fields.statements,
      confidence,
      parsingMethod: outcome.parsingMethod,
      metadata: {
        fallbackState: outcome.fallbackState,
        requestedState: outcome.requestedState,
        mlSkipped: outcome.mlSkipped,
        ...(outcome.mlSkipReason !== undefined && { mlSkipReason: outcome.mlSkipReason }),
        ...(outcome.classifierName !== undefined && { classifierName: outcome.classifierName }),
        ruleConfidence: rules.confidence.overall,
        dateSource: fields.dateRange.provenance === 'default' ? 'default' : 'email',
        modelVersion: this.config.version,
        hasIdentifiers: hasAnyIdentifier(fields.identifiers),
        businessRulesApplied,
        processingTimeMs: Date.now() - startedAt,
        processedAt: now.toISOString(),
      },
      rawText: text.text,
    });

    this.recorder.record(result);
    return result;
  }
}
