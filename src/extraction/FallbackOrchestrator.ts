/**
 * Fallback Orchestrator
 *
 * Decides from the rule-based confidence whether the statistical classifier
 * is consulted, and in which role:
 *
 *   score >= high            RULE_SUFFICIENT  rules only
 *   medium <= score < high   ML_ENHANCE       rules primary, classifier enriches
 *   score < medium           ML_FALLBACK      classifier primary, rules corroborate
 *
 * Any classifier failure degrades to RULE_SUFFICIENT with the reason recorded.
 */

import type { ExtractionConfig, ThresholdConfig } from '../config/extraction';
import type { ClassifierPrediction, StatisticalClassifier } from '../classifier/types';
import { ClassifierUnavailableError } from '../errors';
import { blendClassifierConfidence, scoreConfidence } from './ConfidenceScorer';
import { mergeExtractions, predictionToFields } from './ResultMerger';
import {
  ConfidenceScore,
  ExtractionFields,
  FallbackState,
  MlSkipReason,
  NormalizedText,
  ParsingMethod,
} from './types';
import { getLogger } from '../utils/logger';

const log = getLogger('FallbackOrchestrator');

export interface OrchestrationOutcome {
  fields: ExtractionFields;
  confidence: ConfidenceScore;
  parsingMethod: ParsingMethod;
  /** State the run settled in */
  fallbackState: FallbackState;
  /** State the rule-based confidence asked for */
  requestedState: FallbackState;
  mlSkipped: boolean;
  mlSkipReason?: MlSkipReason;
  classifierName?: string;
}

function skipReasonOf(error: unknown): MlSkipReason {
  return error instanceof ClassifierUnavailableError ? error.reason : 'error';
}

/**
 * Pick the fallback state for a rule-based confidence score
 */
export function decideFallbackState(score: number, thresholds: ThresholdConfig): FallbackState {
  if (score >= thresholds.high) {
    return FallbackState.RuleSufficient;
  }
  if (score >= thresholds.medium) {
    return FallbackState.MlEnhance;
  }
  return FallbackState.MlFallback;
}

export class FallbackOrchestrator {
  constructor(
    private readonly config: ExtractionConfig,
    private readonly classifier: StatisticalClassifier | null
  ) {}

  async run(text: NormalizedText, ruleFields: ExtractionFields, ruleScore: ConfidenceScore): Promise<OrchestrationOutcome> {
    const requestedState = decideFallbackState(ruleScore.overall, this.config.thresholds);

    if (requestedState === FallbackState.RuleSufficient) {
      return this.ruleOnly(ruleFields, ruleScore, requestedState);
    }

    if (!this.classifier) {
      return this.ruleOnly(ruleFields, ruleScore, requestedState, 'unavailable');
    }

    let prediction: ClassifierPrediction;
    try {
      prediction = await this.predict(this.classifier, text);
    } catch (error) {
      const reason = skipReasonOf(error);
      log.warn('Classifier skipped, using rule-based result', {
        classifier: this.classifier.name,
        requestedState,
        reason,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.ruleOnly(ruleFields, ruleScore, requestedState, reason, this.classifier.name);
    }

    const mlFields = predictionToFields(prediction, {
      keywords: this.config.keywords,
      patterns: this.config.identifiers,
      fallbackRange: ruleFields.dateRange,
    });

    const ruleIsPrimary = requestedState === FallbackState.MlEnhance;
    const fields = mergeExtractions(ruleIsPrimary ? ruleFields : mlFields, ruleIsPrimary ? mlFields : ruleFields, {
      conflictMargin: this.config.classifier.conflictMargin,
      primarySource: ruleIsPrimary ? 'rule' : 'ml',
      patterns: this.config.identifiers,
    });

    const recomputed = scoreConfidence(fields, this.config.scoring);
    const confidence = blendClassifierConfidence(
      recomputed,
      prediction.confidence,
      this.config.classifier.confidenceWeight
    );

    log.debug('Classifier result merged', {
      classifier: this.classifier.name,
      state: requestedState,
      ruleConfidence: ruleScore.overall,
      mergedConfidence: confidence.overall,
    });

    return {
      fields,
      confidence,
      parsingMethod: ruleIsPrimary ? 'ml_enhanced' : 'ml_fallback',
      fallbackState: requestedState,
      requestedState,
      mlSkipped: false,
      classifierName: this.classifier.name,
    };
  }

  /**
   * Call the classifier with an abort signal, bounded by the configured timeout
   */
  private async predict(classifier: StatisticalClassifier, text: NormalizedText): Promise<ClassifierPrediction> {
    const { timeoutMs } = this.config.classifier;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(ClassifierUnavailableError.timeout(classifier.name, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([classifier.classify(text, { signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private ruleOnly(
    fields: ExtractionFields,
    confidence: ConfidenceScore,
    requestedState: FallbackState,
    skipReason?: MlSkipReason,
    classifierName?: string
  ): OrchestrationOutcome {
    return {
      fields,
      confidence,
      parsingMethod: 'rule_based',
      fallbackState: FallbackState.RuleSufficient,
      requestedState,
      mlSkipped: skipReason !== undefined,
      mlSkipReason: skipReason,
      classifierName,
    };
  }
}
