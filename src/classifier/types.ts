/**
 * Statistical classifier boundary
 *
 * The pipeline only sees this interface. Implementations may be a hosted
 * model, a local model, or a test stub.
 */

import type { IdentifierKind, NormalizedText } from '../extraction/types';

export interface ClassifierLabel {
  category: string;
  type: string;
  /** 0-1 */
  score: number;
}

export interface ClassifierDateRange {
  /** `yyyy-MM-dd` */
  from: string;
  /** `yyyy-MM-dd` */
  to: string;
}

export interface ClassifierPrediction {
  labels: ClassifierLabel[];
  /** Overall confidence, 0-1 */
  confidence: number;
  identifiers?: Partial<Record<IdentifierKind, string[]>>;
  dateRange?: ClassifierDateRange;
}

export interface ClassifyOptions {
  /** Aborted when the caller stops waiting for the prediction */
  signal: AbortSignal;
}

export interface StatisticalClassifier {
  readonly name: string;
  classify(text: NormalizedText, options: ClassifyOptions): Promise<ClassifierPrediction>;
}
