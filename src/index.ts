/**
 * Statement Request Parser
 * Library entry point
 */

export * from './extraction';
export * from './errors';
export {
  loadExtractionConfig,
  buildExtractionConfig,
  assertWeightsSumToOne,
  CONFIG_FILES,
} from './config/extraction';
export type {
  ExtractionConfig,
  IdentifierPatternConfig,
  KeywordConfig,
  ScoringConfig,
  ThresholdConfig,
  ClassifierSettings,
} from './config/extraction';
export { createStatementClassifier, AnthropicStatementClassifier } from './classifier';
export type { ClassifierPrediction, StatisticalClassifier, ClassifyOptions } from './classifier';
export { LoggerOutcomeRecorder, NoopOutcomeRecorder } from './services/OutcomeRecorder';
export type { OutcomeRecorder } from './services/OutcomeRecorder';
export { createApp } from './app';
