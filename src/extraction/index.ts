/**
 * Statement request extraction
 */

export * from './types';
export { TextNormalizer, normalizeEmailText } from './TextNormalizer';
export {
  extractIdentifiers,
  validateIdentifier,
  isDateLike,
  emptyIdentifierSet,
  buildIdentifierSet,
  countIdentifiers,
  hasAnyIdentifier,
} from './IdentifierExtractor';
export {
  resolveDateRange,
  defaultDateRange,
  parseDateToken,
  correctPeriodTypos,
  toCalendarDate,
  isCalendarDate,
} from './DateRangeResolver';
export type { DateResolutionOptions } from './DateRangeResolver';
export { classifyStatements, maxTypeWeight } from './StatementClassifier';
export { scoreConfidence, blendClassifierConfidence, scoreComponents } from './ConfidenceScorer';
export { decideFallbackState, FallbackOrchestrator } from './FallbackOrchestrator';
export type { OrchestrationOutcome } from './FallbackOrchestrator';
export { mergeExtractions, predictionToFields } from './ResultMerger';
export type { MergeOptions, ExtractionSource } from './ResultMerger';
export {
  EmailParsingPipeline,
  applyCategoryIdentifierRequirements,
  CATEGORY_IDENTIFIER_RULE,
} from './EmailParsingPipeline';
export type { PipelineDependencies, RuleBasedAnalysis } from './EmailParsingPipeline';
export { serializeParseResult } from './serializeParseResult';
export type { SerializedParseResult } from './serializeParseResult';
