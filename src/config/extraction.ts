/**
 * Extraction Configuration
 *
 * Loads identifier patterns, statement keyword dictionaries and scoring
 * settings from the JSON files in the extraction config directory. The
 * result is validated once at startup and shared read-only by every parse.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { ConfigurationError, ConfigurationIssue } from '../errors';
import type { CalendarDate, DateProvenance, IdentifierKind } from '../extraction/types';

export const CONFIG_FILES = {
  patterns: 'regex_patterns.json',
  keywords: 'statement_keywords.json',
  model: 'model_config.json',
} as const;

const WEIGHT_SUM_TOLERANCE = 1e-6;

// ============================================================================
// Resolved configuration types
// ============================================================================

export interface IdentifierPatternConfig {
  readonly kind: IdentifierKind;
  /** Pattern over uppercase text, without anchors or word boundaries */
  readonly pattern: string;
  readonly exclude: readonly string[];
  readonly rejectDateLike: boolean;
}

export interface StatementTypeConfig {
  readonly type: string;
  readonly primary: readonly string[];
  readonly secondary: readonly string[];
  readonly weight: number;
}

export interface StatementCategoryConfig {
  readonly category: string;
  readonly types: readonly StatementTypeConfig[];
}

export interface BulkRequestConfig {
  readonly phrases: readonly string[];
  readonly categories: readonly string[];
}

export interface KeywordConfig {
  readonly minTypeWeight: number;
  readonly secondaryWeightFactor: number;
  readonly categories: readonly StatementCategoryConfig[];
  readonly bulkRequests: readonly BulkRequestConfig[];
}

export interface ConfidenceWeights {
  readonly statementType: number;
  readonly dateParsing: number;
  readonly identifiers: number;
}

export interface ScoringConfig {
  readonly weights: ConfidenceWeights;
  readonly dateConfidence: Readonly<Record<DateProvenance, number>>;
  readonly fuzzyCorrectionPenalty: number;
  readonly identifierScores: Readonly<Record<IdentifierKind, number>>;
  readonly identifierExtraMatchBonus: number;
}

export interface ThresholdConfig {
  readonly high: number;
  readonly medium: number;
}

export interface DateResolutionConfig {
  readonly defaultFromDate: CalendarDate;
  readonly fuzzyMatchThreshold: number;
}

export interface ClassifierSettings {
  readonly timeoutMs: number;
  /** Share of the final confidence taken from the classifier, 0-1 */
  readonly confidenceWeight: number;
  /** Category weight gap above which one source's type set wins outright */
  readonly conflictMargin: number;
}

export interface ExtractionConfig {
  readonly version: string;
  readonly identifiers: readonly IdentifierPatternConfig[];
  readonly keywords: KeywordConfig;
  readonly scoring: ScoringConfig;
  readonly thresholds: ThresholdConfig;
  readonly dates: DateResolutionConfig;
  readonly classifier: ClassifierSettings;
  readonly categoryIdentifierRequirements: Readonly<Record<string, readonly IdentifierKind[]>>;
}

// ============================================================================
// File schemas
// ============================================================================

const identifierKindSchema = z.enum(['pan', 'di_code', 'account_code', 'aif_folio']);
const unitInterval = z.number().min(0).max(1);
const percentage = z.number().min(0).max(100);

const patternSchema = z.string().min(1).superRefine((value, ctx) => {
  try {
    new RegExp(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
});

export const regexPatternsSchema = z.object({
  identifiers: z.record(
    identifierKindSchema,
    z.object({
      pattern: patternSchema,
      exclude: z.array(z.string()).default([]),
      rejectDateLike: z.boolean().default(false),
    })
  ),
});

const keywordList = z.array(z.string().trim().min(1));

export const statementKeywordsSchema = z.object({
  settings: z.object({
    minTypeWeight: unitInterval,
    secondaryWeightFactor: unitInterval,
  }),
  categories: z.record(
    z.string().min(1),
    z.record(
      z.string().min(1),
      z.object({
        primary: keywordList,
        secondary: keywordList.default([]),
        weight: unitInterval,
      })
    )
  ),
  bulkRequests: z
    .array(
      z.object({
        phrases: keywordList.min(1),
        categories: z.array(z.string().min(1)).min(1),
      })
    )
    .default([]),
});

const calendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd')
  .refine((value) => isValid(parseISO(value)), 'not a calendar date');

export const modelConfigSchema = z.object({
  version: z.string().min(1),
  confidenceWeights: z.object({
    statement_type: unitInterval,
    date_parsing: unitInterval,
    identifiers: unitInterval,
  }),
  thresholds: z.object({
    high: percentage,
    medium: percentage,
  }),
  dateConfidence: z.object({
    'explicit-single': percentage,
    'explicit-range': percentage,
    'fiscal-year': percentage,
    relative: percentage,
    default: percentage,
  }),
  fuzzyCorrectionPenalty: percentage.default(0),
  fuzzyMatchThreshold: percentage.default(75),
  identifierScores: z.object({
    pan: percentage,
    di_code: percentage,
    account_code: percentage,
    aif_folio: percentage,
  }),
  identifierExtraMatchBonus: percentage.default(0),
  defaultFromDate: calendarDateSchema,
  classifier: z.object({
    timeoutMs: z.number().int().positive(),
    confidenceWeight: unitInterval,
    conflictMargin: unitInterval,
  }),
  categoryIdentifierRequirements: z.record(z.string().min(1), z.array(identifierKindSchema).min(1)).default({}),
});

export interface RawExtractionConfig {
  patterns: unknown;
  keywords: unknown;
  model: unknown;
}

// ============================================================================
// Validation
// ============================================================================

function toIssues(error: z.ZodError): ConfigurationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

function parseSection<S extends z.ZodTypeAny>(schema: S, value: unknown, source: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ConfigurationError.invalid(source, toIssues(result.error));
  }
  return result.data;
}

/**
 * Confidence weights must sum to 1.0
 */
export function assertWeightsSumToOne(weights: ConfidenceWeights): void {
  const sum = weights.statementType + weights.dateParsing + weights.identifiers;
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw ConfigurationError.invalid(CONFIG_FILES.model, [
      {
        path: 'confidenceWeights',
        message: `weights must sum to 1.0 (got ${Number(sum.toFixed(6))})`,
      },
    ]);
  }
}

/**
 * Validate raw JSON documents and resolve them into an ExtractionConfig.
 */
export function buildExtractionConfig(raw: RawExtractionConfig): ExtractionConfig {
  const patterns = parseSection(regexPatternsSchema, raw.patterns, CONFIG_FILES.patterns);
  const keywords = parseSection(statementKeywordsSchema, raw.keywords, CONFIG_FILES.keywords);
  const model = parseSection(modelConfigSchema, raw.model, CONFIG_FILES.model);

  const weights: ConfidenceWeights = {
    statementType: model.confidenceWeights.statement_type,
    dateParsing: model.confidenceWeights.date_parsing,
    identifiers: model.confidenceWeights.identifiers,
  };
  assertWeightsSumToOne(weights);

  const issues: ConfigurationIssue[] = [];

  if (model.thresholds.medium >= model.thresholds.high) {
    issues.push({
      path: 'thresholds',
      message: `medium (${model.thresholds.medium}) must be below high (${model.thresholds.high})`,
    });
  }

  const identifiers: IdentifierPatternConfig[] = [];
  for (const [kind, entry] of Object.entries(patterns.identifiers)) {
    const parsedKind = identifierKindSchema.safeParse(kind);
    if (!parsedKind.success || entry === undefined) {
      continue;
    }
    identifiers.push({
      kind: parsedKind.data,
      pattern: entry.pattern,
      exclude: entry.exclude.map((word) => word.toUpperCase()),
      rejectDateLike: entry.rejectDateLike,
    });
  }

  const categories: StatementCategoryConfig[] = Object.entries(keywords.categories).map(
    ([category, types]) => ({
      category,
      types: Object.entries(types).map(([type, entry]) => ({
        type,
        primary: entry.primary.map((keyword) => keyword.toLowerCase()),
        secondary: entry.secondary.map((keyword) => keyword.toLowerCase()),
        weight: entry.weight,
      })),
    })
  );
  const categoryNames = new Set(categories.map((c) => c.category));

  keywords.bulkRequests.forEach((bulk, index) => {
    for (const category of bulk.categories) {
      if (!categoryNames.has(category)) {
        issues.push({ path: `bulkRequests.${index}.categories`, message: `unknown category "${category}"` });
      }
    }
  });

  for (const category of Object.keys(model.categoryIdentifierRequirements)) {
    if (!categoryNames.has(category)) {
      issues.push({ path: `categoryIdentifierRequirements.${category}`, message: 'unknown category' });
    }
  }

  if (issues.length > 0) {
    throw ConfigurationError.invalid('extraction configuration', issues);
  }

  return {
    version: model.version,
    identifiers,
    keywords: {
      minTypeWeight: keywords.settings.minTypeWeight,
      secondaryWeightFactor: keywords.settings.secondaryWeightFactor,
      categories,
      bulkRequests: keywords.bulkRequests.map((bulk) => ({
        phrases: bulk.phrases.map((phrase) => phrase.toLowerCase()),
        categories: bulk.categories,
      })),
    },
    scoring: {
      weights,
      dateConfidence: model.dateConfidence,
      fuzzyCorrectionPenalty: model.fuzzyCorrectionPenalty,
      identifierScores: model.identifierScores,
      identifierExtraMatchBonus: model.identifierExtraMatchBonus,
    },
    thresholds: model.thresholds,
    dates: {
      defaultFromDate: model.defaultFromDate,
      fuzzyMatchThreshold: model.fuzzyMatchThreshold,
    },
    classifier: model.classifier,
    categoryIdentifierRequirements: model.categoryIdentifierRequirements,
  };
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw ConfigurationError.unreadable(filePath, error instanceof Error ? error : undefined);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw ConfigurationError.invalid(path.basename(filePath), [
      { path: '(root)', message: error instanceof Error ? error.message : 'malformed JSON' },
    ]);
  }
}

/**
 * Load and validate the extraction configuration from a directory.
 * Throws ConfigurationError on any missing file or invalid value.
 */
export async function loadExtractionConfig(directory: string): Promise<ExtractionConfig> {
  const [patterns, keywords, model] = await Promise.all([
    readJson(path.join(directory, CONFIG_FILES.patterns)),
    readJson(path.join(directory, CONFIG_FILES.keywords)),
    readJson(path.join(directory, CONFIG_FILES.model)),
  ]);

  return buildExtractionConfig({ patterns, keywords, model });
}
