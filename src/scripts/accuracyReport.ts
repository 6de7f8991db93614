/**
 * Run a labelled set of emails through the pipeline and report per-field accuracy.
 *
 * Usage:
 *   npm run accuracy-report -- --file fixtures/labelled-emails.json --output accuracy-report.md
 *
 * The classifier is off unless --with-classifier is given, so the report
 * measures the rule-based extractors by default.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { createStatementClassifier } from '../classifier';
import { config } from '../config';
import { loadExtractionConfig } from '../config/extraction';
import { EmailParsingPipeline, IDENTIFIER_KINDS, ParseResult, ParsingMethod } from '../extraction';
import { ConfigurationError } from '../errors';
import { NoopOutcomeRecorder } from '../services/OutcomeRecorder';
import logger from '../utils/logger';
import { createRequestContext, runWithContext } from '../utils/requestContext';

interface ReportOptions {
  file?: string;
  output?: string;
  configDir?: string;
  withClassifier?: boolean;
}

const identifierListSchema = z.array(z.string()).optional();

export const labelledSetSchema = z.object({
  processingDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  cases: z.array(
    z.object({
      id: z.string(),
      subject: z.string().default(''),
      body: z.string().default(''),
      expected: z.object({
        categories: z.array(z.string()),
        types: z.array(z.string()),
        identifiers: z
          .object({
            pan: identifierListSchema,
            di_code: identifierListSchema,
            account_code: identifierListSchema,
            aif_folio: identifierListSchema,
          })
          .default({}),
        fromDate: z.string().optional(),
        toDate: z.string().optional(),
      }),
    })
  ),
});

export type LabelledSet = z.infer<typeof labelledSetSchema>;
export type LabelledCase = LabelledSet['cases'][number];

type Field = 'categories' | 'types' | 'identifiers' | 'dates';

const FIELDS: readonly Field[] = ['categories', 'types', 'identifiers', 'dates'];

export interface FieldAccuracy {
  correct: number;
  total: number;
  accuracy: number;
}

export interface AccuracyReport {
  total: number;
  fields: Record<Field, FieldAccuracy>;
  methods: Record<ParsingMethod, number>;
  failures: Array<{ id: string; fields: Field[] }>;
}

function parseArgs(): ReportOptions {
  const args = process.argv.slice(2);
  const options: ReportOptions = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--file' && args[i + 1]) {
      options.file = args[++i];
    } else if (args[i] === '--output' && args[i + 1]) {
      options.output = args[++i];
    } else if (args[i] === '--config' && args[i + 1]) {
      options.configDir = args[++i];
    } else if (args[i] === '--with-classifier') {
      options.withClassifier = true;
    }
  }
  return options;
}

function sameMembers(actual: readonly string[], expected: readonly string[]): boolean {
  const expectedSet = new Set(expected);
  const actualSet = new Set(actual);
  return actualSet.size === expectedSet.size && [...actualSet].every((value) => expectedSet.has(value));
}

/**
 * Fields of one result that match the labels. Dates are only judged when
 * the case carries an expected range.
 */
export function judgeCase(result: ParseResult, labelled: LabelledCase): Record<Field, boolean | null> {
  const { expected } = labelled;
  const categories = result.statements.categories.map((c) => c.category);
  const types = result.statements.categories.flatMap((c) => c.types.map((t) => t.type));
  const identifiersMatch = IDENTIFIER_KINDS.every((kind) =>
    sameMembers(result.identifiers[kind], (expected.identifiers[kind] ?? []).map((v) => v.toUpperCase()))
  );

  const hasExpectedDates = expected.fromDate !== undefined || expected.toDate !== undefined;
  const datesMatch = hasExpectedDates
    ? (expected.fromDate === undefined || expected.fromDate === result.dateRange.from) &&
      (expected.toDate === undefined || expected.toDate === result.dateRange.to)
    : null;

  return {
    categories: sameMembers(categories, expected.categories),
    types: sameMembers(types, expected.types),
    identifiers: identifiersMatch,
    dates: datesMatch,
  };
}

function ratio(correct: number, total: number): number {
  return total === 0 ? 0 : Math.round((correct / total) * 10000) / 100;
}

export async function evaluateAccuracy(
  pipeline: EmailParsingPipeline,
  cases: readonly LabelledCase[]
): Promise<AccuracyReport> {
  const counts: Record<Field, { correct: number; total: number }> = {
    categories: { correct: 0, total: 0 },
    types: { correct: 0, total: 0 },
    identifiers: { correct: 0, total: 0 },
    dates: { correct: 0, total: 0 },
  };
  const methods: Record<ParsingMethod, number> = { rule_based: 0, ml_enhanced: 0, ml_fallback: 0 };
  const failures: AccuracyReport['failures'] = [];

  for (const labelled of cases) {
    const result = await pipeline.parseEmail(labelled.subject, labelled.body);
    methods[result.parsingMethod] += 1;

    const verdict = judgeCase(result, labelled);
    const failed: Field[] = [];
    for (const field of FIELDS) {
      const outcome = verdict[field];
      if (outcome === null) {
        continue;
      }
      counts[field].total += 1;
      if (outcome) {
        counts[field].correct += 1;
      } else {
        failed.push(field);
      }
    }
    if (failed.length > 0) {
      failures.push({ id: labelled.id, fields: failed });
    }
  }

  const accuracyOf = (field: Field): FieldAccuracy => ({
    ...counts[field],
    accuracy: ratio(counts[field].correct, counts[field].total),
  });
  const fields: Record<Field, FieldAccuracy> = {
    categories: accuracyOf('categories'),
    types: accuracyOf('types'),
    identifiers: accuracyOf('identifiers'),
    dates: accuracyOf('dates'),
  };

  return { total: cases.length, fields, methods, failures };
}

export function renderReport(report: AccuracyReport): string {
  const lines: string[] = [];
  lines.push('# Statement Request Parser Accuracy');
  lines.push('');
  lines.push(`Emails evaluated: **${report.total}**`);
  lines.push('');
  lines.push('## Field Accuracy');
  for (const [field, accuracy] of Object.entries(report.fields)) {
    lines.push(`- ${field}: ${accuracy.correct}/${accuracy.total} (${accuracy.accuracy}%)`);
  }
  lines.push('');
  lines.push('## Parsing Methods');
  for (const [method, count] of Object.entries(report.methods)) {
    lines.push(`- ${method}: ${count}`);
  }
  if (report.failures.length > 0) {
    lines.push('');
    lines.push('## Mismatches');
    for (const failure of report.failures) {
      lines.push(`- ${failure.id}: ${failure.fields.join(', ')}`);
    }
  }
  return lines.join('\n');
}

export async function loadLabelledSet(filePath: string): Promise<LabelledSet> {
  const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  const parsed = labelledSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigurationError.invalid(
      path.basename(filePath),
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.') || '(root)', message: issue.message }))
    );
  }
  return parsed.data;
}

export async function main(optionsOverride?: ReportOptions): Promise<AccuracyReport> {
  const options = optionsOverride ?? parseArgs();
  const filePath = path.resolve(options.file ?? 'fixtures/labelled-emails.json');

  const labelled = await loadLabelledSet(filePath);
  const extractionConfig = await loadExtractionConfig(path.resolve(options.configDir ?? config.extractionConfigDir));
  const processingDate = new Date(`${labelled.processingDate}T12:00:00`);

  const pipeline = new EmailParsingPipeline({
    config: extractionConfig,
    classifier: options.withClassifier ? createStatementClassifier(config.classifier, extractionConfig.keywords) : null,
    recorder: new NoopOutcomeRecorder(),
    clock: () => processingDate,
  });

  const report = await evaluateAccuracy(pipeline, labelled.cases);
  const rendered = renderReport(report);

  if (options.output) {
    await fs.writeFile(options.output, rendered, 'utf-8');
  } else {
    process.stdout.write(`${rendered}\n`);
  }

  logger.info('Accuracy report generated', {
    file: filePath,
    output: options.output,
    total: report.total,
    categories: report.fields.categories.accuracy,
    types: report.fields.types.accuracy,
    identifiers: report.fields.identifiers.accuracy,
    dates: report.fields.dates.accuracy,
  });

  return report;
}

if (require.main === module) {
  runWithContext(createRequestContext('cli'), () => main()).catch((error: unknown) => {
    logger.error('Failed to generate accuracy report', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
