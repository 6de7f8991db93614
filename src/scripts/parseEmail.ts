/**
 * Parse a single email from the command line and print the result as JSON.
 *
 * Usage:
 *   npm run parse-email -- --subject "PMS Statement Request" --body "Send me portfolio statement for FY24"
 *   npm run parse-email -- --file ./email.txt
 *
 * A file's first line is taken as the subject when it starts with "Subject:".
 * Pass --rules-only to skip the statistical classifier.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { createStatementClassifier } from '../classifier';
import { config } from '../config';
import { loadExtractionConfig } from '../config/extraction';
import { EmailParsingPipeline, serializeParseResult, SerializedParseResult } from '../extraction';
import { NoopOutcomeRecorder } from '../services/OutcomeRecorder';
import logger from '../utils/logger';
import { createRequestContext, runWithContext } from '../utils/requestContext';

export interface ParseEmailOptions {
  subject?: string;
  body?: string;
  file?: string;
  configDir?: string;
  rulesOnly?: boolean;
}

export function parseArgs(args: string[] = process.argv.slice(2)): ParseEmailOptions {
  const options: ParseEmailOptions = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--subject' && args[i + 1] !== undefined) {
      options.subject = args[++i];
    } else if (args[i] === '--body' && args[i + 1] !== undefined) {
      options.body = args[++i];
    } else if (args[i] === '--file' && args[i + 1]) {
      options.file = args[++i];
    } else if (args[i] === '--config' && args[i + 1]) {
      options.configDir = args[++i];
    } else if (args[i] === '--rules-only') {
      options.rulesOnly = true;
    }
  }
  return options;
}

/**
 * Split a plain-text email into subject and body
 */
export function splitEmailFile(content: string): { subject: string; body: string } {
  const lines = content.replace(/\r\n/g, '\n').split('\n');
  const subjectMatch = /^subject:\s*(.*)$/i.exec(lines[0] ?? '');
  if (!subjectMatch) {
    return { subject: '', body: content.trim() };
  }
  return { subject: subjectMatch[1].trim(), body: lines.slice(1).join('\n').trim() };
}

export async function main(optionsOverride?: ParseEmailOptions): Promise<SerializedParseResult> {
  const options = optionsOverride ?? parseArgs();

  let { subject, body } = options;
  if (options.file) {
    const email = splitEmailFile(await fs.readFile(options.file, 'utf-8'));
    subject = email.subject;
    body = email.body;
  }

  const extractionConfig = await loadExtractionConfig(path.resolve(options.configDir ?? config.extractionConfigDir));
  const pipeline = new EmailParsingPipeline({
    config: extractionConfig,
    classifier: options.rulesOnly ? null : createStatementClassifier(config.classifier, extractionConfig.keywords),
    recorder: new NoopOutcomeRecorder(),
  });

  const result = serializeParseResult(await pipeline.parseEmail(subject, body));
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  return result;
}

if (require.main === module) {
  runWithContext(createRequestContext('cli'), () => main()).catch((error: unknown) => {
    logger.error('Failed to parse email', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
