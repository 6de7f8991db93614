/**
 * Anthropic Statement Classifier
 *
 * Statistical classifier backed by the Anthropic Messages API. The model is
 * forced to answer through a single tool whose input schema enumerates the
 * configured statement categories and types; the tool input is validated
 * before it reaches the pipeline.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { KeywordConfig } from '../config/extraction';
import { ClassifierUnavailableError } from '../errors';
import type { NormalizedText } from '../extraction/types';
import { getLogger } from '../utils/logger';
import { ClassifierPrediction, ClassifyOptions, StatisticalClassifier } from './types';

const log = getLogger('AnthropicStatementClassifier');

const TOOL_NAME = 'record_statement_request';

const SYSTEM_PROMPT = `You classify statement requests sent by email to a portfolio management back office.
Identify which statement categories and types the sender is asking for, any account identifiers
(PAN, DI code, 8-digit account code, 10-digit AIF folio) and the requested period.
Only use the categories and types offered by the tool. Give each label a score between 0 and 1.
Report dates as yyyy-MM-dd and omit the period when the email names none.`;

export interface AnthropicClassifierOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  keywords: KeywordConfig;
}

const predictionSchema = z.object({
  labels: z.array(
    z.object({
      category: z.string(),
      type: z.string(),
      score: z.number().min(0).max(1),
    })
  ),
  confidence: z.number().min(0).max(1),
  identifiers: z
    .object({
      pan: z.array(z.string()),
      di_code: z.array(z.string()),
      account_code: z.array(z.string()),
      aif_folio: z.array(z.string()),
    })
    .partial()
    .optional(),
  date_range: z
    .object({
      from: z.string(),
      to: z.string(),
    })
    .nullable()
    .optional(),
});

function buildTool(keywords: KeywordConfig): Anthropic.Tool {
  const categories = keywords.categories.map((c) => c.category);
  const types = keywords.categories.flatMap((c) => c.types.map((t) => t.type));
  const identifierList = { type: 'array', items: { type: 'string' } };

  return {
    name: TOOL_NAME,
    description: 'Record the statements, identifiers and period requested in the email.',
    input_schema: {
      type: 'object',
      properties: {
        labels: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              category: { type: 'string', enum: categories },
              type: { type: 'string', enum: types },
              score: { type: 'number', minimum: 0, maximum: 1 },
            },
            required: ['category', 'type', 'score'],
          },
        },
        confidence: { type: 'number', minimum: 0, maximum: 1 },
        identifiers: {
          type: 'object',
          properties: {
            pan: identifierList,
            di_code: identifierList,
            account_code: identifierList,
            aif_folio: identifierList,
          },
        },
        date_range: {
          type: 'object',
          properties: {
            from: { type: 'string', description: 'yyyy-MM-dd' },
            to: { type: 'string', description: 'yyyy-MM-dd' },
          },
          required: ['from', 'to'],
        },
      },
      required: ['labels', 'confidence'],
    },
  };
}

export class AnthropicStatementClassifier implements StatisticalClassifier {
  readonly name = 'anthropic';
  private readonly client: Anthropic;
  private readonly tool: Anthropic.Tool;

  constructor(private readonly options: AnthropicClassifierOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    this.tool = buildTool(options.keywords);
  }

  async classify(text: NormalizedText, { signal }: ClassifyOptions): Promise<ClassifierPrediction> {
    const startTime = Date.now();

    const response = await this.client.messages.create(
      {
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: text.text }],
        tools: [this.tool],
        tool_choice: { type: 'tool', name: TOOL_NAME },
      },
      { signal }
    );

    log.debug('Classifier response received', {
      model: this.options.model,
      duration: Date.now() - startTime,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      stopReason: response.stop_reason,
    });

    const toolUse = response.content.find(
      (block): block is Anthropic.ToolUseBlock => block.type === 'tool_use' && block.name === TOOL_NAME
    );
    if (!toolUse) {
      throw ClassifierUnavailableError.invalidResponse(this.name, 'no tool call in response');
    }

    const parsed = predictionSchema.safeParse(toolUse.input);
    if (!parsed.success) {
      throw ClassifierUnavailableError.invalidResponse(
        this.name,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
      );
    }

    const { labels, confidence, identifiers, date_range: dateRange } = parsed.data;
    return {
      labels,
      confidence,
      ...(identifiers && { identifiers }),
      ...(dateRange && { dateRange }),
    };
  }
}
