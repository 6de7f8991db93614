/**
 * Unit Tests for the Anthropic-backed classifier
 */

import { AnthropicStatementClassifier, createStatementClassifier } from '../../classifier';
import { ClassifierUnavailableError } from '../../errors';
import type { NormalizedText } from '../../extraction/types';
import { shippedConfig } from '../helpers/testConfig';

const mockCreate = jest.fn();

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: class {
    messages = { create: mockCreate };
  },
}));

const text: NormalizedText = {
  text: 'subject: statement body: need my holdings for last quarter',
  isEmpty: false,
};

function toolResponse(input: unknown, name = 'record_statement_request') {
  return {
    content: [{ type: 'tool_use', id: 'toolu_test', name, input }],
    usage: { input_tokens: 120, output_tokens: 40 },
    stop_reason: 'tool_use',
  };
}

describe('AnthropicStatementClassifier', () => {
  const keywords = shippedConfig().keywords;
  let classifier: AnthropicStatementClassifier;
  let controller: AbortController;

  beforeEach(() => {
    classifier = new AnthropicStatementClassifier({
      apiKey: 'test-api-key',
      model: 'test-model',
      maxTokens: 512,
      temperature: 0,
      keywords,
    });
    controller = new AbortController();
  });

  it('should return the validated tool input as a prediction', async () => {
    mockCreate.mockResolvedValue(
      toolResponse({
        labels: [{ category: 'PMS', type: 'Portfolio_Appraisal', score: 0.8 }],
        confidence: 0.75,
        identifiers: { pan: ['ABCDE1234F'] },
        date_range: { from: '2024-01-01', to: '2024-03-31' },
      })
    );

    const prediction = await classifier.classify(text, { signal: controller.signal });

    expect(prediction).toEqual({
      labels: [{ category: 'PMS', type: 'Portfolio_Appraisal', score: 0.8 }],
      confidence: 0.75,
      identifiers: { pan: ['ABCDE1234F'] },
      dateRange: { from: '2024-01-01', to: '2024-03-31' },
    });
  });

  it('should force the tool and pass the abort signal', async () => {
    mockCreate.mockResolvedValue(toolResponse({ labels: [], confidence: 0.1 }));

    await classifier.classify(text, { signal: controller.signal });

    expect(mockCreate).toHaveBeenCalledTimes(1);
    const [params, options] = mockCreate.mock.calls[0];
    expect(params).toMatchObject({
      model: 'test-model',
      max_tokens: 512,
      temperature: 0,
      messages: [{ role: 'user', content: text.text }],
      tool_choice: { type: 'tool', name: 'record_statement_request' },
    });
    expect(params.tools[0].input_schema.properties.labels.items.properties.category.enum).toEqual(['PMS', 'AIF']);
    expect(options).toEqual({ signal: controller.signal });
  });

  it('should omit a null date range', async () => {
    mockCreate.mockResolvedValue(toolResponse({ labels: [], confidence: 0.2, date_range: null }));

    const prediction = await classifier.classify(text, { signal: controller.signal });

    expect(prediction).toEqual({ labels: [], confidence: 0.2 });
  });

  it('should reject a response without the tool call', async () => {
    mockCreate.mockResolvedValue(toolResponse({ labels: [], confidence: 0.2 }, 'some_other_tool'));

    const result = classifier.classify(text, { signal: controller.signal });

    await expect(result).rejects.toBeInstanceOf(ClassifierUnavailableError);
    await expect(result).rejects.toMatchObject({ code: 'CLASSIFIER_003', reason: 'error' });
  });

  it('should reject tool input outside the schema', async () => {
    mockCreate.mockResolvedValue(
      toolResponse({ labels: [{ category: 'PMS', type: 'Portfolio_Appraisal', score: 2 }], confidence: 0.9 })
    );

    await expect(classifier.classify(text, { signal: controller.signal })).rejects.toMatchObject({
      code: 'CLASSIFIER_003',
    });
  });

  it('should propagate API failures', async () => {
    mockCreate.mockRejectedValue(new Error('overloaded'));

    await expect(classifier.classify(text, { signal: controller.signal })).rejects.toThrow('overloaded');
  });
});

describe('createStatementClassifier', () => {
  const keywords = shippedConfig().keywords;
  const settings = {
    enabled: true,
    anthropicApiKey: 'test-api-key',
    model: 'test-model',
    maxTokens: 512,
    temperature: 0,
  };

  it('should create the Anthropic classifier', () => {
    const classifier = createStatementClassifier(settings, keywords);

    expect(classifier).toBeInstanceOf(AnthropicStatementClassifier);
    expect(classifier?.name).toBe('anthropic');
  });

  it('should return null when disabled', () => {
    expect(createStatementClassifier({ ...settings, enabled: false }, keywords)).toBeNull();
  });

  it('should return null without an API key', () => {
    expect(createStatementClassifier({ ...settings, anthropicApiKey: undefined }, keywords)).toBeNull();
  });
});
