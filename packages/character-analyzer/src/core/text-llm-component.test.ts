import type { LoggerMethods } from '@storycast/logger';
import type { ExtendedTokenUsage } from '@storycast/shared';

import { LLMTokenUsageAggregator } from '@storycast/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';

import { TextLLMComponent } from './text-llm-component';

const mocks = vi.hoisted(() => ({ call: vi.fn() }));

vi.mock('@storycast/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@storycast/shared')>()),
  LLMCaller: { call: mocks.call },
}));

class TestTextComponent extends TextLLMComponent {
  protected buildSystemPrompt(): string {
    return 'Test system prompt';
  }

  protected buildUserPrompt(input: string): string {
    return `Test user prompt: ${input}`;
  }

  public testCallTextLLM<TOutput>(
    schema: z.ZodType<TOutput>,
    phase: string,
    maxOutputTokens?: number,
  ) {
    return this.callTextLLM(
      schema,
      this.buildSystemPrompt(),
      this.buildUserPrompt('input'),
      phase,
      maxOutputTokens,
    );
  }
}

const usage: ExtendedTokenUsage = {
  component: 'TestComponent',
  phase: 'test-phase',
  model: 'primary',
  modelName: 'gpt-test',
  inputTokens: 100,
  outputTokens: 50,
  totalTokens: 150,
};

describe('TextLLMComponent', () => {
  const schema = z.object({ result: z.string() });
  let logger: LoggerMethods;

  beforeEach(() => {
    logger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    mocks.call.mockResolvedValue({
      output: { result: 'test-result' },
      usage,
      usedFallback: false,
    });
  });

  test('calls LLMCaller.call() with the component configuration', async () => {
    const controller = new AbortController();
    const component = new TestTextComponent(
      logger,
      'openai/gpt-test',
      'TestComponent',
      {
        maxRetries: 5,
        temperature: 0.5,
        fallbackModel: 'anthropic/claude-test',
        abortSignal: controller.signal,
      },
    );

    await component.testCallTextLLM(schema, 'test-phase', 1000);

    expect(mocks.call).toHaveBeenCalledWith({
      schema,
      systemPrompt: 'Test system prompt',
      userPrompt: 'Test user prompt: input',
      primaryModel: 'openai/gpt-test',
      fallbackModel: 'anthropic/claude-test',
      maxRetries: 5,
      temperature: 0.5,
      maxOutputTokens: 1000,
      abortSignal: controller.signal,
      component: 'TestComponent',
      phase: 'test-phase',
    });
  });

  test('returns the output and usage of the call', async () => {
    const component = new TestTextComponent(
      logger,
      'openai/gpt-test',
      'TestComponent',
    );

    const result = await component.testCallTextLLM(schema, 'test-phase');

    expect(result).toEqual({ output: { result: 'test-result' }, usage });
  });

  test('tracks usage in the aggregator', async () => {
    const aggregator = new LLMTokenUsageAggregator();
    const component = new TestTextComponent(
      logger,
      'openai/gpt-test',
      'TestComponent',
      { aggregator },
    );

    await component.testCallTextLLM(schema, 'test-phase');

    expect(aggregator.getTotalUsage().totalTokens).toBe(150);
  });

  test('propagates call errors without tracking usage', async () => {
    const aggregator = new LLMTokenUsageAggregator();
    const component = new TestTextComponent(
      logger,
      'openai/gpt-test',
      'TestComponent',
      { aggregator },
    );
    mocks.call.mockRejectedValue(new Error('API error'));

    await expect(
      component.testCallTextLLM(schema, 'test-phase'),
    ).rejects.toThrow('API error');
    expect(aggregator.getTotalUsage().totalTokens).toBe(0);
  });
});
