import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { describe, expect, test } from 'vitest';

import { detectProvider } from './provider-detector';

describe('detectProvider', () => {
  test('detects OpenAI model objects', () => {
    const openai = createOpenAI({ apiKey: 'test-secret' });
    expect(detectProvider(openai('gpt-test'))).toBe('openai');
  });

  test('detects Anthropic model objects', () => {
    const anthropic = createAnthropic({ apiKey: 'test-secret' });
    expect(detectProvider(anthropic('claude-test'))).toBe('anthropic');
  });

  test('detects gateway model ids by prefix', () => {
    expect(detectProvider('openai/gpt-test')).toBe('openai');
    expect(detectProvider('anthropic/claude-test')).toBe('anthropic');
    expect(detectProvider('google/gemini-test')).toBe('google');
    expect(detectProvider('togetherai/llama-test')).toBe('togetherai');
  });

  test('returns unknown for unrecognized providers', () => {
    expect(detectProvider('custom/model-test')).toBe('unknown');
  });

  test('returns unknown for an empty model id', () => {
    expect(detectProvider('')).toBe('unknown');
  });

  test('matches provider ids that embed a known name', () => {
    expect(detectProvider('openai-compatible/model-test')).toBe('openai');
  });
});
