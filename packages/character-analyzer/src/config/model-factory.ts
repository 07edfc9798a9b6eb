import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';

import { ConfigurationError } from '../errors';

export type ModelProvider = 'openai' | 'anthropic';

const API_KEY_VARIABLES: Record<ModelProvider, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

function isModelProvider(value: string): value is ModelProvider {
  return Object.hasOwn(API_KEY_VARIABLES, value);
}

/**
 * Build a language model from a "provider/model-name" identifier
 *
 * API keys are read from `OPENAI_API_KEY` or `ANTHROPIC_API_KEY` unless
 * an environment is passed in.
 *
 * @throws {ConfigurationError} For a malformed identifier or unknown provider
 */
export function createModel(
  identifier: string,
  env: NodeJS.ProcessEnv = process.env,
): LanguageModel {
  const separator = identifier.indexOf('/');
  const provider = identifier.slice(0, separator);
  const modelName = identifier.slice(separator + 1);

  if (separator <= 0 || !modelName) {
    throw new ConfigurationError(
      `Model identifier must look like "provider/model-name", got "${identifier}"`,
    );
  }
  if (!isModelProvider(provider)) {
    throw new ConfigurationError(
      `Unknown model provider "${provider}" (expected one of: ${Object.keys(API_KEY_VARIABLES).join(', ')})`,
    );
  }

  const apiKey = env[API_KEY_VARIABLES[provider]];

  switch (provider) {
    case 'openai':
      return createOpenAI({ apiKey })(modelName);
    case 'anthropic':
      return createAnthropic({ apiKey })(modelName);
  }
}
