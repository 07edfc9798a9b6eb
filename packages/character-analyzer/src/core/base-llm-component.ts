import type { LoggerMethods } from '@storycast/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@storycast/shared';
import type { LanguageModel } from 'ai';

import { LLM_DEFAULTS } from '../config/constants';

export interface BaseLLMComponentOptions {
  /** Defaults to LLM_DEFAULTS.MAX_RETRIES */
  maxRetries?: number;
  /** Defaults to LLM_DEFAULTS.TEMPERATURE */
  temperature?: number;
  /** Tried once the primary model has exhausted its retries */
  fallbackModel?: LanguageModel;
  aggregator?: LLMTokenUsageAggregator;
  abortSignal?: AbortSignal;
}

/**
 * Model settings shared by every LLM-backed component, with log lines
 * prefixed by `[componentName]`.
 */
export abstract class BaseLLMComponent {
  protected readonly maxRetries: number;
  protected readonly temperature: number;

  constructor(
    protected readonly logger: LoggerMethods,
    protected readonly model: LanguageModel,
    protected readonly componentName: string,
    protected readonly options: BaseLLMComponentOptions = {},
  ) {
    this.maxRetries = options.maxRetries ?? LLM_DEFAULTS.MAX_RETRIES;
    this.temperature = options.temperature ?? LLM_DEFAULTS.TEMPERATURE;
  }

  protected log(
    level: keyof LoggerMethods,
    message: string,
    ...args: unknown[]
  ): void {
    this.logger[level](`[${this.componentName}] ${message}`, ...args);
  }

  protected trackUsage(usage: ExtendedTokenUsage): void {
    this.options.aggregator?.track(usage);
  }

  protected abstract buildSystemPrompt(): string;

  protected abstract buildUserPrompt(text: string): string;
}
