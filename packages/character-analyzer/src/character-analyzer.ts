import type { LoggerMethods } from '@storycast/logger';
import type {
  AnalysisSessionResult,
  TokenUsageReport,
} from '@storycast/model';
import type { LanguageModel } from 'ai';

import type { OrchestratorRunOptions } from './orchestrator';
import type { AnalysisCallbacks } from './types';

import { LLMTokenUsageAggregator } from '@storycast/shared';

import { PASS_BUDGETS, type PassTokenBudget } from './budget';
import { LlmCharacterExtractor } from './extractors';
import { type NameMatchingMode, createNameMatcher } from './matching';
import {
  IncrementalMerger,
  type VoiceMergeStrategy,
  createVoiceProfileMerger,
} from './merging';
import { BatchOrchestrator } from './orchestrator';

/**
 * CharacterAnalyzer Options
 */
export interface CharacterAnalyzerOptions extends AnalysisCallbacks {
  logger: LoggerMethods;

  /**
   * Model used for every extraction call
   */
  model: LanguageModel;

  /**
   * Model tried when a call on the primary model fails
   */
  fallbackModel?: LanguageModel;

  /**
   * Name resolution strategy (default: 'fuzzy')
   */
  matching?: NameMatchingMode;

  /**
   * Voice profile reconciliation strategy (default: 'prefer-detailed')
   */
  voiceMerge?: VoiceMergeStrategy;

  /**
   * Token split for each batch (default: PASS_BUDGETS.batchedAnalysis)
   */
  budget?: PassTokenBudget;

  /**
   * Maximum retry count for LLM API (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;

  /**
   * Stops the session at the next batch boundary
   */
  abortSignal?: AbortSignal;

  /**
   * Receives the cumulative token usage after every attempted batch
   */
  onTokenUsage?: (report: TokenUsageReport) => void;
}

export interface CharacterAnalysisResult {
  result: AnalysisSessionResult;
  usage: TokenUsageReport;
}

/**
 * Main class extracting characters from long-form text
 *
 * Every `analyze` call is an independent session with its own extractor,
 * accumulator and orchestrator, so one analyzer can serve several
 * documents concurrently.
 *
 * @example
 * ```typescript
 * import { createOpenAI } from '@ai-sdk/openai';
 * import { Logger } from '@storycast/logger';
 *
 * const openai = createOpenAI({ apiKey: process.env.OPENAI_API_KEY });
 * const analyzer = new CharacterAnalyzer({
 *   logger: Logger.console(),
 *   model: openai('gpt-5-mini'),
 *   onBatchComplete: (index, total, characters) =>
 *     console.log(`${index + 1}/${total}: ${characters.length} characters`),
 * });
 *
 * const { result, usage } = await analyzer.analyze(pages);
 * ```
 */
export class CharacterAnalyzer {
  private readonly logger: LoggerMethods;
  private readonly model: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly matching: NameMatchingMode;
  private readonly voiceMerge: VoiceMergeStrategy;
  private readonly budget: PassTokenBudget;
  private readonly maxRetries?: number;
  private readonly temperature?: number;
  private readonly abortSignal?: AbortSignal;
  private readonly callbacks: AnalysisCallbacks;
  private readonly onTokenUsage?: (report: TokenUsageReport) => void;

  constructor(options: CharacterAnalyzerOptions) {
    this.logger = options.logger;
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.matching = options.matching ?? 'fuzzy';
    this.voiceMerge = options.voiceMerge ?? 'prefer-detailed';
    this.budget = options.budget ?? PASS_BUDGETS.batchedAnalysis;
    this.maxRetries = options.maxRetries;
    this.temperature = options.temperature;
    this.abortSignal = options.abortSignal;
    this.callbacks = {
      onBatchComplete: options.onBatchComplete,
      onBatchFailed: options.onBatchFailed,
      onSessionComplete: options.onSessionComplete,
      onCheckpoint: options.onCheckpoint,
    };
    this.onTokenUsage = options.onTokenUsage;
  }

  /**
   * Run one analysis session over the given pages
   *
   * Batch failures are reported in `result.failures`; the promise only
   * rejects on programming errors.
   */
  async analyze(
    pages: readonly string[],
    runOptions: OrchestratorRunOptions = {},
  ): Promise<CharacterAnalysisResult> {
    this.logger.info(
      `[CharacterAnalyzer] Analyzing ${pages.length} page(s) (matching: ${this.matching}, voice: ${this.voiceMerge})`,
    );

    const aggregator = new LLMTokenUsageAggregator();
    // The session signal is checked between batches only, so an in-flight
    // call is never cut short.
    const extractor = new LlmCharacterExtractor(
      this.logger,
      this.model,
      {
        maxRetries: this.maxRetries,
        temperature: this.temperature,
        fallbackModel: this.fallbackModel,
        aggregator,
      },
    );
    const merger = new IncrementalMerger(
      this.logger,
      createNameMatcher(this.matching),
      createVoiceProfileMerger(this.voiceMerge),
    );
    const orchestrator = new BatchOrchestrator(this.logger, extractor, merger, {
      ...this.callbacks,
      budget: this.budget,
      abortSignal: this.abortSignal,
      onCheckpoint: (checkpoint) => {
        this.onTokenUsage?.(aggregator.getReport());
        this.callbacks.onCheckpoint?.(checkpoint);
      },
    });

    const result = await orchestrator.run(pages, runOptions);

    aggregator.logSummary(this.logger);

    return { result, usage: aggregator.getReport() };
  }
}
