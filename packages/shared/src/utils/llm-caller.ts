import type { z } from 'zod';

import {
  type LanguageModel,
  NoObjectGeneratedError,
  Output,
  generateText,
  hasToolCall,
  tool,
} from 'ai';

import { detectProvider } from './provider-detector';

/**
 * Configuration for LLM API call with retry and fallback support
 */
export interface LLMCallConfig<TOutput> {
  /**
   * Zod schema for response validation
   */
  schema: z.ZodType<TOutput>;

  systemPrompt: string;

  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once the primary model exhausts its retries
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model for transport errors
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Upper bound on generated tokens (optional)
   */
  maxOutputTokens?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'CharacterExtractor')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'extraction')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface RawUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

interface GenerationResult<TOutput> {
  output: TOutput;
  usage?: RawUsage;
}

interface PromptParams {
  system: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
  maxRetries: number;
  abortSignal?: AbortSignal;
}

/**
 * LLMCaller - Centralized LLM API caller with retry and fallback support
 *
 * Wraps AI SDK's generateText with a structured-output retry strategy:
 * 1. Try the primary model (transport retries handled by the SDK)
 * 2. If it fails and a fallback model is configured, try the fallback once
 * 3. Return usage data tagged with the model that answered
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: CharacterResponseSchema,
 *   systemPrompt: 'You extract characters from fiction.',
 *   userPrompt: batchText,
 *   primaryModel: openai('gpt-5-mini'),
 *   fallbackModel: anthropic('claude-sonnet-4-5'),
 *   maxRetries: 3,
 *   component: 'CharacterExtractor',
 *   phase: 'extraction',
 * });
 * ```
 */
export class LLMCaller {
  /**
   * Maximum number of retries when structured output generation fails.
   * Total attempts = MAX_STRUCTURED_OUTPUT_RETRIES + 1.
   *
   * Applied to both:
   * - `Output.object()` path: retries on NoObjectGeneratedError (schema mismatch)
   * - Tool call path: retries when model does not produce a tool call
   */
  private static readonly MAX_STRUCTURED_OUTPUT_RETRIES = 10;

  /**
   * Model identifier used in usage reports
   */
  static extractModelName(model: LanguageModel): string {
    if (typeof model === 'string') return model;
    return model.modelId;
  }

  private static buildUsage(
    config: Pick<LLMCallConfig<unknown>, 'component' | 'phase'>,
    modelName: string,
    usage: RawUsage | undefined,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
      totalTokens: usage?.totalTokens ?? 0,
    };
  }

  /**
   * Generate structured output via forced tool call.
   *
   * Used for providers that do not reliably support `Output.object()`. Forces
   * the model to call a tool whose input schema is the target schema, then
   * validates the tool input against it.
   *
   * @throws NoObjectGeneratedError when no attempt produced a tool call
   */
  private static async generateViaToolCall<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    params: PromptParams,
  ): Promise<GenerationResult<TOutput>> {
    const submitTool = tool({
      description: 'Submit the structured result',
      inputSchema: schema,
    });

    const attempt = () =>
      generateText({
        ...params,
        model,
        tools: { submitResult: submitTool },
        toolChoice: { type: 'tool', toolName: 'submitResult' },
        stopWhen: hasToolCall('submitResult'),
      });

    let result = await attempt();

    for (let retry = 0; ; retry++) {
      const toolCall = result.toolCalls[0];
      if (toolCall) {
        return { output: schema.parse(toolCall.input), usage: result.usage };
      }
      if (retry >= this.MAX_STRUCTURED_OUTPUT_RETRIES) break;
      result = await attempt();
    }

    throw new NoObjectGeneratedError({
      message: 'Model did not produce a tool call for structured output',
      text: result.text,
      response: result.response,
      usage: result.usage,
      finishReason: result.finishReason,
    });
  }

  /**
   * Generate structured output with provider-aware strategy.
   *
   * - OpenAI / Anthropic / Google: `Output.object()` with schema retry
   * - Together AI / unknown: forced tool call
   *
   * Retries up to MAX_STRUCTURED_OUTPUT_RETRIES times on NoObjectGeneratedError,
   * re-throwing the last error if all attempts fail.
   */
  private static async generateStructuredOutput<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    params: PromptParams,
  ): Promise<GenerationResult<TOutput>> {
    const providerType = detectProvider(model);

    if (providerType === 'togetherai' || providerType === 'unknown') {
      return this.generateViaToolCall(model, schema, params);
    }

    let lastError: unknown;

    for (
      let attempt = 0;
      attempt <= this.MAX_STRUCTURED_OUTPUT_RETRIES;
      attempt++
    ) {
      try {
        const result = await generateText({
          model,
          output: Output.object({ schema }),
          ...params,
        });
        return { output: result.output, usage: result.usage };
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error)) {
          lastError = error;
          continue;
        }
        throw error;
      }
    }

    throw lastError;
  }

  /**
   * Call LLM with retry and fallback support
   *
   * The fallback model is skipped when the call was aborted.
   *
   * @throws the fallback error, or the primary error when no fallback ran
   */
  static async call<TOutput>(
    config: LLMCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    const params: PromptParams = {
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    };

    try {
      const response = await this.generateStructuredOutput(
        config.primaryModel,
        config.schema,
        params,
      );

      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          this.extractModelName(config.primaryModel),
          response.usage,
          false,
        ),
        usedFallback: false,
      };
    } catch (primaryError) {
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      const response = await this.generateStructuredOutput(
        config.fallbackModel,
        config.schema,
        params,
      );

      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          this.extractModelName(config.fallbackModel),
          response.usage,
          true,
        ),
        usedFallback: true,
      };
    }
  }
}
