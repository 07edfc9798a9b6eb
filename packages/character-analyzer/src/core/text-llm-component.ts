import type { ExtendedTokenUsage } from '@storycast/shared';
import type { z } from 'zod';

import { LLMCaller } from '@storycast/shared';

import { BaseLLMComponent } from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for components that prompt with text only
 *
 * Subclasses: LlmCharacterExtractor
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  /**
   * Call the LLM through LLMCaller.call() and track the usage
   *
   * @param phase - Phase name for tracking (e.g., 'extraction')
   * @param maxOutputTokens - Upper bound on the response length
   */
  protected async callTextLLM<TOutput>(
    schema: z.ZodType<TOutput>,
    systemPrompt: string,
    userPrompt: string,
    phase: string,
    maxOutputTokens?: number,
  ): Promise<{ output: TOutput; usage: ExtendedTokenUsage }> {
    const result = await LLMCaller.call({
      schema,
      systemPrompt,
      userPrompt,
      primaryModel: this.model,
      fallbackModel: this.options.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      maxOutputTokens,
      abortSignal: this.options.abortSignal,
      component: this.componentName,
      phase,
    });

    this.trackUsage(result.usage);

    return { output: result.output, usage: result.usage };
  }
}
