import type { LoggerMethods } from '@storycast/logger';
import type { ExtractedCharacterData, VoiceProfile } from '@storycast/model';
import type { LanguageModel } from 'ai';

import type { PassTokenBudget } from '../budget';
import type { BaseLLMComponentOptions } from '../core';
import type { CharacterExtractionResponse } from '../types';
import type { ExtractionEngine } from './extraction-engine';

import { TokenBudgetManager } from '../budget';
import { TextLLMComponent } from '../core';
import { EngineError } from '../errors';
import { CharacterExtractionResponseSchema } from '../types';

type ResponseVoice = CharacterExtractionResponse['characters'][number]['voice'];

/**
 * LlmCharacterExtractor
 *
 * Extraction engine backed by a language model. Each batch is trimmed to the
 * budget's input size, sent with a structured-output schema, and the
 * response is mapped onto extracted character records.
 */
export class LlmCharacterExtractor
  extends TextLLMComponent
  implements ExtractionEngine
{
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: BaseLLMComponentOptions,
  ) {
    super(logger, model, 'CharacterExtractor', options);
  }

  /**
   * @throws {EngineError} When the call fails or the response does not parse
   */
  async analyze(
    batchText: string,
    batchIndex: number,
    totalBatches: number,
    budget: PassTokenBudget,
  ): Promise<ExtractedCharacterData[]> {
    const input = TokenBudgetManager.prepareInputText(batchText, budget);
    if (input.length < batchText.length) {
      this.log(
        'warn',
        `Batch ${batchIndex + 1}/${totalBatches}: input truncated from ${batchText.length} to ${input.length} chars`,
      );
    }

    this.log(
      'debug',
      `Batch ${batchIndex + 1}/${totalBatches}: sending ${input.length} chars`,
    );

    try {
      const { output } = await this.callTextLLM(
        CharacterExtractionResponseSchema,
        this.buildSystemPrompt(),
        this.buildUserPrompt(input),
        'extraction',
        budget.outputTokens,
      );

      const characters = output.characters.map((character) => ({
        name: character.name,
        dialogs: character.dialogs,
        traits: character.traits,
        voiceProfile: this.toVoiceProfile(character.voice),
      }));

      this.log(
        'info',
        `Batch ${batchIndex + 1}/${totalBatches}: extracted ${characters.length} character(s)`,
      );
      return characters;
    } catch (error) {
      const wrapped = EngineError.fromError(
        `Character extraction failed for batch ${batchIndex + 1}/${totalBatches}`,
        error,
        batchIndex,
      );
      this.log('error', wrapped.message);
      throw wrapped;
    }
  }

  protected buildSystemPrompt(): string {
    return `You are a character extraction engine for fiction. Extract only characters who speak quoted dialog. Ignore locations, objects, creatures and anyone who does not speak.`;
  }

  protected buildUserPrompt(text: string): string {
    return `Extract every speaking character from the story text below, with their dialogs, traits and inferred voice.

## Rules

1. Only include characters who have at least one quoted line.
2. List each character exactly once, under the name the text uses most.
3. Dialogs are the exact quoted lines, in the order they appear.
4. Traits are short physical or personality descriptors.
5. Voice is the apparent gender, age group and accent; use null when the text gives no hint.
6. Read the entire text before answering.

## Text

${text}`;
  }

  private toVoiceProfile(voice: ResponseVoice): VoiceProfile | undefined {
    if (!voice) return undefined;
    return { gender: voice.gender, age: voice.age, accent: voice.accent };
  }
}
