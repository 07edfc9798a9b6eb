import type { ExtractedCharacterData } from '@storycast/model';

import type { PassTokenBudget } from '../budget';

/**
 * Turns one batch of text into the characters it mentions
 *
 * A rejected promise marks the batch as failed; the orchestrator records
 * the failure and moves on to the next batch.
 */
export interface ExtractionEngine {
  analyze(
    batchText: string,
    batchIndex: number,
    totalBatches: number,
    budget: PassTokenBudget,
  ): Promise<ExtractedCharacterData[]>;
}
