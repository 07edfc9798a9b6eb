import type { ParagraphBatch } from '@storycast/model';

import { TokenBudgetManager } from '../budget';
import { NORMALIZER } from '../config/constants';
import { ConfigurationError } from '../errors';

/**
 * ParagraphBatcher - packs paragraphs into contiguous token-bounded batches
 *
 * Paragraphs are never split. A paragraph larger than the budget becomes a
 * batch of its own.
 */
export class ParagraphBatcher {
  /**
   * Greedily pack paragraphs, adding the next one while the joined batch text
   * stays within `maxInputTokens`
   */
  static createBatches(
    paragraphs: readonly string[],
    maxInputTokens: number,
  ): ParagraphBatch[] {
    this.assertTokenLimit(maxInputTokens);
    return this.pack(paragraphs, maxInputTokens, 0, 0);
  }

  /**
   * Pack paragraphs from `startIndex` onward. Paragraph indices stay global;
   * batch indices start at `firstBatchIndex`.
   *
   * @returns an empty list when `startIndex` is outside the paragraphs
   */
  static createBatchesFromIndex(
    paragraphs: readonly string[],
    maxInputTokens: number,
    startIndex: number,
    firstBatchIndex = 0,
  ): ParagraphBatch[] {
    this.assertTokenLimit(maxInputTokens);
    if (
      !Number.isInteger(startIndex) ||
      startIndex < 0 ||
      startIndex >= paragraphs.length
    ) {
      return [];
    }
    return this.pack(paragraphs, maxInputTokens, startIndex, firstBatchIndex);
  }

  /**
   * Quick batch count for progress reporting before packing
   */
  static estimateBatchCount(
    paragraphs: readonly string[],
    maxInputTokens: number,
  ): number {
    this.assertTokenLimit(maxInputTokens);
    if (paragraphs.length === 0) return 0;

    const totalTokens = TokenBudgetManager.estimateTokens(
      paragraphs.join(NORMALIZER.PARAGRAPH_SEPARATOR),
    );
    return Math.max(1, Math.ceil(totalTokens / maxInputTokens));
  }

  private static pack(
    paragraphs: readonly string[],
    maxInputTokens: number,
    startIndex: number,
    firstBatchIndex: number,
  ): ParagraphBatch[] {
    const batches: ParagraphBatch[] = [];
    let batchStart = startIndex;
    let batchText = '';

    const closeBatch = (endIndex: number) => {
      batches.push({
        batchIndex: firstBatchIndex + batches.length,
        startParagraphIndex: batchStart,
        endParagraphIndex: endIndex,
        text: batchText,
        paragraphCount: endIndex - batchStart + 1,
        estimatedTokens: TokenBudgetManager.estimateTokens(batchText),
      });
    };

    for (let i = startIndex; i < paragraphs.length; i++) {
      const paragraph = paragraphs[i];

      if (i === batchStart) {
        batchText = paragraph;
        continue;
      }

      const candidate = batchText + NORMALIZER.PARAGRAPH_SEPARATOR + paragraph;
      if (TokenBudgetManager.fitsWithinTokens(candidate, maxInputTokens)) {
        batchText = candidate;
      } else {
        closeBatch(i - 1);
        batchStart = i;
        batchText = paragraph;
      }
    }

    if (batchStart < paragraphs.length) {
      closeBatch(paragraphs.length - 1);
    }

    return batches;
  }

  private static assertTokenLimit(maxInputTokens: number): void {
    if (!Number.isInteger(maxInputTokens) || maxInputTokens < 1) {
      throw new ConfigurationError(
        `maxInputTokens must be a positive integer, got ${maxInputTokens}`,
      );
    }
  }
}
