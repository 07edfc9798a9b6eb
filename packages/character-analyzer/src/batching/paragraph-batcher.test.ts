import type { ParagraphBatch } from '@storycast/model';

import { describe, expect, test } from 'vitest';

import { ConfigurationError } from '../errors';
import { ParagraphBatcher } from './paragraph-batcher';

// 18 characters = 5 tokens; two joined = 38 characters = 10 tokens
const p = 'p'.repeat(18);

function ranges(batches: ParagraphBatch[]): Array<[number, number]> {
  return batches.map((b) => [b.startParagraphIndex, b.endParagraphIndex]);
}

describe('ParagraphBatcher', () => {
  describe('createBatches', () => {
    test('empty input yields no batches', () => {
      expect(ParagraphBatcher.createBatches([], 100)).toEqual([]);
    });

    test('gives every oversized paragraph its own batch', () => {
      const paragraphs = Array.from({ length: 10 }, () => 'x'.repeat(100));

      const batches = ParagraphBatcher.createBatches(paragraphs, 12);

      expect(batches).toHaveLength(10);
      batches.forEach((batch, i) => {
        expect(batch.batchIndex).toBe(i);
        expect(batch.startParagraphIndex).toBe(i);
        expect(batch.endParagraphIndex).toBe(i);
        expect(batch.paragraphCount).toBe(1);
        expect(batch.estimatedTokens).toBe(25);
      });
    });

    test('packs paragraphs while the joined text fits', () => {
      const batches = ParagraphBatcher.createBatches([p, p, p, p, p], 10);

      expect(ranges(batches)).toEqual([
        [0, 1],
        [2, 3],
        [4, 4],
      ]);
      expect(batches[0]).toEqual({
        batchIndex: 0,
        startParagraphIndex: 0,
        endParagraphIndex: 1,
        text: `${p}\n\n${p}`,
        paragraphCount: 2,
        estimatedTokens: 10,
      });
      expect(batches[2].estimatedTokens).toBe(5);
    });

    test('isolates an oversized paragraph between small ones', () => {
      const paragraphs = ['short paragraph', 'L'.repeat(100), 'short paragraph'];

      const batches = ParagraphBatcher.createBatches(paragraphs, 10);

      expect(ranges(batches)).toEqual([
        [0, 0],
        [1, 1],
        [2, 2],
      ]);
    });

    test('batches are contiguous and cover every paragraph in order', () => {
      const paragraphs = Array.from(
        { length: 23 },
        (_, i) => `Paragraph ${i} ${'w'.repeat((i * 7) % 40)}`,
      );

      const batches = ParagraphBatcher.createBatches(paragraphs, 20);

      expect(batches[0].startParagraphIndex).toBe(0);
      expect(batches[batches.length - 1].endParagraphIndex).toBe(22);
      for (let i = 1; i < batches.length; i++) {
        expect(batches[i].startParagraphIndex).toBe(
          batches[i - 1].endParagraphIndex + 1,
        );
      }
      expect(batches.map((b) => b.text).join('\n\n')).toBe(
        paragraphs.join('\n\n'),
      );
    });

    test('rejects a non-positive token limit', () => {
      expect(() => ParagraphBatcher.createBatches([p], 0)).toThrow(
        ConfigurationError,
      );
    });
  });

  describe('createBatchesFromIndex', () => {
    test('keeps global paragraph indices', () => {
      const batches = ParagraphBatcher.createBatchesFromIndex(
        [p, p, p, p, p],
        10,
        3,
      );

      expect(ranges(batches)).toEqual([[3, 4]]);
      expect(batches[0].batchIndex).toBe(0);
    });

    test('numbers batches from the given first index', () => {
      const batches = ParagraphBatcher.createBatchesFromIndex(
        [p, p, p, p, p],
        10,
        2,
        1,
      );

      expect(batches.map((b) => b.batchIndex)).toEqual([1, 2]);
      expect(ranges(batches)).toEqual([
        [2, 3],
        [4, 4],
      ]);
    });

    test('matches createBatches from index zero', () => {
      const paragraphs = [p, 'q'.repeat(30), p, p];

      expect(ParagraphBatcher.createBatchesFromIndex(paragraphs, 10, 0)).toEqual(
        ParagraphBatcher.createBatches(paragraphs, 10),
      );
    });

    test('returns nothing for an out-of-range start', () => {
      const paragraphs = [p, p];

      expect(ParagraphBatcher.createBatchesFromIndex(paragraphs, 10, -1)).toEqual(
        [],
      );
      expect(ParagraphBatcher.createBatchesFromIndex(paragraphs, 10, 2)).toEqual(
        [],
      );
      expect(
        ParagraphBatcher.createBatchesFromIndex(paragraphs, 10, 0.5),
      ).toEqual([]);
    });
  });

  describe('estimateBatchCount', () => {
    test('is zero for empty input', () => {
      expect(ParagraphBatcher.estimateBatchCount([], 10)).toBe(0);
    });

    test('is at least one for non-empty input', () => {
      expect(ParagraphBatcher.estimateBatchCount(['abc'], 100)).toBe(1);
    });

    test('divides estimated tokens by the limit, rounding up', () => {
      // 5 * 18 + 4 * 2 = 98 characters = 25 tokens
      expect(ParagraphBatcher.estimateBatchCount([p, p, p, p, p], 10)).toBe(3);
    });
  });
});
