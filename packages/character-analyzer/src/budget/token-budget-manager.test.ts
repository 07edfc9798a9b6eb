import { describe, expect, test } from 'vitest';

import { PassTokenBudget } from './pass-token-budget';
import { TokenBudgetManager } from './token-budget-manager';

// 5 input tokens = 20 characters
const smallBudget = new PassTokenBudget({
  promptTokens: 0,
  inputTokens: 5,
  outputTokens: 0,
});

describe('TokenBudgetManager', () => {
  describe('estimateTokens', () => {
    test('uses four characters per token', () => {
      expect(TokenBudgetManager.estimateTokens('A'.repeat(100))).toBe(25);
    });

    test('rounds partial tokens up', () => {
      expect(TokenBudgetManager.estimateTokens('abc')).toBe(1);
      expect(TokenBudgetManager.estimateTokens('abcde')).toBe(2);
    });

    test('empty text has no tokens', () => {
      expect(TokenBudgetManager.estimateTokens('')).toBe(0);
    });
  });

  describe('fitsWithinTokens', () => {
    test('compares the estimate to the limit', () => {
      expect(TokenBudgetManager.fitsWithinTokens('abcde', 2)).toBe(true);
      expect(TokenBudgetManager.fitsWithinTokens('abcde', 1)).toBe(false);
    });
  });

  describe('prepareInputText', () => {
    test('returns text that fits unchanged', () => {
      expect(TokenBudgetManager.prepareInputText('short text', smallBudget)).toBe(
        'short text',
      );
      const exact = 'x'.repeat(20);
      expect(TokenBudgetManager.prepareInputText(exact, smallBudget)).toBe(
        exact,
      );
    });

    test('cuts at the last paragraph break within the limit', () => {
      expect(
        TokenBudgetManager.prepareInputText(
          'First para.\n\nSecond paragraph is long',
          smallBudget,
        ),
      ).toBe('First para.');
    });

    test('falls back to the last sentence end', () => {
      expect(
        TokenBudgetManager.prepareInputText(
          'One. Two! Three and more words here',
          smallBudget,
        ),
      ).toBe('One. Two!');
    });

    test('keeps a closing quote after the sentence end', () => {
      expect(
        TokenBudgetManager.prepareInputText(
          '"Stop!" he said and kept walking on',
          smallBudget,
        ),
      ).toBe('"Stop!"');
    });

    test('hard cuts text without boundaries', () => {
      expect(
        TokenBudgetManager.prepareInputText(
          'abcdefghijklmnopqrstuvwxyz',
          smallBudget,
        ),
      ).toBe('abcdefghijklmnopqrst');
    });

    test('never exceeds the input allowance', () => {
      const samples = [
        '\n\nabcdefghijklmnopqrstuvwxyz',
        'word '.repeat(30),
        'Sentence one. Sentence two. Sentence three.',
        'Para one.\n\nPara two.\n\nPara three is here.',
      ];

      for (const sample of samples) {
        expect(
          TokenBudgetManager.prepareInputText(sample, smallBudget).length,
        ).toBeLessThanOrEqual(20);
      }
    });

    test('returns empty text for a zero input allowance', () => {
      const none = new PassTokenBudget({
        promptTokens: 100,
        inputTokens: 0,
        outputTokens: 100,
      });

      expect(TokenBudgetManager.prepareInputText('abc', none)).toBe('');
    });
  });
});
