import type { PassTokenBudget } from './pass-token-budget';

import { TOKEN_BUDGET } from '../config/constants';

const SENTENCE_END = new Set(['.', '!', '?']);
const CLOSING_QUOTES = new Set(['"', "'", '\u201D', '\u2019']);

/**
 * TokenBudgetManager - heuristic token accounting and input truncation
 */
export class TokenBudgetManager {
  /**
   * Heuristic token count: one token per `CHARS_PER_TOKEN` characters,
   * rounded up
   */
  static estimateTokens(text: string): number {
    if (text.length === 0) return 0;
    return Math.ceil(text.length / TOKEN_BUDGET.CHARS_PER_TOKEN);
  }

  static fitsWithinTokens(text: string, tokenLimit: number): boolean {
    return this.estimateTokens(text) <= tokenLimit;
  }

  /**
   * Fit text into a budget's input allowance.
   *
   * Oversized text is cut at the last blank line within the limit, else just
   * after the last sentence end (and any closing quote), else at the limit.
   */
  static prepareInputText(text: string, budget: PassTokenBudget): string {
    const limit = budget.inputChars;
    if (this.estimateTokens(text) * TOKEN_BUDGET.CHARS_PER_TOKEN <= limit) {
      return text;
    }

    const window = text.slice(0, limit);

    const paragraphEnd = window.lastIndexOf('\n\n');
    if (paragraphEnd > 0) {
      return window.slice(0, paragraphEnd);
    }

    const sentenceEnd = this.findLastSentenceEnd(window);
    if (sentenceEnd > 0) {
      return window.slice(0, sentenceEnd);
    }

    return window;
  }

  // Index just past the last sentence terminator, or 0 when there is none
  private static findLastSentenceEnd(window: string): number {
    for (let i = window.length - 1; i >= 0; i--) {
      if (SENTENCE_END.has(window[i])) {
        const end = i + 1;
        return end < window.length && CLOSING_QUOTES.has(window[end])
          ? end + 1
          : end;
      }
    }
    return 0;
  }
}
