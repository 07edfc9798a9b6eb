import { TOKEN_BUDGET } from '../config/constants';
import { ConfigurationError } from '../errors';

/**
 * Token split for one engine call
 */
export interface PassTokenBudgetParts {
  /** Tokens reserved for system and instruction text */
  promptTokens: number;
  /** Tokens available for the source text */
  inputTokens: number;
  /** Tokens reserved for the engine's response */
  outputTokens: number;
}

/**
 * A validated prompt/input/output token split.
 *
 * Every part is a non-negative integer and the parts never sum past
 * `TOKEN_BUDGET.TOTAL_TOKENS`.
 *
 * @throws ConfigurationError when constructed with an invalid split
 */
export class PassTokenBudget implements PassTokenBudgetParts {
  readonly promptTokens: number;
  readonly inputTokens: number;
  readonly outputTokens: number;

  constructor(parts: PassTokenBudgetParts) {
    for (const key of ['promptTokens', 'inputTokens', 'outputTokens'] as const) {
      const value = parts[key];
      if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(
          `Invalid token budget: ${key} must be a non-negative integer, got ${value}`,
        );
      }
    }

    const total = parts.promptTokens + parts.inputTokens + parts.outputTokens;
    if (total > TOKEN_BUDGET.TOTAL_TOKENS) {
      throw new ConfigurationError(
        `Token budget exceeds ${TOKEN_BUDGET.TOTAL_TOKENS} tokens: ` +
          `${parts.promptTokens} + ${parts.inputTokens} + ${parts.outputTokens} = ${total}`,
      );
    }

    this.promptTokens = parts.promptTokens;
    this.inputTokens = parts.inputTokens;
    this.outputTokens = parts.outputTokens;
  }

  get totalTokens(): number {
    return this.promptTokens + this.inputTokens + this.outputTokens;
  }

  get inputChars(): number {
    return this.inputTokens * TOKEN_BUDGET.CHARS_PER_TOKEN;
  }

  get outputChars(): number {
    return this.outputTokens * TOKEN_BUDGET.CHARS_PER_TOKEN;
  }
}

/**
 * Budgets for each extraction pass
 */
export const PASS_BUDGETS = {
  characterExtraction: new PassTokenBudget({
    promptTokens: 200,
    inputTokens: 3300,
    outputTokens: 100,
  }),
  dialogExtraction: new PassTokenBudget({
    promptTokens: 300,
    inputTokens: 1500,
    outputTokens: 2200,
  }),
  voiceProfile: new PassTokenBudget({
    promptTokens: 400,
    inputTokens: 2100,
    outputTokens: 1500,
  }),
  /** Single-call extraction of names, dialogs, traits and voice per batch */
  batchedAnalysis: new PassTokenBudget({
    promptTokens: 300,
    inputTokens: 2700,
    outputTokens: 1000,
  }),
} as const;

export type PassBudgetName = keyof typeof PASS_BUDGETS;
