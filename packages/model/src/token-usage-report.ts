/**
 * Token usage report types
 *
 * Structured breakdown of LLM token consumption for one analysis session,
 * grouped by component and phase, with primary and fallback model usage
 * reported separately.
 */

/**
 * Token usage report for an analysis session
 */
export interface TokenUsageReport {
  /**
   * Breakdown by component, in the order components first reported usage
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components and phases
   */
  total: TokenUsageSummary;
}

/**
 * Token usage for a specific component (e.g. 'CharacterExtractor')
 */
export interface ComponentUsageReport {
  component: string;
  phases: PhaseUsageReport[];
  total: TokenUsageSummary;
}

/**
 * Token usage for a specific phase (e.g. 'extraction')
 *
 * A phase may carry both primary and fallback usage when the primary model
 * failed on some calls and the fallback model answered them.
 */
export interface PhaseUsageReport {
  phase: string;

  /**
   * Usage by the primary model, present once a primary call succeeded
   */
  primary?: ModelUsageDetail;

  /**
   * Usage by the fallback model, present once a fallback call succeeded
   */
  fallback?: ModelUsageDetail;

  total: TokenUsageSummary;
}

/**
 * Usage for one model within a phase
 */
export interface ModelUsageDetail {
  /**
   * Model identifier (e.g. 'gpt-5-mini')
   */
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Summary of token usage
 */
export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}
