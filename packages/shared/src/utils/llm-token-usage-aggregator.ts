import type { LoggerMethods } from '@storycast/logger';
import type {
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@storycast/model';

import type { ExtendedTokenUsage } from './llm-caller';

/**
 * Token usage totals
 */
export type TokenUsage = TokenUsageSummary;

/**
 * Format token usage as "1500 input, 300 output, 1800 total"
 */
function formatTokens(usage: TokenUsage): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addUsage(target: TokenUsage, usage: TokenUsage): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

interface PhaseAggregate {
  primary?: ModelUsageDetail;
  fallback?: ModelUsageDetail;
  total: TokenUsage;
}

/**
 * Aggregated token usage for a specific component
 */
interface ComponentAggregate {
  component: string;
  phases: Map<string, PhaseAggregate>;
  total: TokenUsage;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls
 *
 * Collects usage from every LLM call of a session and reports it grouped by
 * component, phase and model (primary vs fallback).
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'CharacterExtractor',
 *   phase: 'extraction',
 *   model: 'primary',
 *   modelName: 'gpt-5-mini',
 *   inputTokens: 1500,
 *   outputTokens: 300,
 *   totalTokens: 1800,
 * });
 *
 * aggregator.logSummary(logger, 'CharacterAnalyzer');
 * ```
 */
export class LLMTokenUsageAggregator {
  private usage = new Map<string, ComponentAggregate>();

  /**
   * Track token usage from an LLM call
   */
  track(usage: ExtendedTokenUsage): void {
    let component = this.usage.get(usage.component);
    if (!component) {
      component = {
        component: usage.component,
        phases: new Map(),
        total: emptyUsage(),
      };
      this.usage.set(usage.component, component);
    }

    let phase = component.phases.get(usage.phase);
    if (!phase) {
      phase = { total: emptyUsage() };
      component.phases.set(usage.phase, phase);
    }

    const modelDetail = (phase[usage.model] ??= {
      modelName: usage.modelName,
      ...emptyUsage(),
    });

    addUsage(modelDetail, usage);
    addUsage(phase.total, usage);
    addUsage(component.total, usage);
  }

  /**
   * Structured report, components in first-tracked order
   */
  getReport(): TokenUsageReport {
    const components = Array.from(this.usage.values(), (component) => ({
      component: component.component,
      phases: Array.from(
        component.phases,
        ([phaseName, phaseData]): PhaseUsageReport => ({
          phase: phaseName,
          ...(phaseData.primary && { primary: { ...phaseData.primary } }),
          ...(phaseData.fallback && { fallback: { ...phaseData.fallback } }),
          total: { ...phaseData.total },
        }),
      ),
      total: { ...component.total },
    }));

    return { components, total: this.getTotalUsage() };
  }

  /**
   * Get total usage across all components and phases
   */
  getTotalUsage(): TokenUsage {
    const total = emptyUsage();
    for (const component of this.usage.values()) {
      addUsage(total, component.total);
    }
    return total;
  }

  /**
   * Log token usage grouped by component, with phase and model breakdown.
   * Call this once at the end of a session.
   *
   * @param prefix - Name of the owning component, used as the log prefix
   */
  logSummary(logger: LoggerMethods, prefix = 'CharacterAnalyzer'): void {
    if (this.usage.size === 0) {
      logger.info(`[${prefix}] No token usage to report`);
      return;
    }

    logger.info(`[${prefix}] Token usage summary:`);

    const primaryTotal = emptyUsage();
    const fallbackTotal = emptyUsage();

    for (const component of this.usage.values()) {
      logger.info(`${component.component}:`);

      for (const [phase, phaseData] of component.phases) {
        logger.info(`  - ${phase}:`);

        if (phaseData.primary) {
          logger.info(
            `      primary (${phaseData.primary.modelName}): ${formatTokens(phaseData.primary)}`,
          );
          addUsage(primaryTotal, phaseData.primary);
        }

        if (phaseData.fallback) {
          logger.info(
            `      fallback (${phaseData.fallback.modelName}): ${formatTokens(phaseData.fallback)}`,
          );
          addUsage(fallbackTotal, phaseData.fallback);
        }

        logger.info(`      subtotal: ${formatTokens(phaseData.total)}`);
      }

      logger.info(
        `  ${component.component} total: ${formatTokens(component.total)}`,
      );
    }

    logger.info('--- Summary ---');
    if (primaryTotal.totalTokens > 0) {
      logger.info(`Primary total: ${formatTokens(primaryTotal)}`);
    }
    if (fallbackTotal.totalTokens > 0) {
      logger.info(`Fallback total: ${formatTokens(fallbackTotal)}`);
    }
    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }

  /**
   * Reset all tracked usage
   */
  reset(): void {
    this.usage.clear();
  }
}
