import type { LoggerMethods } from '@tagsense/logger';
import type {
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@tagsense/model';

import type { ExtendedTokenUsage } from './llm-caller';

/**
 * Token usage totals
 */
export type TokenUsage = TokenUsageSummary;

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

interface ComponentAggregate {
  component: string;
  phases: Map<string, PhaseUsageReport>;
  total: TokenUsage;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls
 *
 * Collects usage from every call of a run and reports it grouped by
 * component, phase and model (primary vs fallback). Concurrent tasks may
 * call `track` in any order; totals do not depend on it.
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track(result.usage);
 *
 * aggregator.logSummary(logger);
 * // [TokenUsage] EnrichmentOrchestrator:
 * // [TokenUsage]   - alt-text (3 calls, primary: gpt-4o-mini): 1500 input, 90 output, 1590 total
 * // [TokenUsage] Grand total: 1500 input, 90 output, 1590 total
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
      phase = { phase: usage.phase, calls: 0, total: emptyUsage() };
      component.phases.set(usage.phase, phase);
    }

    const existing = phase[usage.model];
    const detail: ModelUsageDetail = existing ?? {
      modelName: usage.modelName,
      ...emptyUsage(),
    };
    addUsage(detail, usage);
    phase[usage.model] = detail;

    phase.calls += 1;
    addUsage(phase.total, usage);
    addUsage(component.total, usage);
  }

  /**
   * Get token usage report in structured JSON format
   *
   * Returns copies; later `track` calls do not change a returned report.
   */
  getReport(): TokenUsageReport {
    const components = [...this.usage.values()].map((component) => ({
      component: component.component,
      phases: [...component.phases.values()].map((phase) => ({
        ...phase,
        primary: phase.primary ? { ...phase.primary } : undefined,
        fallback: phase.fallback ? { ...phase.fallback } : undefined,
        total: { ...phase.total },
      })),
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
   * Log token usage summary grouped by component and phase
   */
  logSummary(logger: LoggerMethods): void {
    if (this.usage.size === 0) {
      logger.info('[TokenUsage] No token usage to report');
      return;
    }

    for (const component of this.usage.values()) {
      logger.info(`[TokenUsage] ${component.component}:`);

      for (const phase of component.phases.values()) {
        const models = [
          phase.primary && `primary: ${phase.primary.modelName}`,
          phase.fallback && `fallback: ${phase.fallback.modelName}`,
        ]
          .filter(Boolean)
          .join(', ');
        logger.info(
          `[TokenUsage]   - ${phase.phase} (${phase.calls} calls, ${models}): ${formatTokens(phase.total)}`,
        );
      }
    }

    logger.info(`[TokenUsage] Grand total: ${formatTokens(this.getTotalUsage())}`);
  }

  /**
   * Reset all tracked usage
   */
  reset(): void {
    this.usage.clear();
  }
}
