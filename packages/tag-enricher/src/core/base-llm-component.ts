import type { LoggerMethods } from '@tagsense/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@tagsense/shared';
import type { LanguageModel } from 'ai';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Maximum retry count for LLM API (default: 2)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: provider default)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage tracking via optional aggregator
 * - Standard configuration (model, fallback, retries, temperature)
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly maxRetries: number;
  protected readonly temperature?: number;
  protected readonly componentName: string;
  protected readonly aggregator?: LLMTokenUsageAggregator;
  protected readonly abortSignal?: AbortSignal;

  /**
   * @param componentName - Name of the component for logging (e.g., "EnrichmentOrchestrator")
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.maxRetries = options?.maxRetries ?? 2;
    this.temperature = options?.temperature;
    this.fallbackModel = fallbackModel;
    this.aggregator = aggregator;
    this.abortSignal = options?.abortSignal;
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Track token usage to aggregator if available
   */
  protected trackUsage(usage: ExtendedTokenUsage): void {
    if (this.aggregator) {
      this.aggregator.track(usage);
    }
  }
}
