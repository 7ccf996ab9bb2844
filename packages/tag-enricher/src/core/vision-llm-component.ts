import type { LoggerMethods } from '@tagsense/logger';
import type { RenderedImage } from '@tagsense/model';
import type { LLMTokenUsageAggregator } from '@tagsense/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@tagsense/shared';

import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';

/**
 * Per-call overrides for a vision request
 */
export interface VisionCallOptions {
  image?: RenderedImage;
  attachments?: string[];
  maxOutputTokens?: number;
  temperature?: number;
}

/**
 * Abstract base class for vision-based LLM components
 *
 * Extends BaseLLMComponent with a helper that sends one prompt, optionally
 * with an image or extra text parts, through LLMCaller.complete() and
 * tracks the usage.
 *
 * Subclasses: EnrichmentOrchestrator, FragmentProcessor
 */
export abstract class VisionLLMComponent extends BaseLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, componentName, options, fallbackModel, aggregator);
  }

  /**
   * Request text for a prompt
   *
   * @param phase - Phase name for tracking (the operation kind)
   * @returns Generated text, trimmed
   */
  protected async callVisionLLM(
    prompt: string,
    phase: string,
    options: VisionCallOptions = {},
  ): Promise<string> {
    const result = await LLMCaller.complete({
      prompt,
      image: options.image,
      attachments: options.attachments,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      maxOutputTokens: options.maxOutputTokens,
      temperature: options.temperature ?? this.temperature,
      abortSignal: this.abortSignal,
      component: this.componentName,
      phase,
    });

    this.trackUsage(result.usage);

    if (result.usedFallback) {
      this.log('warn', `Primary model failed, answered by fallback model ${result.usage.modelName}`);
    }

    return result.output;
  }
}
