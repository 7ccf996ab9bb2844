import type { ImagePart, LanguageModel, TextPart } from 'ai';

import { APICallError, RetryError, generateText } from 'ai';

import { LLMAuthenticationError } from '../errors/llm-authentication-error';

/**
 * HTTP status codes that mean the credentials were refused
 */
const AUTH_STATUS_CODES: ReadonlySet<number> = new Set([401, 403]);

/**
 * Image sent alongside the prompt
 */
export interface LLMImageInput {
  /**
   * Raw image bytes
   */
  data: Uint8Array;

  /**
   * MIME type of the image (e.g. 'image/jpeg')
   */
  mediaType: string;
}

/**
 * Configuration for a single text completion with retry and fallback support
 */
export interface LLMCompletionConfig {
  /**
   * Instruction text sent as the first message part
   */
  prompt: string;

  /**
   * Optional image attached after the instruction
   */
  image?: LLMImageInput;

  /**
   * Extra text parts appended after the instruction (e.g. a fenced XML body)
   */
  attachments?: string[];

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model for retry after primary model exhausts maxRetries (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model
   */
  maxRetries: number;

  /**
   * Upper bound on generated tokens (optional)
   */
  maxOutputTokens?: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'EnrichmentOrchestrator')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'alt-text', 'mathml')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface CompletionResponse {
  text: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
}

/**
 * LLMCaller - Centralized LLM API caller with retry and fallback support
 *
 * Wraps AI SDK's generateText:
 * 1. Try primary model with maxRetries
 * 2. If all attempts fail and fallbackModel provided, try fallback with maxRetries
 * 3. Return usage data with model type indicator
 *
 * Credential failures are never retried on the fallback model; they surface
 * as LLMAuthenticationError.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.complete({
 *   prompt: 'Describe this figure in en.',
 *   image: { data: jpegBytes, mediaType: 'image/jpeg' },
 *   primaryModel: openai('gpt-4o-mini'),
 *   maxRetries: 2,
 *   maxOutputTokens: 300,
 *   component: 'EnrichmentOrchestrator',
 *   phase: 'alt-text',
 * });
 *
 * console.log(result.output); // "A bar chart comparing ..."
 * ```
 */
export class LLMCaller {
  /**
   * Extract model name from LanguageModel value
   */
  private static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  /**
   * Build usage information from response
   */
  private static buildUsage(
    config: LLMCompletionConfig,
    modelName: string,
    response: CompletionResponse,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
      totalTokens: response.usage?.totalTokens ?? 0,
    };
  }

  /**
   * Status code of a provider error that refused the credentials, if any.
   *
   * Looks through RetryError wrappers at the last underlying error.
   */
  static authenticationStatus(error: unknown): number | undefined {
    if (RetryError.isInstance(error)) {
      return LLMCaller.authenticationStatus(error.lastError);
    }
    if (
      APICallError.isInstance(error) &&
      error.statusCode !== undefined &&
      AUTH_STATUS_CODES.has(error.statusCode)
    ) {
      return error.statusCode;
    }
    return undefined;
  }

  private static buildContent(
    config: LLMCompletionConfig,
  ): Array<TextPart | ImagePart> {
    const content: Array<TextPart | ImagePart> = [
      { type: 'text', text: config.prompt },
    ];

    for (const attachment of config.attachments ?? []) {
      content.push({ type: 'text', text: attachment });
    }

    if (config.image) {
      const base64 = Buffer.from(config.image.data).toString('base64');
      content.push({
        type: 'image',
        image: `data:${config.image.mediaType};base64,${base64}`,
      });
    }

    return content;
  }

  private static async generate(
    model: LanguageModel,
    config: LLMCompletionConfig,
  ): Promise<CompletionResponse> {
    try {
      return await generateText({
        model,
        messages: [{ role: 'user', content: this.buildContent(config) }],
        maxOutputTokens: config.maxOutputTokens,
        temperature: config.temperature,
        maxRetries: config.maxRetries,
        abortSignal: config.abortSignal,
      });
    } catch (error) {
      const statusCode = this.authenticationStatus(error);
      if (statusCode !== undefined) {
        throw LLMAuthenticationError.fromError(
          `[${config.component}] Model provider rejected the API key`,
          error,
          statusCode,
        );
      }
      throw error;
    }
  }

  /**
   * Request a plain-text completion
   *
   * @returns Result with the generated text (trimmed) and usage information
   * @throws LLMAuthenticationError when the provider refuses the credentials
   * @throws Error if all retry attempts fail
   */
  static async complete(
    config: LLMCompletionConfig,
  ): Promise<LLMCallResult<string>> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    // Attempt 1: Try primary model
    try {
      const response = await this.generate(config.primaryModel, config);

      return {
        output: response.text.trim(),
        usage: this.buildUsage(config, primaryModelName, response, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      if (
        primaryError instanceof LLMAuthenticationError ||
        config.abortSignal?.aborted ||
        !config.fallbackModel
      ) {
        throw primaryError;
      }

      // Attempt 2: Try fallback model
      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await this.generate(config.fallbackModel, config);

      return {
        output: response.text.trim(),
        usage: this.buildUsage(config, fallbackModelName, response, true),
        usedFallback: true,
      };
    }
  }
}
