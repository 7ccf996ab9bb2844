import type { LanguageModel } from 'ai';

import { createOpenAI } from '@ai-sdk/openai';

import { OptionsError } from '../errors/cli-error';

const OPENAI_PREFIX = 'openai/';

/**
 * Converts a model ID to an OpenAI LanguageModel instance
 *
 * Model ID format: "model-name" or "openai/model-name"
 * Examples:
 *   - "gpt-4o-mini"
 *   - "openai/gpt-4.1"
 *
 * @throws OptionsError when the ID names another provider
 */
export function createModel(apiKey: string, modelId: string): LanguageModel {
  const modelName = modelId.startsWith(OPENAI_PREFIX)
    ? modelId.slice(OPENAI_PREFIX.length)
    : modelId;

  if (!modelName || modelName.includes('/')) {
    throw new OptionsError(`Unsupported model "${modelId}": only OpenAI models are available`);
  }

  return createOpenAI({ apiKey })(modelName);
}

export type ModelFactory = typeof createModel;
