export { ConcurrentPool } from './utils/concurrent-pool';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallResult,
  type LLMCompletionConfig,
  type LLMImageInput,
} from './utils/llm-caller';
export {
  LLMTokenUsageAggregator,
  type TokenUsage,
} from './utils/llm-token-usage-aggregator';
export { LLMAuthenticationError } from './errors/llm-authentication-error';
