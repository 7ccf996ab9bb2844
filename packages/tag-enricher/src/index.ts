export {
  EnrichmentOrchestrator,
  type EnrichmentOrchestratorOptions,
} from './core/enrichment-orchestrator';
export type { BaseLLMComponentOptions } from './core/base-llm-component';
export {
  FragmentProcessor,
  resolveInputMode,
  type FragmentInputMode,
  type InputMode,
} from './processors/fragment-processor';
export { buildTagGroup, buildTagGroups } from './grouping/tag-group-builder';
export { compileTagPattern, matchesTag } from './grouping/tag-matcher';
export { extractContext } from './extractors/context-extractor';
export { PromptAssembler } from './prompts/prompt-assembler';
export {
  MUTATION_POLICIES,
  buildMathMlDocument,
  type MutationPolicy,
} from './mutations/mutation-policy';
export {
  DEFAULT_TAG_PATTERNS,
  ENRICHMENT,
  MATHML,
  MATHML_VERSIONS,
} from './config/constants';
export {
  ImageReadError,
  TagEnricherError,
  TagPatternError,
  UnknownOperationError,
  UnsupportedInputError,
} from './errors/tag-enricher-error';
