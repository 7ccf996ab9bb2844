import type { MathMlVersion, OperationKind } from '@tagsense/model';

/**
 * Configuration constants for EnrichmentOrchestrator
 */
export const ENRICHMENT = {
  /**
   * Maximum number of groups processed at the same time
   */
  DEFAULT_CONCURRENCY: 10,

  /**
   * Number of sibling tags sent as context around each target
   */
  DEFAULT_SURROUNDING_TAGS: 4,

  /**
   * Render scale for target regions (1 = 72 DPI)
   */
  DEFAULT_ZOOM: 2,

  /**
   * Retry count per model for each request
   */
  DEFAULT_MAX_RETRIES: 2,
} as const;

/**
 * Configuration constants for PromptAssembler
 */
export const PROMPT = {
  /**
   * Soft limit on the characters spent on surrounding context
   */
  MAX_PROMPT_LENGTH: 4000,
} as const;

/**
 * Tag pattern used when none is given
 */
export const DEFAULT_TAG_PATTERNS: Record<OperationKind, string> = {
  'alt-text': 'Figure|Formula',
  'table-summary': 'Table',
  mathml: 'Formula',
};

/**
 * Output token budget per operation for rendered-image requests
 */
export const MAX_OUTPUT_TOKENS: Record<OperationKind, number> = {
  'alt-text': 300,
  'table-summary': 600,
  mathml: 2000,
};

/**
 * Output token budget for XML requests, where markup inflates the count
 */
export const XML_MAX_OUTPUT_TOKENS = 2000;

export const MATHML_VERSIONS = [
  'mathml-1',
  'mathml-2',
  'mathml-3',
  'mathml-4',
] as const satisfies readonly MathMlVersion[];

export const MATHML = {
  NAMESPACE: 'http://www.w3.org/1998/Math/MathML',
  MIME_TYPE: 'application/mathml+xml',
  RELATIONSHIP: 'Supplement',
  DEFAULT_VERSION: 'mathml-4',
} as const;

/**
 * Image inputs accepted by FragmentProcessor, keyed by extension
 */
export const IMAGE_MEDIA_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};
