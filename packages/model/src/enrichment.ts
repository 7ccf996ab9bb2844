import type { StructureNode, StructureNodeId } from './structure-node';

/**
 * Kind of text generated for a target element
 */
export type OperationKind = 'alt-text' | 'table-summary' | 'mathml';

export type MathMlVersion = 'mathml-1' | 'mathml-2' | 'mathml-3' | 'mathml-4';

/**
 * How the MathML operation treats elements that already carry MathML
 *
 * - `always`: regenerate and append another associated file
 * - `respect-overwrite`: skip unless overwrite is set
 */
export type MathMlExistingPolicy = 'always' | 'respect-overwrite';

/**
 * Window of sibling elements around one enrichment target
 */
export interface TagGroup {
  readonly tags: readonly StructureNode[];

  /**
   * Position of the target inside `tags`
   */
  readonly targetIndex: number;
}

/**
 * Settings shared by every task of one run
 */
export interface EnrichmentRequest {
  operation: OperationKind;
  language: string;
  mathMlVersion: MathMlVersion;
  overwrite: boolean;
  mathMlExisting: MathMlExistingPolicy;

  /**
   * Template file path or inline template text (empty: built-in template)
   */
  promptSource: string;
}

export type TagOutcomeStatus = 'done' | 'skipped' | 'failed';

/**
 * Why a target was skipped
 */
export type SkipReason =
  | 'duplicate'
  | 'no-page'
  | 'no-bbox'
  | 'existing-content'
  | 'empty-response';

export interface TagOutcome {
  id: StructureNodeId;
  rawType: string;
  page: number | null;
  status: TagOutcomeStatus;
  reason?: SkipReason;
  error?: string;
}

export interface RunReport {
  total: number;
  done: number;
  skipped: number;
  failed: number;
  outcomes: TagOutcome[];
}
