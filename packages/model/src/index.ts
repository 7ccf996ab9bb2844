export type {
  AssociatedFileInfo,
  AssociatedFileSpec,
  AttributeEntry,
  BoundingBox,
  StructureChild,
  StructureNode,
  StructureNodeId,
} from './structure-node';
export type {
  EnrichmentRequest,
  MathMlExistingPolicy,
  MathMlVersion,
  OperationKind,
  RunReport,
  SkipReason,
  TagGroup,
  TagOutcome,
  TagOutcomeStatus,
} from './enrichment';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
export type { RegionRenderer, RenderedImage } from './region-renderer';
