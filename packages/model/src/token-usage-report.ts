/**
 * Token counts for one model or an aggregate
 */
export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Usage by one model within a phase
 */
export interface ModelUsageDetail extends TokenUsageSummary {
  modelName: string;
}

/**
 * Usage for one phase (one operation kind) of a component
 *
 * `primary` and `fallback` are present only when that model produced a
 * response.
 */
export interface PhaseUsageReport {
  phase: string;
  calls: number;
  primary?: ModelUsageDetail;
  fallback?: ModelUsageDetail;
  total: TokenUsageSummary;
}

export interface ComponentUsageReport {
  component: string;
  phases: PhaseUsageReport[];
  total: TokenUsageSummary;
}

/**
 * Token usage of one run, in the order components first reported usage
 */
export interface TokenUsageReport {
  components: ComponentUsageReport[];
  total: TokenUsageSummary;
}
