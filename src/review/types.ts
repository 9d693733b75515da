export const SEVERITIES = ["high", "medium", "low", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const FOCUS_AREAS = ["security", "bugs", "style", "performance"] as const;
export type FocusArea = (typeof FOCUS_AREAS)[number];

export type ReviewMode = "full" | "critical";

/** "llm" asks a provider; "rules" runs the local pattern checks only. */
export const ENGINES = ["llm", "rules"] as const;
export type ReviewEngine = (typeof ENGINES)[number];

export type ChangeKind = "added" | "modified" | "deleted" | "renamed";

export type ReviewSource =
  | { mode: "staged" }
  | { mode: "branch"; target: string }
  | { mode: "files"; patterns: readonly string[] };

export interface FileChange {
  readonly path: string;
  readonly kind: ChangeKind;
  readonly previousPath?: string;
  /** Unified-diff hunk text, starting at the first `@@` header. */
  readonly body: string;
  readonly truncated: boolean;
  readonly totalLines: number;
}

export interface ChangeSet {
  readonly source: ReviewSource["mode"];
  readonly baseRef: string;
  readonly targetRef: string;
  readonly files: readonly FileChange[];
  readonly warnings: readonly string[];
}

export interface ReviewConfig {
  readonly mode: ReviewMode;
  readonly focus: readonly FocusArea[];
  readonly styleGuide?: string;
  readonly maxFindings?: number;
}

export interface Finding {
  readonly severity: Severity;
  readonly file: string;
  readonly line?: number;
  readonly message: string;
  readonly suggestion?: string;
}

export type AnomalyKind =
  | "no_structured_block"
  | "truncated_response"
  | "response_too_large"
  | "invalid_envelope"
  | "invalid_finding"
  | "missing_file"
  | "missing_message"
  | "missing_severity"
  | "unknown_severity"
  | "invalid_line";

export interface ParsingAnomaly {
  readonly kind: AnomalyKind;
  readonly detail: string;
  /** Position of the offending finding in the provider's list, when there is one. */
  readonly index?: number;
}

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
}

export interface ProviderMetadata {
  readonly name: string;
  readonly model: string;
  readonly durationMs: number;
  readonly attempts: number;
  readonly usage?: TokenUsage;
}

export interface ReviewCoverage {
  readonly truncatedFiles: readonly string[];
  readonly warnings: readonly string[];
  readonly omittedFindings: number;
}

export interface ReviewResult {
  readonly findings: readonly Finding[];
  readonly summary: string;
  readonly provider: ProviderMetadata;
  /** True when the parser fell back to a heuristic or recorded any anomaly. */
  readonly degraded: boolean;
  readonly anomalies: readonly ParsingAnomaly[];
  readonly coverage: ReviewCoverage;
}

export const DEFAULT_REVIEW_CONFIG: ReviewConfig = Object.freeze({
  mode: "critical",
  focus: Object.freeze([...FOCUS_AREAS]),
});

/**
 * Builds a normalised, frozen ReviewConfig. Focus areas are de-duplicated and
 * kept in canonical order so equal configs render equal prompts.
 */
export function createReviewConfig(input: Partial<ReviewConfig> = {}): ReviewConfig {
  const requested: readonly FocusArea[] =
    input.focus && input.focus.length > 0 ? input.focus : FOCUS_AREAS;
  const focus = FOCUS_AREAS.filter((area) => requested.includes(area));

  const styleGuide = input.styleGuide?.trim();
  return Object.freeze({
    mode: input.mode ?? DEFAULT_REVIEW_CONFIG.mode,
    focus: Object.freeze(focus),
    ...(styleGuide ? { styleGuide } : {}),
    ...(input.maxFindings !== undefined ? { maxFindings: input.maxFindings } : {}),
  });
}

export function severityRank(severity: Severity): number {
  return SEVERITIES.length - SEVERITIES.indexOf(severity);
}
