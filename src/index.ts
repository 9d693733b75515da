export { runReview, type RunReviewOptions, type RunReviewResult } from "./review/run.js";
export {
  ReviewOrchestrator,
  type ChangeSource,
  type FailureKind,
  type OrchestratorOptions,
  type ReviewFailure,
  type ReviewOutcome,
  type ReviewRequest,
  type ReviewState,
} from "./review/orchestrator.js";
export {
  ContextExtractor,
  DEFAULT_EXCLUDES,
  DEFAULT_MAX_FILES,
  DEFAULT_MAX_LINES_PER_FILE,
  type ExtractorOptions,
} from "./review/extractor.js";
export { parseReviewResponse, GENERAL_FINDING_PATH, type ParsedReview } from "./review/parser.js";
export { buildPrompt } from "./llm/prompts.js";
export {
  ProviderRegistry,
  createDefaultRegistry,
  type ProviderFactory,
  type ProviderRegistration,
} from "./llm/registry.js";
export { detectProvider, getProviderStatuses, type ProviderStatus } from "./llm/detection.js";
export type {
  PromptPayload,
  ProviderOptions,
  ProviderResponse,
  ReviewCallOptions,
  ReviewProvider,
} from "./llm/types.js";
export { RuleEngine, BUILTIN_RULES, rulesFor, type RuleReview } from "./rules/engine.js";
export type { Rule, RuleMatch, SourceLine } from "./rules/types.js";
export { createLogger, type Logger, type LoggerOptions } from "./logger.js";
export { createGitClient, type GitClient } from "./git.js";
export {
  DEFAULT_SETTINGS,
  loadEnv,
  mergeSettings,
  type Env,
  type Settings,
  type SettingsOverrides,
} from "./config.js";
export { loadProjectConfig } from "./project-config.js";
export { getFormatter, OUTPUT_FORMATS, type Formatter, type OutputFormat } from "./output/formatter.js";
export {
  ConfigError,
  ExtractionError,
  GitError,
  PatchReviewError,
  ProviderError,
  type ExtractionFailure,
  type ProviderErrorKind,
} from "./errors.js";
export * from "./review/types.js";
