import { resolve } from "node:path";
import {
  DEFAULT_SETTINGS,
  loadEnv,
  mergeSettings,
  secretsOf,
  type Env,
  type Settings,
  type SettingsOverrides,
} from "../config.js";
import { createGitClient, type GitClient } from "../git.js";
import { createDefaultRegistry, type ProviderRegistry } from "../llm/registry.js";
import { createLogger } from "../logger.js";
import { loadProjectConfig } from "../project-config.js";
import { ContextExtractor } from "./extractor.js";
import { ReviewOrchestrator, type ReviewOutcome, type ReviewState } from "./orchestrator.js";
import { createReviewConfig, type ReviewSource } from "./types.js";

export interface RunReviewOptions {
  source: ReviewSource;
  /** Defaults to the current working directory. */
  root?: string;
  /** Command-line overrides; they win over the project file. */
  overrides?: SettingsOverrides;
  configPath?: string;
  env?: Env;
  git?: GitClient;
  registry?: ProviderRegistry;
  signal?: AbortSignal;
  onStateChange?: (state: ReviewState, previous: ReviewState) => void;
}

export interface RunReviewResult {
  outcome: ReviewOutcome;
  settings: Settings;
}

/**
 * Resolves settings from defaults, the project file, the environment and the
 * caller's overrides, then runs one review. Configuration problems reject
 * with ConfigError; review failures come back in the outcome.
 */
export async function runReview(options: RunReviewOptions): Promise<RunReviewResult> {
  const root = resolve(options.root ?? process.cwd());
  const env = options.env ?? loadEnv();
  const project = await loadProjectConfig(root, options.configPath);

  const overrides = options.overrides ?? {};
  const settings = mergeSettings(DEFAULT_SETTINGS, project?.config ?? null, {
    ...overrides,
    provider: overrides.provider ?? env.PATCHREVIEW_PROVIDER,
  });

  const extractor = new ContextExtractor({
    root,
    git: options.git ?? createGitClient(root),
    maxLinesPerFile: settings.maxLinesPerFile,
    maxFiles: settings.maxFiles,
    ignorePaths: settings.ignorePaths,
  });

  const orchestrator = new ReviewOrchestrator({
    extractor,
    registry: options.registry ?? createDefaultRegistry(env),
    root,
    retry: settings.retry,
    secrets: secretsOf(env),
    logger: createLogger({ secrets: secretsOf(env) }),
    onStateChange: options.onStateChange,
  });

  const outcome = await orchestrator.run(
    {
      source: options.source,
      config: createReviewConfig({
        mode: settings.mode,
        focus: settings.focus,
        styleGuide: settings.styleGuide,
        maxFindings: settings.maxFindings,
      }),
      provider: settings.provider,
      model: settings.model,
      engine: settings.engine,
    },
    options.signal
  );

  return { outcome, settings };
}
