import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_MAX_FILES, DEFAULT_MAX_LINES_PER_FILE } from "./review/extractor.js";
import { FOCUS_AREAS, type FocusArea, type ReviewEngine, type ReviewMode } from "./review/types.js";
import { DEFAULT_RETRY } from "./utils/retry.js";

// Blank credentials behave as unset.
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const envSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  OPENAI_API_KEY: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,
  GEMINI_API_KEY: optionalSecret,
  OLLAMA_HOST: z.string().url().default("http://localhost:11434"),
  OLLAMA_HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  PATCHREVIEW_PROVIDER: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),
});

export type Env = z.infer<typeof envSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError("Invalid environment variables:", formatIssues(result.error));
  }
  return result.data;
}

/** Credential values that must never appear in surfaced messages. */
export function secretsOf(env: Env): string[] {
  return [env.OPENAI_API_KEY, env.ANTHROPIC_API_KEY, env.GEMINI_API_KEY].filter(
    (value): value is string => Boolean(value)
  );
}

export interface RetrySettings {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  maxTotalDelayMs: number;
}

export interface Settings {
  engine: ReviewEngine;
  /** A registered provider name, or "auto" to pick the first available one. */
  provider: string;
  model?: string;
  mode: ReviewMode;
  focus: FocusArea[];
  styleGuide?: string;
  maxFindings?: number;
  maxLinesPerFile: number;
  maxFiles: number;
  ignorePaths: string[];
  retry: RetrySettings;
}

export type SettingsOverrides = Partial<Omit<Settings, "retry">> & {
  retry?: Partial<RetrySettings>;
};

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  engine: "llm",
  provider: "auto",
  mode: "critical",
  focus: [...FOCUS_AREAS],
  maxLinesPerFile: DEFAULT_MAX_LINES_PER_FILE,
  maxFiles: DEFAULT_MAX_FILES,
  ignorePaths: [],
  retry: { ...DEFAULT_RETRY },
});

/**
 * Layers settings with later sources winning: defaults, then the project
 * file, then command-line flags. Undefined values never override. Inputs are
 * left untouched.
 */
export function mergeSettings(
  defaults: Readonly<Settings>,
  file: SettingsOverrides | null,
  flags: SettingsOverrides = {}
): Settings {
  const layers = [flags, file ?? {}];
  const pick = <K extends keyof SettingsOverrides>(key: K): SettingsOverrides[K] => {
    for (const layer of layers) {
      if (layer[key] !== undefined) return layer[key];
    }
    return undefined;
  };
  const pickRetry = (key: keyof RetrySettings): number =>
    flags.retry?.[key] ?? file?.retry?.[key] ?? defaults.retry[key];

  const model = pick("model") ?? defaults.model;
  const styleGuide = pick("styleGuide") ?? defaults.styleGuide;
  const maxFindings = pick("maxFindings") ?? defaults.maxFindings;

  return {
    engine: pick("engine") ?? defaults.engine,
    provider: pick("provider") ?? defaults.provider,
    ...(model !== undefined ? { model } : {}),
    mode: pick("mode") ?? defaults.mode,
    focus: [...(pick("focus") ?? defaults.focus)],
    ...(styleGuide !== undefined ? { styleGuide } : {}),
    ...(maxFindings !== undefined ? { maxFindings } : {}),
    maxLinesPerFile: pick("maxLinesPerFile") ?? defaults.maxLinesPerFile,
    maxFiles: pick("maxFiles") ?? defaults.maxFiles,
    ignorePaths: [...(pick("ignorePaths") ?? defaults.ignorePaths)],
    retry: {
      maxAttempts: pickRetry("maxAttempts"),
      initialDelayMs: pickRetry("initialDelayMs"),
      maxDelayMs: pickRetry("maxDelayMs"),
      maxTotalDelayMs: pickRetry("maxTotalDelayMs"),
    },
  };
}
