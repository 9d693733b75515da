import chalk from "chalk";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { loadEnv, type SettingsOverrides } from "../config.js";
import { ConfigError, PatchReviewError } from "../errors.js";
import { formatStatuses, getProviderStatuses } from "../llm/detection.js";
import { createDefaultRegistry } from "../llm/registry.js";
import { setLogLevel } from "../logger.js";
import { OUTPUT_FORMATS, getFormatter } from "../output/formatter.js";
import type { ReviewOutcome } from "../review/orchestrator.js";
import { runReview } from "../review/run.js";
import {
  ENGINES,
  FOCUS_AREAS,
  SEVERITIES,
  severityRank,
  type FocusArea,
  type ReviewEngine,
  type ReviewSource,
  type Severity,
} from "../review/types.js";
import { VERSION } from "../version.js";

export const EXIT_CODES = {
  ok: 0,
  findings: 1,
  failure: 2,
  cancelled: 130,
} as const;

export interface CliOptions {
  branch?: string | true;
  provider?: string;
  model?: string;
  engine?: ReviewEngine;
  full?: boolean;
  focus?: FocusArea[];
  maxFindings?: number;
  format: string;
  config?: string;
  failOn?: Severity;
  listProviders?: boolean;
  debug?: boolean;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

const DEFAULT_TARGET_BRANCH = "main";

function isFocusArea(value: string): value is FocusArea {
  const areas: readonly string[] = FOCUS_AREAS;
  return areas.includes(value);
}

export function parseFocus(value: string): FocusArea[] {
  const areas: FocusArea[] = [];
  for (const part of value.split(",")) {
    const area = part.trim().toLowerCase();
    if (!area) continue;
    if (!isFocusArea(area)) {
      throw new InvalidArgumentError(`Unknown focus area '${area}'. Use: ${FOCUS_AREAS.join(", ")}.`);
    }
    if (!areas.includes(area)) areas.push(area);
  }
  if (areas.length === 0) {
    throw new InvalidArgumentError("At least one focus area is required.");
  }
  return areas;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function sourceFrom(files: readonly string[], branch: string | true | undefined): ReviewSource {
  if (files.length > 0 && branch !== undefined) {
    throw new ConfigError("Pass either file patterns or --branch, not both.");
  }
  if (files.length > 0) return { mode: "files", patterns: [...files] };
  if (branch !== undefined) {
    return { mode: "branch", target: branch === true ? DEFAULT_TARGET_BRANCH : branch };
  }
  return { mode: "staged" };
}

export function overridesFrom(options: CliOptions): SettingsOverrides {
  if (options.engine === "rules" && (options.provider || options.model)) {
    throw new ConfigError(`--${options.provider ? "provider" : "model"} is only valid with --engine llm.`);
  }
  return {
    engine: options.engine,
    provider: options.provider,
    model: options.model,
    mode: options.full ? "full" : undefined,
    focus: options.focus,
    maxFindings: options.maxFindings,
  };
}

/** Exit status for a finished review. */
export function exitCodeFor(outcome: ReviewOutcome, failOn?: Severity): number {
  if (outcome.status === "failed") {
    return outcome.failure.kind === "cancelled" ? EXIT_CODES.cancelled : EXIT_CODES.failure;
  }
  if (!failOn) return EXIT_CODES.ok;
  const threshold = severityRank(failOn);
  return outcome.result.findings.some((f) => severityRank(f.severity) >= threshold)
    ? EXIT_CODES.findings
    : EXIT_CODES.ok;
}

function reportError(io: CliIo, err: unknown, debug: boolean): void {
  const message = err instanceof Error ? err.message : String(err);
  io.stderr(chalk.red(`Error: ${message}`));
  if (err instanceof PatchReviewError && err.hint) {
    io.stderr(chalk.dim(err.hint));
  }
  if (debug && err instanceof Error && err.stack) {
    io.stderr(chalk.dim(err.stack));
  }
}

async function listProviders(io: CliIo): Promise<number> {
  const registry = createDefaultRegistry(loadEnv());
  const statuses = await getProviderStatuses(registry);
  io.stdout("Provider status:");
  const lines = formatStatuses(statuses);
  statuses.forEach((status, index) => {
    const model = status.defaultModel ? ` (default model: ${status.defaultModel})` : "";
    io.stdout(`${lines[index] ?? ""}${model}`);
  });
  return EXIT_CODES.ok;
}

async function review(
  files: string[],
  options: CliOptions,
  io: CliIo
): Promise<number> {
  const formatter = getFormatter(options.format);
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    const { outcome } = await runReview({
      source: sourceFrom(files, options.branch),
      overrides: overridesFrom(options),
      configPath: options.config,
      signal: controller.signal,
    });

    if (outcome.status === "failed") {
      const { failure } = outcome;
      io.stderr(chalk.red(`Error: ${failure.message}`));
      if (failure.hint) io.stderr(chalk.dim(failure.hint));
    } else {
      const output = formatter(outcome.result);
      if (output) io.stdout(output);
    }
    return exitCodeFor(outcome, options.failOn);
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

export function buildProgram(): Command {
  return new Command()
    .name("patchreview")
    .description(
      "Review code changes with an LLM.\n\n" +
        "With no arguments, reviews staged git changes. With file arguments, reviews those files."
    )
    .version(VERSION, "-v, --version")
    .argument("[files...]", "files, directories or glob patterns to review")
    .option("-b, --branch [target]", `review the current branch against a target (default: ${DEFAULT_TARGET_BRANCH})`)
    .option("-p, --provider <name>", "provider: auto, anthropic, openai, gemini, ollama")
    .option("-m, --model <model>", "model to use instead of the provider default")
    .addOption(
      new Option("-e, --engine <engine>", "llm asks a provider; rules runs local pattern checks only").choices(
        ENGINES
      )
    )
    .option("-f, --full", "full review instead of critical issues only")
    .option("--focus <areas>", `comma-separated focus areas (${FOCUS_AREAS.join(",")})`, parseFocus)
    .option("--max-findings <n>", "maximum number of findings to report", parsePositiveInt)
    .addOption(new Option("--format <format>", "output format").choices(OUTPUT_FORMATS).default("table"))
    .option("-c, --config <path>", "configuration file (default: .patchreview.yml)")
    .addOption(
      new Option("--fail-on <severity>", "exit with 1 when a finding is at or above this severity").choices(
        SEVERITIES
      )
    )
    .option("--list-providers", "show which providers are configured and exit")
    .option("-d, --debug", "verbose logging and stack traces");
}

/** Parses argv, runs the command and resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  const program = buildProgram().exitOverride();

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.failure;
    }
    throw err;
  }

  const options = program.opts<CliOptions>();
  const debug = Boolean(options.debug);
  if (debug) setLogLevel("debug");

  try {
    if (options.listProviders) return await listProviders(io);
    return await review(program.args, options, io);
  } catch (err) {
    reportError(io, err, debug);
    return EXIT_CODES.failure;
  }
}
