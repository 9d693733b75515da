import { randomUUID } from "node:crypto";
import {
  ExtractionError,
  ProviderError,
  type ExtractionFailure,
  type ProviderErrorKind,
} from "../errors.js";
import { detectProvider } from "../llm/detection.js";
import { toProviderError } from "../llm/errors.js";
import { buildPrompt } from "../llm/prompts.js";
import type { ProviderRegistry } from "../llm/registry.js";
import type { ProviderResponse } from "../llm/types.js";
import { logger, type Logger } from "../logger.js";
import { RULES_VERSION, RuleEngine } from "../rules/engine.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import { sanitizeMessage } from "../utils/sanitize.js";
import { parseReviewResponse } from "./parser.js";
import {
  severityRank,
  type ChangeSet,
  type Finding,
  type ParsingAnomaly,
  type ProviderMetadata,
  type ReviewConfig,
  type ReviewEngine,
  type ReviewResult,
  type ReviewSource,
} from "./types.js";

export type ReviewState =
  | "idle"
  | "extracting"
  | "analyzing"
  | "prompting"
  | "invoking"
  | "parsing"
  | "done"
  | "failed";

const TRANSITIONS: Record<ReviewState, readonly ReviewState[]> = {
  idle: ["extracting"],
  extracting: ["prompting", "analyzing", "failed"],
  analyzing: ["done"],
  prompting: ["invoking"],
  invoking: ["parsing", "failed"],
  parsing: ["done"],
  done: [],
  failed: [],
};

export interface ReviewRequest {
  source: ReviewSource;
  config: ReviewConfig;
  /** Registered provider name, or "auto". Ignored by the rules engine. */
  provider: string;
  model?: string;
  engine?: ReviewEngine;
}

export type FailureKind = ExtractionFailure | ProviderErrorKind;

export interface ReviewFailure {
  readonly stage: "extracting" | "invoking";
  readonly kind: FailureKind;
  readonly message: string;
  readonly hint?: string;
  /** Provider calls made before giving up. */
  readonly attempts?: number;
}

export type ReviewOutcome =
  | { readonly status: "done"; readonly result: ReviewResult }
  | { readonly status: "failed"; readonly failure: ReviewFailure };

export interface ChangeSource {
  extract(source: ReviewSource): Promise<ChangeSet>;
}

export interface OrchestratorOptions {
  extractor: ChangeSource;
  registry: ProviderRegistry;
  /** Project root, used to relativise paths in failure messages. */
  root: string;
  retry?: Omit<RetryOptions, "shouldRetry" | "onRetry" | "signal">;
  /** Credential values to redact from failure messages. */
  secrets?: readonly string[];
  rules?: RuleEngine;
  /** Defaults to the shared stderr logger. */
  logger?: Logger;
  onStateChange?: (state: ReviewState, previous: ReviewState) => void;
}

class StageFailure extends Error {
  constructor(
    readonly stage: ReviewFailure["stage"],
    readonly error: unknown,
    readonly attempts?: number
  ) {
    super(`${stage} failed`);
  }
}

function isRetryable(err: unknown): boolean {
  return err instanceof ProviderError && err.retryable;
}

function bySeverity(a: Finding, b: Finding): number {
  return severityRank(b.severity) - severityRank(a.severity);
}

/**
 * Drives one review through extraction, prompting, the provider call and
 * parsing. Failures come back as a value; run() only rejects on a bug.
 */
export class ReviewOrchestrator {
  private current: ReviewState = "idle";

  constructor(private readonly options: OrchestratorOptions) {}

  get state(): ReviewState {
    return this.current;
  }

  private transition(next: ReviewState): void {
    const previous = this.current;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Invalid review state transition: ${previous} -> ${next}`);
    }
    this.current = next;
    this.options.onStateChange?.(next, previous);
  }

  async run(request: ReviewRequest, signal?: AbortSignal): Promise<ReviewOutcome> {
    this.current = "idle";
    const log = (this.options.logger ?? logger).child({
      runId: randomUUID().slice(0, 8),
      mode: request.config.mode,
      engine: request.engine ?? "llm",
    });

    try {
      const result = await this.execute(request, log, signal);
      this.transition("done");
      log.info("Review completed", {
        findings: result.findings.length,
        degraded: result.degraded,
        durationMs: result.provider.durationMs,
      });
      return Object.freeze({ status: "done", result });
    } catch (err) {
      if (!(err instanceof StageFailure)) throw err;
      this.transition("failed");
      const failure = this.describeFailure(err, signal);
      log.error("Review failed", { stage: failure.stage, kind: failure.kind, error: failure.message });
      return Object.freeze({ status: "failed", failure });
    }
  }

  private async execute(
    request: ReviewRequest,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<ReviewResult> {
    this.transition("extracting");
    let changeSet: ChangeSet;
    try {
      if (signal?.aborted) throw signal.reason;
      changeSet = await this.options.extractor.extract(request.source);
    } catch (err) {
      throw new StageFailure("extracting", err);
    }
    log.debug("Extracted changes", {
      files: changeSet.files.length,
      warnings: changeSet.warnings.length,
    });

    if (request.engine === "rules") {
      this.transition("analyzing");
      return this.analyze(changeSet, request.config);
    }

    this.transition("prompting");
    const prompt = buildPrompt(changeSet, request.config);

    this.transition("invoking");
    const response = await this.invoke(request, prompt, log, signal);

    this.transition("parsing");
    return this.assemble(changeSet, request.config, response.response, response.attempts);
  }

  private async invoke(
    request: ReviewRequest,
    prompt: ReturnType<typeof buildPrompt>,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<{ response: ProviderResponse; attempts: number }> {
    const { registry } = this.options;
    let attempts = 0;
    let providerName = request.provider;

    try {
      if (signal?.aborted) throw signal.reason;
      if (providerName === "auto") {
        providerName = await detectProvider(registry);
        log.debug("Detected provider", { provider: providerName });
      }
      const provider = await registry.resolve(providerName, request.model);
      const name = provider.name;

      const response = await withRetry(
        async (attempt) => {
          attempts = attempt;
          log.debug("Calling provider", { provider: name, model: provider.model, attempt });
          try {
            return await provider.review(prompt, { signal });
          } catch (err) {
            throw toProviderError(name, err);
          }
        },
        {
          ...this.options.retry,
          signal,
          shouldRetry: isRetryable,
          onRetry: ({ attempt, delayMs, error }) => {
            log.warn("Provider call failed, retrying", {
              provider: name,
              attempt,
              delayMs,
              error: error instanceof Error ? error.message : String(error),
            });
          },
        }
      );
      return { response, attempts };
    } catch (err) {
      throw new StageFailure("invoking", err, attempts);
    }
  }

  private analyze(changeSet: ChangeSet, config: ReviewConfig): ReviewResult {
    const started = Date.now();
    const { findings, summary } = (this.options.rules ?? new RuleEngine()).review(changeSet, config);
    return this.finish(changeSet, config, {
      findings,
      summary,
      provider: { name: "rules", model: RULES_VERSION, durationMs: Date.now() - started, attempts: 0 },
      heuristic: false,
      anomalies: [],
    });
  }

  private assemble(
    changeSet: ChangeSet,
    config: ReviewConfig,
    response: ProviderResponse,
    attempts: number
  ): ReviewResult {
    const parsed = parseReviewResponse(response.text);
    return this.finish(changeSet, config, {
      findings: parsed.findings,
      summary: parsed.summary,
      provider: {
        name: response.provider,
        model: response.model,
        durationMs: response.durationMs,
        attempts,
        ...(response.usage ? { usage: Object.freeze({ ...response.usage }) } : {}),
      },
      heuristic: parsed.kind === "heuristic",
      anomalies: parsed.anomalies,
    });
  }

  private finish(
    changeSet: ChangeSet,
    config: ReviewConfig,
    review: {
      findings: readonly Finding[];
      summary: string;
      provider: ProviderMetadata;
      heuristic: boolean;
      anomalies: readonly ParsingAnomaly[];
    }
  ): ReviewResult {
    const ranked = [...review.findings].sort(bySeverity);
    const limit = config.maxFindings ?? ranked.length;
    const findings = ranked.slice(0, limit).map((finding) => Object.freeze({ ...finding }));
    const omittedFindings = ranked.length - findings.length;

    const anomalies = review.anomalies.map((anomaly) => Object.freeze({ ...anomaly }));

    return Object.freeze({
      findings: Object.freeze(findings),
      summary: review.summary,
      provider: Object.freeze({ ...review.provider }),
      degraded: review.heuristic || anomalies.length > 0,
      anomalies: Object.freeze(anomalies),
      coverage: Object.freeze({
        truncatedFiles: Object.freeze(changeSet.files.filter((f) => f.truncated).map((f) => f.path)),
        warnings: Object.freeze([...changeSet.warnings]),
        omittedFindings,
      }),
    });
  }

  private describeFailure(failure: StageFailure, signal: AbortSignal | undefined): ReviewFailure {
    const { root, secrets } = this.options;
    const clean = (text: string) => sanitizeMessage(text, { root, secrets });
    const err = failure.error;

    let kind: FailureKind;
    let message: string;
    let hint: string | undefined;

    if (signal?.aborted) {
      kind = "cancelled";
      message = "Review cancelled";
    } else if (err instanceof ExtractionError) {
      kind = err.reason;
      message = err.message;
      hint = err.hint;
    } else if (err instanceof ProviderError) {
      kind = err.kind;
      message = err.message;
      hint = err.hint;
    } else {
      kind = "unknown";
      message = err instanceof Error ? err.message : String(err);
    }

    return Object.freeze({
      stage: failure.stage,
      kind,
      message: clean(message),
      ...(hint ? { hint: clean(hint) } : {}),
      ...(failure.stage === "invoking" ? { attempts: failure.attempts ?? 0 } : {}),
    });
  }
}
