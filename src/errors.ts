export class PatchReviewError extends Error {
  readonly hint?: string;

  constructor(message: string, options: { hint?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.hint = options.hint;
  }
}

export type ExtractionFailure =
  | "no_changes"
  | "unresolved_ref"
  | "no_files"
  | "unreadable"
  | "git_failed";

export class ExtractionError extends PatchReviewError {
  readonly reason: ExtractionFailure;

  constructor(
    reason: ExtractionFailure,
    message: string,
    options: { hint?: string; cause?: unknown } = {}
  ) {
    super(message, options);
    this.reason = reason;
  }
}

export class GitError extends PatchReviewError {
  readonly args: readonly string[];
  readonly exitCode: number | null;

  constructor(args: readonly string[], exitCode: number | null, message: string) {
    super(message);
    this.args = args;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends PatchReviewError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], hint?: string) {
    super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message, { hint });
    this.issues = issues;
  }
}

export type ProviderErrorKind =
  | "auth"
  | "rate_limit"
  | "network"
  | "malformed"
  | "request"
  | "not_found"
  | "unavailable"
  | "cancelled"
  | "unknown";

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set(["rate_limit", "network"]);

export class ProviderError extends PatchReviewError {
  readonly provider: string;
  readonly kind: ProviderErrorKind;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(init: {
    provider: string;
    kind: ProviderErrorKind;
    message: string;
    status?: number;
    hint?: string;
    cause?: unknown;
  }) {
    super(init.message, { hint: init.hint, cause: init.cause });
    this.provider = init.provider;
    this.kind = init.kind;
    this.retryable = RETRYABLE_KINDS.has(init.kind);
    this.status = init.status;
  }
}
