import { ProviderError, type ProviderErrorKind } from "../errors.js";
import { isRetryableError } from "../utils/retry.js";

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

// SDK error classes do not all set `name`, so fall back to the class name.
function nameOf(error: unknown): string {
  if (!(error instanceof Error)) return "";
  return error.name && error.name !== "Error" ? error.name : error.constructor.name;
}

function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";
  if (status === 408 || status === 409 || status >= 500) return "network";
  return "request";
}

const HINTS: Partial<Record<ProviderErrorKind, string>> = {
  auth: "Check that the API key is valid and has access to the selected model.",
  rate_limit: "The provider is rate limiting requests; wait and try again.",
  network: "The provider could not be reached; check your connection.",
  cancelled: "The review was interrupted.",
};

/**
 * Maps whatever an SDK or fetch call threw onto the provider error taxonomy.
 * HTTP status wins when present; otherwise the error name and message decide.
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const name = nameOf(error);
  const status = statusOf(error);

  let kind: ProviderErrorKind;
  if (name === "AbortError" || name === "APIUserAbortError") {
    kind = "cancelled";
  } else if (status !== undefined) {
    kind = kindForStatus(status);
  } else if (
    name === "APIConnectionError" ||
    name === "APIConnectionTimeoutError" ||
    name === "TimeoutError" ||
    isRetryableError(error)
  ) {
    kind = "network";
  } else {
    kind = "unknown";
  }

  return new ProviderError({
    provider,
    kind,
    status,
    message: `${provider}: ${message}`,
    hint: HINTS[kind],
    cause: error,
  });
}

/** For clients that talk HTTP directly and see a non-2xx status. */
export function fromHttpStatus(
  provider: string,
  status: number,
  detail: string,
  hint?: string
): ProviderError {
  const kind = kindForStatus(status);
  return new ProviderError({
    provider,
    kind,
    status,
    message: `${provider}: HTTP ${status}${detail ? ` ${detail}` : ""}`,
    hint: hint ?? HINTS[kind],
  });
}

export function malformedResponse(provider: string, detail: string): ProviderError {
  return new ProviderError({
    provider,
    kind: "malformed",
    message: `${provider} returned an unusable response: ${detail}`,
  });
}
