import { z } from "zod";
import { logger } from "../logger.js";
import { findJsonBlock } from "./json-block.js";
import type { Finding, ParsingAnomaly, Severity } from "./types.js";

export interface ParsedReview {
  /** "structured" when a JSON block was found, "heuristic" when the text was read line by line. */
  kind: "structured" | "heuristic";
  summary: string;
  findings: Finding[];
  anomalies: ParsingAnomaly[];
}

/** Pseudo-path for findings that are not tied to a file. */
export const GENERAL_FINDING_PATH = "(general)";

export const MAX_RESPONSE_LENGTH = 1_000_000;
const MAX_SUMMARY_LENGTH = 200;
const MAX_FALLBACK_MESSAGE_LENGTH = 4000;
const DEFAULT_SUMMARY = "No summary provided.";

const SEVERITY_ALIASES: Record<string, Severity> = {
  high: "high",
  critical: "high",
  blocker: "high",
  error: "high",
  major: "medium",
  medium: "medium",
  moderate: "medium",
  warning: "medium",
  low: "low",
  minor: "low",
  suggestion: "low",
  nitpick: "low",
  nit: "low",
  info: "info",
  informational: "info",
  note: "info",
};

const ENVELOPE_KEYS = ["findings", "comments", "issues"] as const;

const candidateSchema = z.object({
  file: z.string().nullish(),
  path: z.string().nullish(),
  filename: z.string().nullish(),
  line: z.unknown(),
  severity: z.unknown(),
  message: z.string().nullish(),
  body: z.string().nullish(),
  description: z.string().nullish(),
  suggestion: z.string().nullish(),
});

const HEADING_REGEX =
  /^#{2,4}[ \t]*\[([A-Za-z]+)\][ \t]*([^\n]+?)(?::(\d+))?[ \t]*\n([\s\S]*?)(?=^#{2,4}[ \t]*\[|(?![\s\S]))/gm;

const SUMMARY_REGEX = /^#{1,3}[ \t]*Summary[ \t]*\n([\s\S]*?)(?=^#{1,4}[ \t]|(?![\s\S]))/im;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function looksLikeReview(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(isRecord);
  return (
    isRecord(value) &&
    (typeof value.summary === "string" || ENVELOPE_KEYS.some((key) => key in value))
  );
}

function firstText(...values: Array<string | null | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

export function normalizeSeverity(
  value: unknown
): { severity: Severity; anomaly?: "missing_severity" | "unknown_severity" } {
  if (value === undefined || value === null || value === "") {
    return { severity: "info", anomaly: "missing_severity" };
  }
  if (typeof value === "string") {
    const key = value.trim().replace(/^\[|\]$/g, "").toLowerCase();
    const severity = SEVERITY_ALIASES[key];
    if (severity) return { severity };
  }
  return { severity: "info", anomaly: "unknown_severity" };
}

export function normalizeLine(value: unknown): { line?: number; invalid: boolean } {
  if (value === undefined || value === null) return { invalid: false };
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return { line: value, invalid: false };
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    const line = Number.parseInt(value, 10);
    if (line > 0) return { line, invalid: false };
  }
  return { invalid: true };
}

function normalizePath(path: string): string {
  return path.trim().replace(/^(?:\.\/)+/, "");
}

function describe(value: unknown): string {
  const text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
  return text.length > 60 ? `${text.slice(0, 57)}...` : text;
}

function validateFinding(
  raw: unknown,
  index: number,
  anomalies: ParsingAnomaly[]
): Finding | null {
  const parsed = candidateSchema.safeParse(raw);
  if (!isRecord(raw) || !parsed.success) {
    anomalies.push({ kind: "invalid_finding", detail: "finding is not a well-typed object", index });
    return null;
  }
  const candidate = parsed.data;

  const rawPath = firstText(candidate.file, candidate.path, candidate.filename);
  const file = rawPath ? normalizePath(rawPath) : "";
  if (!file) {
    anomalies.push({ kind: "missing_file", detail: "finding has no file path; dropped", index });
    return null;
  }

  const message = firstText(candidate.message, candidate.body, candidate.description);
  if (!message) {
    anomalies.push({ kind: "missing_message", detail: `finding on ${file} has no message; dropped`, index });
    return null;
  }

  const { severity, anomaly } = normalizeSeverity(candidate.severity);
  if (anomaly === "missing_severity") {
    anomalies.push({ kind: anomaly, detail: `finding on ${file} has no severity; using info`, index });
  } else if (anomaly === "unknown_severity") {
    anomalies.push({
      kind: anomaly,
      detail: `unknown severity ${describe(candidate.severity)} on ${file}; using info`,
      index,
    });
  }

  const { line, invalid } = normalizeLine(candidate.line);
  if (invalid) {
    anomalies.push({
      kind: "invalid_line",
      detail: `line ${describe(candidate.line)} on ${file} is not a positive integer; ignored`,
      index,
    });
  }

  const suggestion = firstText(candidate.suggestion);
  return Object.freeze({
    severity,
    file,
    ...(line !== undefined ? { line } : {}),
    message,
    ...(suggestion ? { suggestion } : {}),
  });
}

function fromStructured(value: unknown, repaired: boolean): ParsedReview {
  const anomalies: ParsingAnomaly[] = [];
  if (repaired) {
    anomalies.push({
      kind: "truncated_response",
      detail: "response was cut off; trailing findings may be missing",
    });
  }

  let summary = DEFAULT_SUMMARY;
  let candidates: unknown[] = [];

  if (Array.isArray(value)) {
    candidates = value;
  } else if (isRecord(value)) {
    if (typeof value.summary === "string" && value.summary.trim()) {
      summary = value.summary.trim();
    }
    const key = ENVELOPE_KEYS.find((k) => k in value);
    if (key) {
      const list = value[key];
      if (Array.isArray(list)) {
        candidates = list;
      } else if (list !== null && list !== undefined) {
        anomalies.push({ kind: "invalid_envelope", detail: `"${key}" is not a list` });
      }
    }
  }

  const findings: Finding[] = [];
  candidates.forEach((raw, index) => {
    const finding = validateFinding(raw, index, anomalies);
    if (finding) findings.push(finding);
  });

  return { kind: "structured", summary, findings, anomalies };
}

function headlineOf(text: string): string {
  const summaryMatch = SUMMARY_REGEX.exec(text);
  const section = summaryMatch?.[1]?.trim();
  const source = section || text;
  const line =
    source
      .split("\n")
      .map((l) => l.replace(/^#+\s*/, "").trim())
      .find((l) => l.length > 0) ?? "";
  return line.length > MAX_SUMMARY_LENGTH ? `${line.slice(0, MAX_SUMMARY_LENGTH - 3)}...` : line;
}

function fromHeuristic(text: string, reason: string): ParsedReview {
  const anomalies: ParsingAnomaly[] = [{ kind: "no_structured_block", detail: reason }];
  const trimmed = text.trim();
  if (!trimmed) {
    return {
      kind: "heuristic",
      summary: "The provider returned an empty response.",
      findings: [],
      anomalies,
    };
  }

  const findings: Finding[] = [];
  const headingRegex = new RegExp(HEADING_REGEX.source, HEADING_REGEX.flags);
  let match: RegExpExecArray | null;
  while ((match = headingRegex.exec(trimmed)) !== null) {
    const [, rawSeverity, rawPath, rawLine, rawBody] = match;
    const file = normalizePath(rawPath ?? "");
    const message = rawBody?.trim() ?? "";
    if (!file || !message) continue;

    const { severity, anomaly } = normalizeSeverity(rawSeverity);
    if (anomaly) {
      anomalies.push({
        kind: anomaly,
        detail: `unknown severity ${describe(rawSeverity)} on ${file}; using info`,
        index: findings.length,
      });
    }
    const line = rawLine ? Number.parseInt(rawLine, 10) : undefined;
    findings.push(
      Object.freeze({ severity, file, ...(line && line > 0 ? { line } : {}), message })
    );
  }

  if (findings.length === 0) {
    const message =
      trimmed.length > MAX_FALLBACK_MESSAGE_LENGTH
        ? `${trimmed.slice(0, MAX_FALLBACK_MESSAGE_LENGTH - 3)}...`
        : trimmed;
    findings.push(Object.freeze({ severity: "info", file: GENERAL_FINDING_PATH, message }));
  }

  return { kind: "heuristic", summary: headlineOf(trimmed), findings, anomalies };
}

/**
 * Turns raw model output into findings. Never throws: output that holds no
 * usable JSON block comes back as a heuristic result with anomalies recorded.
 */
export function parseReviewResponse(raw: string): ParsedReview {
  try {
    if (raw.length > MAX_RESPONSE_LENGTH) {
      const parsed = fromHeuristic(
        raw.slice(0, MAX_FALLBACK_MESSAGE_LENGTH),
        `response of ${raw.length} characters exceeds the ${MAX_RESPONSE_LENGTH} limit`
      );
      parsed.anomalies.push({
        kind: "response_too_large",
        detail: `only the first ${MAX_FALLBACK_MESSAGE_LENGTH} characters were kept`,
      });
      return parsed;
    }

    const block = findJsonBlock(raw, looksLikeReview);
    if (block) {
      return fromStructured(block.value, block.repaired);
    }
    return fromHeuristic(raw, "no JSON review block found in the response");
  } catch (err) {
    logger.error("Response parser failed unexpectedly", { error: String(err) });
    return fromHeuristic(String(raw), "parser error");
  }
}
