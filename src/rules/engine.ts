import {
  SEVERITIES,
  type ChangeSet,
  type FileChange,
  type Finding,
  type FocusArea,
  type ReviewConfig,
} from "../review/types.js";
import { credentialPatternRule, hardcodedSecretRule, mergeConflictRule } from "./security.js";
import { commentedCodeRule, debugStatementRule, markerCommentRule } from "./quality.js";
import { longFunctionRule, longLineRule } from "./style.js";
import type { Rule, SourceLine } from "./types.js";

export const RULES_VERSION = "rules-v1";

export const BUILTIN_RULES: readonly Rule[] = [
  hardcodedSecretRule,
  credentialPatternRule,
  mergeConflictRule,
  debugStatementRule,
  markerCommentRule,
  commentedCodeRule,
  longLineRule,
  longFunctionRule,
];

export function rulesFor(focus: readonly FocusArea[], rules: readonly Rule[] = BUILTIN_RULES): Rule[] {
  return rules.filter((rule) => focus.includes(rule.focus));
}

const HUNK_HEADER = /^@@ -\d+(?:,\d+)? \+(\d+)(?:,\d+)? @@/;

/**
 * Splits a file body into runs of new-side lines, one per hunk. A run stops
 * at anything that is not a diff line, such as the truncation marker.
 */
export function hunkSegments(body: string): SourceLine[][] {
  const segments: SourceLine[][] = [];
  let current: SourceLine[] | null = null;
  let next = 0;

  for (const raw of body.split("\n")) {
    const header = HUNK_HEADER.exec(raw);
    if (header) {
      current = [];
      segments.push(current);
      next = Number(header[1]);
      continue;
    }
    if (!current) continue;

    const marker = raw.charAt(0);
    if (marker === "+" || marker === " ") {
      current.push({ number: next, text: raw.slice(1), added: marker === "+" });
      next++;
    } else if (marker === "-" || marker === "\\") {
      continue;
    } else {
      current = null;
    }
  }
  return segments;
}

export interface RuleReview {
  readonly findings: readonly Finding[];
  readonly summary: string;
}

/** Runs pattern rules over added lines only; no provider is involved. */
export class RuleEngine {
  constructor(private readonly rules: readonly Rule[] = BUILTIN_RULES) {}

  review(changeSet: ChangeSet, config: ReviewConfig): RuleReview {
    const active = rulesFor(config.focus, this.rules);
    const findings = changeSet.files
      .filter((file) => file.kind !== "deleted")
      .flatMap((file) => this.checkFile(file, active));
    return { findings, summary: summarize(findings) };
  }

  private checkFile(file: FileChange, rules: readonly Rule[]): Finding[] {
    const findings: Finding[] = [];
    for (const segment of hunkSegments(file.body)) {
      const added = new Set(segment.filter((line) => line.added).map((line) => line.number));
      if (added.size === 0) continue;
      for (const rule of rules) {
        for (const match of rule.check(file.path, segment)) {
          if (!added.has(match.line)) continue;
          findings.push({
            severity: match.severity,
            file: file.path,
            line: match.line,
            message: `[${rule.id}] ${match.message}`,
            ...(match.suggestion ? { suggestion: match.suggestion } : {}),
          });
        }
      }
    }
    return findings;
  }
}

export function summarize(findings: readonly Finding[]): string {
  if (findings.length === 0) return "No issues found.";
  const counts = SEVERITIES.map(
    (severity) => [severity, findings.filter((f) => f.severity === severity).length] as const
  )
    .filter(([, n]) => n > 0)
    .map(([severity, n]) => `${n} ${severity}`);
  const noun = findings.length === 1 ? "issue" : "issues";
  return `Found ${findings.length} ${noun}: ${counts.join(", ")}.`;
}
