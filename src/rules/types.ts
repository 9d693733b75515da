import type { FocusArea, Severity } from "../review/types.js";

/** One line on the new side of a change, numbered as in the new file. */
export interface SourceLine {
  readonly number: number;
  readonly text: string;
  /** False for unchanged context lines. */
  readonly added: boolean;
}

export interface RuleMatch {
  readonly line: number;
  readonly severity: Severity;
  readonly message: string;
  readonly suggestion?: string;
}

/**
 * A stateless check over one contiguous run of source lines. Rules see context
 * lines too; the engine keeps only matches that land on added lines.
 */
export interface Rule {
  /** Stable identifier shown in messages, e.g. "SEC001". */
  readonly id: string;
  readonly name: string;
  readonly focus: FocusArea;
  check(path: string, lines: readonly SourceLine[]): RuleMatch[];
}

export function isCommentLine(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.startsWith("#") || trimmed.startsWith("//");
}

export function extensionOf(path: string): string {
  const name = path.slice(path.lastIndexOf("/") + 1);
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot).toLowerCase() : "";
}
