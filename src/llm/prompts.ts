import type { ChangeSet, FileChange, FocusArea, ReviewConfig } from "../review/types.js";
import { FOCUS_AREAS } from "../review/types.js";
import type { PromptPayload } from "./types.js";

const FOCUS_DESCRIPTIONS: Record<FocusArea, string> = {
  security: "security vulnerabilities",
  bugs: "bugs and logic errors",
  style: "code style and readability",
  performance: "performance problems",
};

const OUTPUT_CONTRACT = `Your response MUST be a single JSON object in exactly this format, with no other text:
{
  "summary": "A brief overall assessment in 1-3 sentences",
  "findings": [
    {
      "file": "path/to/file.ts",
      "line": 42,
      "severity": "high",
      "message": "What is wrong and why it matters",
      "suggestion": "How to fix it (optional)"
    }
  ]
}

Where severity is one of: high, medium, low, info
- high: a bug, crash, data loss or exploitable security issue
- medium: a likely problem or maintainability risk
- low: a minor improvement
- info: an observation that needs no action`;

const RULES = `Rules:
- "file" must be one of the paths listed under "Files changed"
- "line" must be a line number in the new version of the file (lines starting with +), or null
- Only report issues you are confident about; avoid false positives
- Be specific and actionable: explain what's wrong and how to fix it
- If the code looks good, return an empty "findings" array with a positive summary`;

function describeFocus(focus: readonly FocusArea[]): string {
  if (focus.length === 0 || FOCUS_AREAS.every((area) => focus.includes(area))) {
    return "Review for security, bugs, style and performance issues.";
  }
  return `Focus on: ${focus.map((area) => FOCUS_DESCRIPTIONS[area]).join(", ")}.`;
}

function describeMode(config: ReviewConfig): string {
  return config.mode === "full"
    ? "Provide a thorough, comprehensive code review."
    : "Provide a quick review that reports only critical issues (bugs, security, data loss). Skip style nitpicks.";
}

export function buildSystemPrompt(config: ReviewConfig): string {
  const sections = [
    `You are a senior code reviewer. ${describeMode(config)}`,
    describeFocus(config.focus),
    RULES,
    OUTPUT_CONTRACT,
  ];
  if (config.maxFindings !== undefined) {
    sections.push(`Report at most ${config.maxFindings} findings, most severe first.`);
  }
  if (config.styleGuide) {
    sections.push(`Style guide to follow:\n${config.styleGuide}`);
  }
  return sections.join("\n\n");
}

function describeChange(file: FileChange): string {
  const kind =
    file.kind === "renamed" && file.previousPath
      ? `renamed from ${file.previousPath}`
      : file.kind;
  const truncated = file.truncated ? `, truncated to first lines of ${file.totalLines}` : "";
  return `- ${file.path} (${kind}${truncated})`;
}

/** A fence longer than any backtick run in the body, so the body cannot close it. */
export function fenceFor(body: string): string {
  let longest = 0;
  for (const run of body.match(/`+/g) ?? []) {
    longest = Math.max(longest, run.length);
  }
  return "`".repeat(Math.max(3, longest + 1));
}

export function buildUserPrompt(changeSet: ChangeSet): string {
  let prompt = `# Changes under review (${changeSet.targetRef} against ${changeSet.baseRef})\n\n`;
  prompt += `## Files changed\n${changeSet.files.map(describeChange).join("\n")}\n\n`;
  prompt += "## Diff\n";

  for (const file of changeSet.files) {
    const fence = fenceFor(file.body);
    prompt += `\n### ${file.path}\n${fence}diff\n${file.body}\n${fence}\n`;
  }
  return prompt;
}

/**
 * Pure: the same change set and config always produce byte-identical output.
 */
export function buildPrompt(changeSet: ChangeSet, config: ReviewConfig): PromptPayload {
  return Object.freeze({
    system: buildSystemPrompt(config),
    user: buildUserPrompt(changeSet),
  });
}
