import chalk, { type ChalkInstance } from "chalk";
import { ConfigError } from "../errors.js";
import type { Finding, ReviewResult, Severity } from "../review/types.js";

export const OUTPUT_FORMATS = ["table", "markdown", "json", "github"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type Formatter = (result: ReviewResult) => string;

const SEVERITY_COLORS: Record<Severity, (ink: ChalkInstance, text: string) => string> = {
  high: (ink, text) => ink.bold.red(text),
  medium: (ink, text) => ink.yellow(text),
  low: (ink, text) => ink.blue(text),
  info: (ink, text) => ink.dim(text),
};

function location(finding: Finding): string {
  return finding.line !== undefined ? `${finding.file}:${finding.line}` : finding.file;
}

function indent(text: string, prefix = "  "): string {
  return text
    .split("\n")
    .map((line) => (line ? prefix + line : line))
    .join("\n");
}

const DEGRADED_NOTE =
  "The provider response did not fully follow the expected format; results may be incomplete.";

export function formatTable(result: ReviewResult, ink: ChalkInstance = chalk): string {
  const lines = [
    ink.bold(`Code Review (${result.provider.name}/${result.provider.model})`),
    "",
    result.summary,
    "",
  ];

  if (result.findings.length === 0) {
    lines.push(ink.green("No issues found."));
  } else {
    for (const finding of result.findings) {
      const label = SEVERITY_COLORS[finding.severity](ink, `[${finding.severity.toUpperCase()}]`);
      lines.push(`${label} ${location(finding)}`);
      lines.push(indent(finding.message));
      if (finding.suggestion) {
        lines.push(ink.dim(indent(`Suggestion: ${finding.suggestion}`)));
      }
      lines.push("");
    }
    lines.push(ink.dim(`${result.findings.length} issue(s) found`));
  }

  const { coverage } = result;
  if (coverage.omittedFindings > 0) {
    lines.push(ink.dim(`${coverage.omittedFindings} more finding(s) omitted by the findings limit`));
  }
  if (coverage.truncatedFiles.length > 0) {
    lines.push(ink.dim(`Truncated: ${coverage.truncatedFiles.join(", ")}`));
  }
  for (const warning of coverage.warnings) {
    lines.push(ink.yellow(`Warning: ${warning}`));
  }
  if (result.degraded) {
    lines.push(ink.yellow(DEGRADED_NOTE));
  }
  return lines.join("\n");
}

export function formatMarkdown(result: ReviewResult): string {
  const lines = [
    "# Code Review",
    "",
    `**Provider:** ${result.provider.name}/${result.provider.model}`,
    "",
    "## Summary",
    "",
    result.summary,
    "",
    "## Issues",
    "",
  ];

  if (result.findings.length === 0) {
    lines.push("No issues found.", "");
  }
  for (const finding of result.findings) {
    lines.push(`### [${finding.severity.toUpperCase()}] ${location(finding)}`, "", finding.message);
    if (finding.suggestion) {
      lines.push("", `**Suggestion:** ${finding.suggestion}`);
    }
    lines.push("");
  }

  const { coverage } = result;
  const notes = [
    ...(coverage.omittedFindings > 0
      ? [`${coverage.omittedFindings} more finding(s) omitted by the findings limit.`]
      : []),
    ...coverage.truncatedFiles.map((file) => `\`${file}\` was truncated.`),
    ...coverage.warnings,
    ...(result.degraded ? [DEGRADED_NOTE] : []),
  ];
  if (notes.length > 0) {
    lines.push("## Notes", "", ...notes.map((note) => `- ${note}`), "");
  }
  return lines.join("\n");
}

export function formatJson(result: ReviewResult): string {
  return JSON.stringify(
    {
      summary: result.summary,
      provider: result.provider,
      degraded: result.degraded,
      findings: result.findings.map((f) => ({
        file: f.file,
        line: f.line ?? null,
        severity: f.severity,
        message: f.message,
        suggestion: f.suggestion ?? null,
      })),
      anomalies: result.anomalies,
      coverage: result.coverage,
    },
    null,
    2
  );
}

function escapeData(value: string): string {
  return value.replace(/%/g, "%25").replace(/\r/g, "%0D").replace(/\n/g, "%0A");
}

function escapeProperty(value: string): string {
  return escapeData(value).replace(/:/g, "%3A").replace(/,/g, "%2C");
}

const ANNOTATION_LEVELS: Record<Severity, string> = {
  high: "error",
  medium: "warning",
  low: "notice",
  info: "notice",
};

/** GitHub Actions workflow commands, one annotation per finding. */
export function formatGithub(result: ReviewResult): string {
  return result.findings
    .map((finding) => {
      const props = [`file=${escapeProperty(finding.file)}`];
      if (finding.line !== undefined) props.push(`line=${finding.line}`);
      const message = finding.suggestion
        ? `${finding.message}\nSuggestion: ${finding.suggestion}`
        : finding.message;
      return `::${ANNOTATION_LEVELS[finding.severity]} ${props.join(",")}::${escapeData(message)}`;
    })
    .join("\n");
}

export function isOutputFormat(value: string): value is OutputFormat {
  const formats: readonly string[] = OUTPUT_FORMATS;
  return formats.includes(value);
}

export function getFormatter(name: string, ink: ChalkInstance = chalk): Formatter {
  if (!isOutputFormat(name)) {
    throw new ConfigError(`Unknown output format: ${name}`, [], `Use one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  switch (name) {
    case "table":
      return (result) => formatTable(result, ink);
    case "markdown":
      return formatMarkdown;
    case "json":
      return formatJson;
    case "github":
      return formatGithub;
  }
}
