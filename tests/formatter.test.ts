import { describe, test, expect } from "vitest";
import { Chalk } from "chalk";
import { ConfigError } from "../src/errors.js";
import {
  formatGithub,
  formatJson,
  formatMarkdown,
  formatTable,
  getFormatter,
} from "../src/output/formatter.js";
import type { ReviewResult } from "../src/review/types.js";

const plain = new Chalk({ level: 0 });

const RESULT: ReviewResult = {
  summary: "One issue.",
  findings: [
    {
      severity: "high",
      file: "src/db.ts",
      line: 2,
      message: "User input is concatenated.",
      suggestion: "Use a parameter.",
    },
  ],
  provider: { name: "fake", model: "fake-model", durationMs: 5, attempts: 1 },
  degraded: false,
  anomalies: [],
  coverage: { truncatedFiles: [], warnings: [], omittedFindings: 0 },
};

const EMPTY: ReviewResult = { ...RESULT, summary: "Looks good.", findings: [] };

describe("formatTable", () => {
  test("lists findings with their location", () => {
    expect(formatTable(RESULT, plain)).toBe(
      [
        "Code Review (fake/fake-model)",
        "",
        "One issue.",
        "",
        "[HIGH] src/db.ts:2",
        "  User input is concatenated.",
        "  Suggestion: Use a parameter.",
        "",
        "1 issue(s) found",
      ].join("\n")
    );
  });

  test("reports reduced coverage and degraded results", () => {
    const result: ReviewResult = {
      ...EMPTY,
      degraded: true,
      coverage: { truncatedFiles: ["src/big.ts"], warnings: ["a.bin: skipped (binary file)"], omittedFindings: 2 },
    };
    expect(formatTable(result, plain).split("\n").slice(4)).toEqual([
      "No issues found.",
      "2 more finding(s) omitted by the findings limit",
      "Truncated: src/big.ts",
      "Warning: a.bin: skipped (binary file)",
      "The provider response did not fully follow the expected format; results may be incomplete.",
    ]);
  });
});

describe("formatMarkdown", () => {
  test("renders a report", () => {
    expect(formatMarkdown(RESULT)).toBe(
      [
        "# Code Review",
        "",
        "**Provider:** fake/fake-model",
        "",
        "## Summary",
        "",
        "One issue.",
        "",
        "## Issues",
        "",
        "### [HIGH] src/db.ts:2",
        "",
        "User input is concatenated.",
        "",
        "**Suggestion:** Use a parameter.",
        "",
      ].join("\n")
    );
  });

  test("says when there is nothing to report", () => {
    expect(formatMarkdown(EMPTY).endsWith("## Issues\n\nNo issues found.\n")).toBe(true);
  });
});

describe("formatJson", () => {
  test("serialises findings with explicit nulls", () => {
    const data: unknown = JSON.parse(formatJson({ ...RESULT, findings: [{ severity: "low", file: "a.ts", message: "m" }] }));
    expect(data).toMatchObject({
      summary: "One issue.",
      degraded: false,
      findings: [{ file: "a.ts", line: null, severity: "low", message: "m", suggestion: null }],
      provider: { name: "fake", attempts: 1 },
    });
  });
});

describe("formatGithub", () => {
  test("emits one annotation per finding", () => {
    expect(formatGithub(RESULT)).toBe(
      "::error file=src/db.ts,line=2::User input is concatenated.%0ASuggestion: Use a parameter."
    );
  });

  test("escapes properties and maps severities to levels", () => {
    const result: ReviewResult = {
      ...RESULT,
      findings: [
        { severity: "medium", file: "a,b.ts", message: "100% sure" },
        { severity: "info", file: "c.ts", message: "fyi" },
      ],
    };
    expect(formatGithub(result)).toBe("::warning file=a%2Cb.ts::100%25 sure\n::notice file=c.ts::fyi");
  });
});

describe("getFormatter", () => {
  test("returns the named formatter", () => {
    expect(getFormatter("github")(RESULT)).toBe(formatGithub(RESULT));
    expect(getFormatter("table", plain)(RESULT)).toBe(formatTable(RESULT, plain));
  });

  test("rejects unknown names", () => {
    expect(() => getFormatter("html")).toThrow(ConfigError);
  });
});
