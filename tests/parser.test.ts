import { describe, test, expect } from "vitest";
import {
  GENERAL_FINDING_PATH,
  normalizeLine,
  normalizeSeverity,
  parseReviewResponse,
} from "../src/review/parser.js";

const STRUCTURED = {
  summary: "One injection risk.",
  findings: [
    {
      file: "src/db.ts",
      line: 12,
      severity: "high",
      message: "SQL query is built by string concatenation.",
      suggestion: "Use a parameterised query.",
    },
  ],
};

describe("parseReviewResponse: structured output", () => {
  test("parses a bare JSON object", () => {
    const result = parseReviewResponse(JSON.stringify(STRUCTURED));
    expect(result.kind).toBe("structured");
    expect(result.summary).toBe("One injection risk.");
    expect(result.findings).toEqual([
      {
        severity: "high",
        file: "src/db.ts",
        line: 12,
        message: "SQL query is built by string concatenation.",
        suggestion: "Use a parameterised query.",
      },
    ]);
    expect(result.anomalies).toEqual([]);
  });

  test("finds JSON inside a fenced block surrounded by prose", () => {
    const raw = `Here is my review:\n\n\`\`\`json\n${JSON.stringify(STRUCTURED, null, 2)}\n\`\`\`\n\nThanks!`;
    const result = parseReviewResponse(raw);
    expect(result.kind).toBe("structured");
    expect(result.findings).toHaveLength(1);
    expect(result.anomalies).toEqual([]);
  });

  test("finds JSON embedded in prose without a fence", () => {
    const raw = `Sure. {"note": 1} is not it, but this is: ${JSON.stringify(STRUCTURED)} Done.`;
    const result = parseReviewResponse(raw);
    expect(result.kind).toBe("structured");
    expect(result.summary).toBe("One injection risk.");
  });

  test("accepts a bare array of findings", () => {
    const raw = '[{"file": "a.ts", "severity": "low", "message": "Rename x."}]';
    const result = parseReviewResponse(raw);
    expect(result.kind).toBe("structured");
    expect(result.summary).toBe("No summary provided.");
    expect(result.findings).toEqual([{ severity: "low", file: "a.ts", message: "Rename x." }]);
  });

  test("accepts the comments envelope with path and body fields", () => {
    const raw = JSON.stringify({
      summary: "s",
      comments: [{ path: "a.ts", line: 3, severity: "nitpick", body: "Rename this." }],
    });
    const result = parseReviewResponse(raw);
    expect(result.findings).toEqual([{ severity: "low", file: "a.ts", line: 3, message: "Rename this." }]);
    expect(result.anomalies).toEqual([]);
  });

  test("repairs a response cut off mid-finding", () => {
    const raw =
      '{"summary":"s","findings":[{"file":"a.ts","severity":"high","message":"one"},{"file":"b.ts","sev';
    const result = parseReviewResponse(raw);
    expect(result.kind).toBe("structured");
    expect(result.findings).toEqual([{ severity: "high", file: "a.ts", message: "one" }]);
    expect(result.anomalies.map((a) => a.kind)).toEqual(["truncated_response"]);
  });

  test("maps severity aliases without recording anomalies", () => {
    const raw = JSON.stringify({
      summary: "s",
      findings: [
        { file: "a.ts", severity: "CRITICAL", message: "m1" },
        { file: "a.ts", severity: "warning", message: "m2" },
        { file: "a.ts", severity: "nit", message: "m3" },
        { file: "a.ts", severity: "[note]", message: "m4" },
      ],
    });
    const result = parseReviewResponse(raw);
    expect(result.findings.map((f) => f.severity)).toEqual(["high", "medium", "low", "info"]);
    expect(result.anomalies).toEqual([]);
  });

  test("coerces unknown and missing severities to info with anomalies", () => {
    const raw = JSON.stringify({
      summary: "s",
      findings: [
        { file: "a.ts", severity: "urgent", message: "m1" },
        { file: "b.ts", message: "m2" },
      ],
    });
    const result = parseReviewResponse(raw);
    expect(result.findings.map((f) => f.severity)).toEqual(["info", "info"]);
    expect(result.anomalies).toEqual([
      { kind: "unknown_severity", detail: "unknown severity urgent on a.ts; using info", index: 0 },
      { kind: "missing_severity", detail: "finding on b.ts has no severity; using info", index: 1 },
    ]);
  });

  test("drops findings without a file or message", () => {
    const raw = JSON.stringify({
      summary: "s",
      findings: [
        { severity: "high", message: "no file" },
        { file: "a.ts", severity: "high" },
        "not an object",
        { file: "./src/ok.ts", severity: "low", message: "kept" },
      ],
    });
    const result = parseReviewResponse(raw);
    expect(result.findings).toEqual([{ severity: "low", file: "src/ok.ts", message: "kept" }]);
    expect(result.anomalies.map((a) => [a.kind, a.index])).toEqual([
      ["missing_file", 0],
      ["missing_message", 1],
      ["invalid_finding", 2],
    ]);
  });

  test("ignores invalid line numbers", () => {
    const raw = JSON.stringify({
      summary: "s",
      findings: [
        { file: "a.ts", line: 0, severity: "low", message: "m" },
        { file: "b.ts", line: "7", severity: "low", message: "m" },
      ],
    });
    const result = parseReviewResponse(raw);
    expect(result.findings).toEqual([
      { severity: "low", file: "a.ts", message: "m" },
      { severity: "low", file: "b.ts", line: 7, message: "m" },
    ]);
    expect(result.anomalies).toEqual([
      { kind: "invalid_line", detail: "line 0 on a.ts is not a positive integer; ignored", index: 0 },
    ]);
  });

  test("flags a findings key that is not a list", () => {
    const result = parseReviewResponse('{"summary": "s", "findings": "none"}');
    expect(result.kind).toBe("structured");
    expect(result.findings).toEqual([]);
    expect(result.anomalies).toEqual([{ kind: "invalid_envelope", detail: '"findings" is not a list' }]);
  });

  test("returns frozen findings", () => {
    const result = parseReviewResponse(JSON.stringify(STRUCTURED));
    expect(Object.isFrozen(result.findings[0])).toBe(true);
  });
});

describe("parseReviewResponse: heuristic fallback", () => {
  test("reads markdown finding headings", () => {
    const raw = `## Summary
Adds CORS support. One issue.

## Comments

### [WARNING] src/index.ts:5
Missing origin restriction.

### [SUGGESTION] package.json
Pin the version.`;
    const result = parseReviewResponse(raw);
    expect(result.kind).toBe("heuristic");
    expect(result.summary).toBe("Adds CORS support. One issue.");
    expect(result.findings).toEqual([
      { severity: "medium", file: "src/index.ts", line: 5, message: "Missing origin restriction." },
      { severity: "low", file: "package.json", message: "Pin the version." },
    ]);
    expect(result.anomalies).toEqual([
      { kind: "no_structured_block", detail: "no JSON review block found in the response" },
    ]);
  });

  test("keeps the declared severity of a heading", () => {
    const result = parseReviewResponse("### [CRITICAL] src/auth.ts:9\nToken compared with ==.");
    expect(result.kind).toBe("heuristic");
    expect(result.findings).toEqual([
      { severity: "high", file: "src/auth.ts", line: 9, message: "Token compared with ==." },
    ]);
  });

  test("wraps plain text in a single general finding", () => {
    const result = parseReviewResponse("Looks fine to me.\nNothing else to add.");
    expect(result.kind).toBe("heuristic");
    expect(result.summary).toBe("Looks fine to me.");
    expect(result.findings).toEqual([
      { severity: "info", file: GENERAL_FINDING_PATH, message: "Looks fine to me.\nNothing else to add." },
    ]);
  });

  test("explains an empty response", () => {
    const result = parseReviewResponse("   \n");
    expect(result.kind).toBe("heuristic");
    expect(result.summary).toBe("The provider returned an empty response.");
    expect(result.findings).toEqual([]);
  });

  test("skips structured extraction for oversized input", () => {
    const result = parseReviewResponse("x".repeat(1_000_001));
    expect(result.kind).toBe("heuristic");
    expect(result.findings[0]?.message).toHaveLength(4000);
    expect(result.anomalies.map((a) => a.kind)).toEqual(["no_structured_block", "response_too_large"]);
  });

  test("never throws on malformed input", () => {
    const inputs = ["{", "[[[[", '{"summary": }', "```json\n{\"findings\": [", "]]}}", "\u0000\u0001", "null"];
    for (const input of inputs) {
      expect(() => parseReviewResponse(input)).not.toThrow();
    }
  });
});

describe("normalizeSeverity", () => {
  test("is case-insensitive", () => {
    expect(normalizeSeverity("High")).toEqual({ severity: "high" });
  });

  test("rejects non-string values", () => {
    expect(normalizeSeverity(3)).toEqual({ severity: "info", anomaly: "unknown_severity" });
  });
});

describe("normalizeLine", () => {
  test("accepts positive integers and numeric strings", () => {
    expect(normalizeLine(4)).toEqual({ line: 4, invalid: false });
    expect(normalizeLine(" 9 ")).toEqual({ line: 9, invalid: false });
  });

  test("rejects fractions and negatives", () => {
    expect(normalizeLine(1.5)).toEqual({ invalid: true });
    expect(normalizeLine(-2)).toEqual({ invalid: true });
  });

  test("treats null as absent", () => {
    expect(normalizeLine(null)).toEqual({ invalid: false });
  });
});
