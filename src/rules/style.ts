import { extensionOf, type Rule, type RuleMatch, type SourceLine } from "./types.js";

const UNCHECKED_LENGTH = new Set([".md", ".json", ".svg", ".lock"]);

export const longLineRule: Rule = {
  id: "STY001",
  name: "long-line",
  focus: "style",
  check(path, lines) {
    if (UNCHECKED_LENGTH.has(extensionOf(path))) return [];
    const matches: RuleMatch[] = [];
    for (const { number, text } of lines) {
      const length = text.length;
      if (length > 150) {
        matches.push({
          line: number,
          severity: "medium",
          message: `Line exceeds 150 characters (${length})`,
          suggestion: "Break this line for better readability",
        });
      } else if (length > 120) {
        matches.push({ line: number, severity: "low", message: `Line exceeds 120 characters (${length})` });
      }
    }
    return matches;
  },
};

const MAX_FUNCTION_LINES = 50;

// `if (x) {` and friends look like method headers; the lookahead keeps them out.
const JS_FUNCTION =
  /^\s*(?:async\s+)?(?:function\s+(\w+)|(?:const|let|var)\s+(\w+)\s*=\s*(?:async\s+)?\([^)]*\)\s*=>|(?!(?:if|for|while|switch|catch)\b)(\w+)\s*\([^)]*\)\s*\{)/;

type Measure = "braces" | "indent" | "ruby";

const FUNCTION_SYNTAX: Readonly<Record<string, { pattern: RegExp; measure: Measure }>> = {
  ".js": { pattern: JS_FUNCTION, measure: "braces" },
  ".jsx": { pattern: JS_FUNCTION, measure: "braces" },
  ".ts": { pattern: JS_FUNCTION, measure: "braces" },
  ".tsx": { pattern: JS_FUNCTION, measure: "braces" },
  ".go": { pattern: /^\s*func\s+(?:\([^)]+\)\s+)?(\w+)\s*\(/, measure: "braces" },
  ".java": {
    pattern:
      /^\s*(?:public|private|protected)?\s*(?:static\s+)?(?:[\w.<>[\]]+\s+)?(?!(?:if|for|while|switch|catch)\b)(\w+)\s*\([^)]*\)\s*\{?/,
    measure: "braces",
  },
  ".py": { pattern: /^\s*(?:async\s+)?def\s+(\w+)\s*\(/, measure: "indent" },
  ".rb": { pattern: /^\s*def\s+(\w+)/, measure: "ruby" },
};

function count(text: string, char: string): number {
  return text.split(char).length - 1;
}

function measureBraces(lines: readonly SourceLine[], start: number): number {
  let depth = 0;
  let opened = false;
  for (let i = start; i < lines.length; i++) {
    const text = lines[i]?.text ?? "";
    if (!opened && text.includes("{")) opened = true;
    if (!opened) continue;
    depth += count(text, "{") - count(text, "}");
    if (depth <= 0) return i - start + 1;
  }
  return opened ? lines.length - start : 1;
}

function indentOf(text: string): number {
  return text.length - text.trimStart().length;
}

function measureIndent(lines: readonly SourceLine[], start: number): number {
  const base = indentOf(lines[start]?.text ?? "");
  for (let i = start + 1; i < lines.length; i++) {
    const text = lines[i]?.text ?? "";
    const trimmed = text.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;
    if (indentOf(text) <= base) return i - start;
  }
  return lines.length - start;
}

const RUBY_BLOCK = /^(?:def|class|module|if|unless|case|while|until|for|begin|do)\b/;

function measureRuby(lines: readonly SourceLine[], start: number): number {
  let depth = 1;
  for (let i = start + 1; i < lines.length; i++) {
    const trimmed = (lines[i]?.text ?? "").trim();
    if (RUBY_BLOCK.test(trimmed)) depth++;
    if (/^end\b/.test(trimmed) && --depth === 0) return i - start + 1;
  }
  return lines.length - start;
}

const MEASURES: Readonly<Record<Measure, (lines: readonly SourceLine[], start: number) => number>> = {
  braces: measureBraces,
  indent: measureIndent,
  ruby: measureRuby,
};

/** Functions are measured within the visible lines only, so a hunk that cuts one short undercounts it. */
export const longFunctionRule: Rule = {
  id: "STY002",
  name: "long-function",
  focus: "style",
  check(path, lines) {
    const syntax = FUNCTION_SYNTAX[extensionOf(path)];
    if (!syntax) return [];
    const matches: RuleMatch[] = [];
    let i = 0;
    while (i < lines.length) {
      const line = lines[i];
      const header = line ? syntax.pattern.exec(line.text) : null;
      if (line && header) {
        const length = MEASURES[syntax.measure](lines, i);
        if (length > MAX_FUNCTION_LINES) {
          const name = header.slice(1).find((group) => group !== undefined) ?? "function";
          matches.push({
            line: line.number,
            severity: "medium",
            message: `Function '${name}' is ${length} lines (max ${MAX_FUNCTION_LINES})`,
            suggestion: "Consider breaking it into smaller functions",
          });
          i += length;
          continue;
        }
      }
      i++;
    }
    return matches;
  },
};
