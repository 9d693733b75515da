import type { Severity } from "../review/types.js";
import { extensionOf, isCommentLine, type Rule, type RuleMatch } from "./types.js";

const JS_DEBUG = /^\s*(?:console\.(?:log|debug|warn|error|trace|info)\s*\(|debugger\b)/;

const DEBUG_PATTERNS: Readonly<Record<string, RegExp>> = {
  ".js": JS_DEBUG,
  ".jsx": JS_DEBUG,
  ".ts": JS_DEBUG,
  ".tsx": JS_DEBUG,
  ".py": /^\s*(?:print\s*\(|breakpoint\s*\(|import\s+pdb|pdb\.set_trace\s*\()/,
  ".go": /^\s*(?:fmt\.Print|log\.Print)/,
  ".rb": /^\s*(?:puts\s|p\s+[^=]|pp\s|binding\.pry)/,
};

export const debugStatementRule: Rule = {
  id: "QUA001",
  name: "debug-statement",
  focus: "bugs",
  check(path, lines) {
    const pattern = DEBUG_PATTERNS[extensionOf(path)];
    if (!pattern) return [];
    return lines
      .filter(({ text }) => !isCommentLine(text) && pattern.test(text))
      .map(({ number }): RuleMatch => ({
        line: number,
        severity: "medium",
        message: "Debug statement found",
        suggestion: "Remove debug statements before committing",
      }));
  },
};

const MARKER_COMMENT = /(?:^|\s)(?:#|\/\/|\/\*|\*|<!--|--)\s*(TODO|FIXME|HACK|XXX|BUG|OPTIMIZE)[\s:(\[]/i;

const MARKER_SEVERITY: Readonly<Record<string, Severity>> = {
  TODO: "info",
  FIXME: "medium",
  HACK: "medium",
  XXX: "medium",
  BUG: "high",
  OPTIMIZE: "low",
};

export const markerCommentRule: Rule = {
  id: "QUA002",
  name: "todo-comment",
  focus: "bugs",
  check(_path, lines) {
    const matches: RuleMatch[] = [];
    for (const { number, text } of lines) {
      const keyword = MARKER_COMMENT.exec(text)?.[1]?.toUpperCase();
      if (!keyword) continue;
      matches.push({
        line: number,
        severity: MARKER_SEVERITY[keyword] ?? "info",
        message: `${keyword} comment found`,
        suggestion: `Address the ${keyword} before merging or open a tracking issue`,
      });
    }
    return matches;
  },
};

const COMMENTED_CODE = [
  /^\s*#\s*(?:def|class|if|for|while|return|import|from)\s/,
  /^\s*\/\/\s*(?:function|const|let|var|if|for|while|return|import|func|type)\s/,
  /^\s*(?:#|\/\/)\s*\w+\s*=/,
  /^\s*(?:#|\/\/)\s*\w+\(/,
];

const MIN_COMMENTED_BLOCK = 3;

function isCommentContinuation(text: string): boolean {
  const trimmed = text.trim();
  return (
    (trimmed.startsWith("#") && trimmed.length > 1) ||
    (trimmed.startsWith("//") && trimmed.length > 2)
  );
}

/** Reports runs of three or more comment lines that open with something code-shaped. */
export const commentedCodeRule: Rule = {
  id: "QUA003",
  name: "commented-code",
  focus: "style",
  check(_path, lines) {
    const matches: RuleMatch[] = [];
    let i = 0;
    while (i < lines.length) {
      const start = lines[i];
      if (start && COMMENTED_CODE.some((pattern) => pattern.test(start.text))) {
        let end = i + 1;
        while (end < lines.length && isCommentContinuation(lines[end]?.text ?? "")) end++;
        const length = end - i;
        if (length >= MIN_COMMENTED_BLOCK) {
          matches.push({
            line: start.number,
            severity: "low",
            message: `Block of ${length} commented-out lines`,
            suggestion: "Remove commented-out code or restore it",
          });
          i = end;
          continue;
        }
      }
      i++;
    }
    return matches;
  },
};
