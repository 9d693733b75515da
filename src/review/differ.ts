import { minimatch } from "minimatch";
import type { ChangeKind, FileChange } from "./types.js";

export interface FileDiff {
  path: string;
  kind: ChangeKind;
  previousPath?: string;
  hunks: string;
}

export interface ParsedDiff {
  files: FileDiff[];
  skipped: string[];
}

function unquote(path: string): string {
  const trimmed = path.trim();
  if (trimmed.startsWith('"') && trimmed.endsWith('"') && trimmed.length >= 2) {
    return trimmed.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  return trimmed;
}

function headerPath(section: string, marker: "---" | "+++"): string | null {
  const match = new RegExp(`^${marker.replace(/\+/g, "\\+")} (.+)$`, "m").exec(section);
  if (!match?.[1]) return null;
  const value = unquote(match[1]);
  if (value === "/dev/null") return null;
  return value.replace(/^[ab]\//, "");
}

export function parseDiff(rawDiff: string): ParsedDiff {
  const files: FileDiff[] = [];
  const skipped: string[] = [];
  const fileSections = rawDiff.split(/^diff --git /m).filter((s) => s.trim());

  for (const section of fileSections) {
    const pathMatch = section.match(/^"?a\/(.+?)"? "?b\/(.+?)"?$/m);
    if (!pathMatch?.[2]) continue;

    const renameFrom = /^rename from (.+)$/m.exec(section)?.[1];
    const renameTo = /^rename to (.+)$/m.exec(section)?.[1];
    const isNew = /^new file mode /m.test(section);
    const isDeleted = /^deleted file mode /m.test(section);

    const path =
      (renameTo && unquote(renameTo)) ??
      headerPath(section, "+++") ??
      headerPath(section, "---") ??
      pathMatch[2];

    if (/^Binary files .*differ$/m.test(section) || /^GIT binary patch$/m.test(section)) {
      skipped.push(`${path}: binary file skipped`);
      continue;
    }

    const kind: ChangeKind = isNew
      ? "added"
      : isDeleted
        ? "deleted"
        : renameFrom
          ? "renamed"
          : "modified";

    // Extract everything from the first @@ hunk header onwards
    const hunkStart = section.search(/^@@/m);
    if (hunkStart === -1) {
      if (kind === "renamed" && renameFrom) {
        files.push({ path, kind, previousPath: unquote(renameFrom), hunks: "" });
      } else {
        skipped.push(`${path}: no textual changes (mode or metadata only)`);
      }
      continue;
    }

    const hunks = section.slice(hunkStart).replace(/\n+$/, "");
    files.push({
      path,
      kind,
      ...(kind === "renamed" && renameFrom ? { previousPath: unquote(renameFrom) } : {}),
      hunks,
    });
  }

  return { files, skipped };
}

export function filterFiles<T extends { path: string }>(
  files: readonly T[],
  ignorePaths: readonly string[],
  maxFiles: number
): { kept: T[]; ignored: number; dropped: number } {
  const filtered = files.filter((file) => {
    return !ignorePaths.some((pattern) => minimatch(file.path, pattern, { dot: true }));
  });

  const kept = filtered.slice(0, maxFiles);
  return {
    kept,
    ignored: files.length - filtered.length,
    dropped: filtered.length - kept.length,
  };
}

export function truncationMarker(omitted: number): string {
  return `... [truncated: ${omitted} more lines not shown]`;
}

export function truncateBody(
  body: string,
  maxLines: number
): { body: string; truncated: boolean; totalLines: number } {
  const lines = body === "" ? [] : body.split("\n");
  if (lines.length <= maxLines) {
    return { body, truncated: false, totalLines: lines.length };
  }
  const kept = lines.slice(0, maxLines);
  kept.push(truncationMarker(lines.length - maxLines));
  return { body: kept.join("\n"), truncated: true, totalLines: lines.length };
}

/**
 * Renders a whole file as a single "added" hunk so file reviews flow through
 * the same prompt and parser as real diffs.
 */
export function syntheticAddedHunk(content: string): string {
  const text = content.replace(/\r?\n$/, "");
  const lines = text === "" ? [] : text.split(/\r?\n/);
  const header = `@@ -0,0 +${lines.length === 0 ? 0 : 1},${lines.length} @@`;
  return [header, ...lines.map((line) => `+${line}`)].join("\n");
}

export function toFileChange(diff: FileDiff, maxLines: number): FileChange {
  const { body, truncated, totalLines } = truncateBody(diff.hunks, maxLines);
  return Object.freeze({
    path: diff.path,
    kind: diff.kind,
    ...(diff.previousPath ? { previousPath: diff.previousPath } : {}),
    body,
    truncated,
    totalLines,
  });
}
