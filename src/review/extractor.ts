import { readFile, stat } from "node:fs/promises";
import { isAbsolute, join, relative, resolve, sep } from "node:path";
import { glob } from "glob";
import { ExtractionError, GitError } from "../errors.js";
import type { GitClient } from "../git.js";
import { logger } from "../logger.js";
import {
  filterFiles,
  parseDiff,
  syntheticAddedHunk,
  toFileChange,
  type FileDiff,
} from "./differ.js";
import type { ChangeSet, FileChange, ReviewSource } from "./types.js";

export interface ExtractorOptions {
  /** Absolute project root; every ChangeSet path is relative to it. */
  root: string;
  git: GitClient;
  maxLinesPerFile?: number;
  maxFiles?: number;
  ignorePaths?: readonly string[];
}

export const DEFAULT_MAX_LINES_PER_FILE = 400;
export const DEFAULT_MAX_FILES = 50;

export const DEFAULT_EXCLUDES = [
  "node_modules",
  ".git",
  "dist",
  "build",
  "coverage",
  ".next",
  "target",
  "vendor",
  ".venv",
  "__pycache__",
];

const BINARY_SNIFF_BYTES = 8000;
const READ_CONCURRENCY = 16;

type ReadOutcome = { ok: true; diff: FileDiff } | { ok: false; warning: string };

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

function hasGlobMagic(pattern: string): boolean {
  return /[*?[\]{}]/.test(pattern);
}

function isBinary(buffer: Buffer): boolean {
  const limit = Math.min(buffer.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i++) {
    if (buffer[i] === 0) return true;
  }
  return false;
}

function describeReadError(error: unknown): string {
  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") return "not found";
    if (error.code === "EACCES" || error.code === "EPERM") return "permission denied";
    if (error.code === "EISDIR") return "is a directory";
  }
  return "unreadable";
}

export class ContextExtractor {
  private readonly root: string;
  private readonly git: GitClient;
  private readonly maxLinesPerFile: number;
  private readonly maxFiles: number;
  private readonly ignorePaths: readonly string[];

  constructor(options: ExtractorOptions) {
    this.root = resolve(options.root);
    this.git = options.git;
    this.maxLinesPerFile = options.maxLinesPerFile ?? DEFAULT_MAX_LINES_PER_FILE;
    this.maxFiles = options.maxFiles ?? DEFAULT_MAX_FILES;
    this.ignorePaths = options.ignorePaths ?? [];
  }

  async extract(source: ReviewSource): Promise<ChangeSet> {
    switch (source.mode) {
      case "staged":
        return this.extractStaged();
      case "branch":
        return this.extractBranch(source.target);
      case "files":
        return this.extractFiles(source.patterns);
    }
  }

  private async extractStaged(): Promise<ChangeSet> {
    const raw = await this.query(() => this.git.stagedDiff());
    const changeSet = this.assemble("staged", "HEAD", "staged", parseDiff(raw));
    if (changeSet.files.length === 0) {
      throw new ExtractionError("no_changes", "No staged changes to review.", {
        hint: "Stage changes with `git add <path>`, or pass --branch or file patterns.",
      });
    }
    return changeSet;
  }

  private async extractBranch(target: string): Promise<ChangeSet> {
    const targetCommit = await this.query(() => this.git.resolveCommit(target));
    if (!targetCommit) {
      throw new ExtractionError("unresolved_ref", `Cannot resolve branch "${target}".`, {
        hint: "Check the branch name, or fetch it first (e.g. `git fetch origin`).",
      });
    }
    const head = await this.query(() => this.git.resolveCommit("HEAD"));
    if (!head) {
      throw new ExtractionError("unresolved_ref", "Cannot resolve HEAD.", {
        hint: "Create an initial commit before reviewing against a branch.",
      });
    }
    const base = await this.query(() => this.git.mergeBase(head, targetCommit));
    if (!base) {
      throw new ExtractionError(
        "unresolved_ref",
        `No merge base between HEAD and "${target}".`,
        { hint: "The branches share no history; review explicit files instead." }
      );
    }

    const raw = await this.query(() => this.git.diff(base, head));
    const changeSet = this.assemble("branch", target, "HEAD", parseDiff(raw));
    if (changeSet.files.length === 0) {
      throw new ExtractionError("no_changes", `No changes between HEAD and "${target}".`, {
        hint: "The current branch has not diverged from the target.",
      });
    }
    return changeSet;
  }

  private async extractFiles(patterns: readonly string[]): Promise<ChangeSet> {
    const warnings: string[] = [];
    const matched = await this.resolvePatterns(patterns, warnings);
    if (matched.length === 0) {
      throw new ExtractionError("no_files", `No files matched: ${patterns.join(", ")}`, {
        hint: "Use glob patterns relative to the project root, e.g. 'src/**/*.ts'.",
      });
    }

    const candidates = await this.dropGitIgnored(matched, warnings);
    const paths = this.applyLimits(
      candidates.map((path) => ({ path })),
      warnings
    ).map((entry) => entry.path);
    if (paths.length === 0) {
      throw new ExtractionError(
        "no_files",
        `All ${matched.length} matched file(s) are excluded by ignorePaths or .gitignore.`,
        { hint: "Check ignorePaths in .patchreview.yml, or pass narrower patterns." }
      );
    }

    const files: FileDiff[] = [];
    for (const outcome of await this.readAll(paths)) {
      if (outcome.ok) {
        files.push(outcome.diff);
      } else {
        warnings.push(outcome.warning);
      }
    }

    if (files.length === 0) {
      throw new ExtractionError(
        "unreadable",
        `None of the ${paths.length} matched file(s) could be read.`,
        { hint: warnings.slice(0, 3).join("; ") }
      );
    }

    return this.build("files", "N/A", "files", files, warnings);
  }

  // Outside a git work tree there are no ignore rules to apply.
  private async dropGitIgnored(paths: string[], warnings: string[]): Promise<string[]> {
    let ignored: Set<string>;
    try {
      ignored = new Set(await this.git.checkIgnored(paths));
    } catch (err) {
      if (!(err instanceof GitError)) throw err;
      logger.debug("Skipping .gitignore filtering", { error: err.message });
      return paths;
    }
    if (ignored.size === 0) return paths;
    warnings.push(`${ignored.size} file(s) excluded by .gitignore`);
    return paths.filter((path) => !ignored.has(path));
  }

  /** Reads in fixed-size batches; results keep the order of `paths`. */
  private async readAll(paths: readonly string[]): Promise<ReadOutcome[]> {
    const outcomes: ReadOutcome[] = [];
    for (let i = 0; i < paths.length; i += READ_CONCURRENCY) {
      const batch = paths.slice(i, i + READ_CONCURRENCY);
      outcomes.push(...(await Promise.all(batch.map((path) => this.readAsDiff(path)))));
    }
    return outcomes;
  }

  private async resolvePatterns(
    patterns: readonly string[],
    warnings: string[]
  ): Promise<string[]> {
    const seen = new Set<string>();
    const result: string[] = [];
    const ignore = DEFAULT_EXCLUDES.map((dir) => `**/${dir}/**`);

    for (const pattern of patterns) {
      const absolute = isAbsolute(pattern) ? pattern : join(this.root, pattern);
      const shown = toPosix(isAbsolute(pattern) ? relative(this.root, pattern) : pattern);
      let globPattern = pattern;
      if (!hasGlobMagic(pattern)) {
        const info = await stat(absolute).catch(() => null);
        if (info?.isDirectory()) {
          globPattern = `${toPosix(pattern).replace(/\/+$/, "")}/**/*`;
        }
      }

      const matches = await glob(globPattern, {
        cwd: this.root,
        absolute: true,
        nodir: true,
        ignore,
      });
      matches.sort();
      if (matches.length === 0 && !hasGlobMagic(pattern)) {
        warnings.push(`${shown}: skipped (not found)`);
      }

      for (const match of matches) {
        const rel = toPosix(relative(this.root, match));
        if (rel === "" || rel.startsWith("../") || rel === ".." || isAbsolute(rel)) {
          warnings.push(`${shown}: skipped a match outside the project root`);
          continue;
        }
        if (!seen.has(rel)) {
          seen.add(rel);
          result.push(rel);
        }
      }
    }

    return result;
  }

  private async readAsDiff(path: string): Promise<ReadOutcome> {
    let buffer: Buffer;
    try {
      buffer = await readFile(join(this.root, path));
    } catch (err) {
      return { ok: false, warning: `${path}: skipped (${describeReadError(err)})` };
    }
    if (isBinary(buffer)) {
      return { ok: false, warning: `${path}: skipped (binary file)` };
    }
    return {
      ok: true,
      diff: { path, kind: "added", hunks: syntheticAddedHunk(buffer.toString("utf8")) },
    };
  }

  private assemble(
    source: ChangeSet["source"],
    baseRef: string,
    targetRef: string,
    parsed: { files: FileDiff[]; skipped: string[] }
  ): ChangeSet {
    const warnings = [...parsed.skipped];
    const kept = this.applyLimits(parsed.files, warnings);
    return this.build(source, baseRef, targetRef, kept, warnings);
  }

  private applyLimits<T extends { path: string }>(files: readonly T[], warnings: string[]): T[] {
    const { kept, ignored, dropped } = filterFiles(files, this.ignorePaths, this.maxFiles);
    if (ignored > 0) {
      warnings.push(`${ignored} file(s) excluded by ignorePaths`);
    }
    if (dropped > 0) {
      warnings.push(`${dropped} file(s) omitted beyond the ${this.maxFiles}-file limit`);
    }
    return kept;
  }

  private build(
    source: ChangeSet["source"],
    baseRef: string,
    targetRef: string,
    diffs: readonly FileDiff[],
    warnings: readonly string[]
  ): ChangeSet {
    const files: FileChange[] = diffs.map((file) => toFileChange(file, this.maxLinesPerFile));
    for (const file of files) {
      if (file.truncated) {
        logger.debug("Truncated file body", { path: file.path, totalLines: file.totalLines });
      }
    }

    return Object.freeze({
      source,
      baseRef,
      targetRef,
      files: Object.freeze(files),
      warnings: Object.freeze([...warnings]),
    });
  }

  private async query<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof GitError) {
        throw new ExtractionError("git_failed", err.message, {
          hint: "Run patchreview inside a git repository with git on PATH.",
          cause: err,
        });
      }
      throw err;
    }
  }
}
