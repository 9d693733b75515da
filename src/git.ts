import { execFile } from "node:child_process";
import { GitError } from "./errors.js";
import { sanitizeMessage } from "./utils/sanitize.js";

/**
 * Read-only queries the extractor needs from version control. Nothing here
 * writes to the index, the working tree or refs.
 */
export interface GitClient {
  /** Unified diff of the index against HEAD. */
  stagedDiff(): Promise<string>;
  /** Commit id for `ref`, or null when it does not name a commit. */
  resolveCommit(ref: string): Promise<string | null>;
  /** Best common ancestor of two commits, or null when there is none. */
  mergeBase(a: string, b: string): Promise<string | null>;
  /** Unified diff between two commits. */
  diff(base: string, head: string): Promise<string>;
  /** The subset of root-relative `paths` that .gitignore rules exclude. */
  checkIgnored(paths: readonly string[]): Promise<string[]>;
}

interface GitRun {
  stdout: string;
  exitCode: number;
}

// Stable, prefix-bearing output regardless of the user's git config.
const DIFF_FLAGS = [
  "--no-color",
  "--no-ext-diff",
  "--find-renames",
  "--src-prefix=a/",
  "--dst-prefix=b/",
];

const MAX_BUFFER = 64 * 1024 * 1024;

function runGit(
  cwd: string,
  args: readonly string[],
  okExitCodes: readonly number[] = [0],
  input?: string
): Promise<GitRun> {
  const fullArgs = ["-c", "core.quotepath=off", ...args];
  return new Promise((resolve, reject) => {
    const child = execFile(
      "git",
      fullArgs,
      { cwd, maxBuffer: MAX_BUFFER, encoding: "utf8" },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, exitCode: 0 });
          return;
        }
        const exitCode = typeof error.code === "number" ? error.code : null;
        if (exitCode !== null && okExitCodes.includes(exitCode)) {
          resolve({ stdout, exitCode });
          return;
        }
        const detail = sanitizeMessage(stderr.trim() || error.message, { root: cwd });
        reject(
          new GitError(args, exitCode, `git ${args[0] ?? ""} failed: ${detail}`)
        );
      }
    );
    if (input !== undefined) {
      child.stdin?.end(input);
    }
  });
}

export function createGitClient(cwd: string): GitClient {
  return {
    async stagedDiff() {
      const { stdout } = await runGit(cwd, ["diff", "--cached", ...DIFF_FLAGS]);
      return stdout;
    },

    async resolveCommit(ref) {
      const { stdout, exitCode } = await runGit(
        cwd,
        ["rev-parse", "--verify", "--quiet", "--end-of-options", `${ref}^{commit}`],
        [1]
      );
      return exitCode === 0 ? stdout.trim() || null : null;
    },

    async mergeBase(a, b) {
      const { stdout, exitCode } = await runGit(cwd, ["merge-base", a, b], [1]);
      return exitCode === 0 ? stdout.trim() || null : null;
    },

    async diff(base, head) {
      const { stdout } = await runGit(cwd, ["diff", ...DIFF_FLAGS, base, head, "--"]);
      return stdout;
    },

    // Exit status 1 means nothing matched an ignore rule.
    async checkIgnored(paths) {
      if (paths.length === 0) return [];
      const { stdout } = await runGit(
        cwd,
        ["check-ignore", "--stdin", "-z"],
        [1],
        paths.join("\0")
      );
      return stdout.split("\0").filter((path) => path.length > 0);
    },
  };
}
