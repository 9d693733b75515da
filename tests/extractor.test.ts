import { afterAll, beforeAll, describe, test, expect } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GitError } from "../src/errors.js";
import type { GitClient } from "../src/git.js";
import { ContextExtractor } from "../src/review/extractor.js";

const STAGED_DIFF = `diff --git a/src/db.ts b/src/db.ts
index 1111111..2222222 100644
--- a/src/db.ts
+++ b/src/db.ts
@@ -1,2 +1,2 @@
 export function find(id: string) {
-  return db.query("SELECT * FROM users WHERE id = $1", [id]);
+  return db.query("SELECT * FROM users WHERE id = '" + id + "'");
`;

function stubGit(overrides: Partial<GitClient> = {}): GitClient & { diffCalls: string[][] } {
  const diffCalls: string[][] = [];
  const refs: Record<string, string> = { main: "aaa111", HEAD: "bbb222" };
  return {
    diffCalls,
    stagedDiff: async () => STAGED_DIFF,
    resolveCommit: async (ref) => refs[ref] ?? null,
    mergeBase: async () => "ccc333",
    diff: async (base, head) => {
      diffCalls.push([base, head]);
      return STAGED_DIFF;
    },
    checkIgnored: async () => [],
    ...overrides,
  };
}

let base: string;
let root: string;

beforeAll(async () => {
  base = await mkdtemp(join(tmpdir(), "patchreview-extractor-"));
  root = join(base, "project");
  await mkdir(join(root, "src", "lib"), { recursive: true });
  await mkdir(join(root, "node_modules", "dep"), { recursive: true });
  await writeFile(join(root, "src", "a.ts"), "export const a = 1;\n");
  await writeFile(join(root, "src", "b.ts"), "line1\nline2\n");
  await writeFile(join(root, "src", "lib", "c.ts"), "c\n");
  await writeFile(join(root, "node_modules", "dep", "index.js"), "module.exports = 1;\n");
  await writeFile(join(root, "image.bin"), Buffer.from([0x89, 0x50, 0x00, 0x01]));
  await writeFile(join(root, "README.md"), "# Title\n");
  await writeFile(join(base, "outside.ts"), "export {};\n");
  await mkdir(join(root, "gen"), { recursive: true });
  await writeFile(join(root, "gen", "blob.bin"), Buffer.from([0x00, 0x01, 0x02]));
  await mkdir(join(root, "many"), { recursive: true });
  for (let i = 0; i < 20; i++) {
    await writeFile(join(root, "many", `f${String(i).padStart(2, "0")}.ts`), `export const n = ${i};\n`);
  }
});

afterAll(async () => {
  await rm(base, { recursive: true, force: true });
});

describe("ContextExtractor: files mode", () => {
  test("expands a directory into added entries in lexical order", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    const changeSet = await extractor.extract({ mode: "files", patterns: ["src"] });

    expect(changeSet.source).toBe("files");
    expect(changeSet.baseRef).toBe("N/A");
    expect(changeSet.targetRef).toBe("files");
    expect(changeSet.files.map((f) => f.path)).toEqual(["src/a.ts", "src/b.ts", "src/lib/c.ts"]);
    expect(changeSet.files.every((f) => f.kind === "added")).toBe(true);
    expect(changeSet.files[0]).toEqual({
      path: "src/a.ts",
      kind: "added",
      body: "@@ -0,0 +1,1 @@\n+export const a = 1;",
      truncated: false,
      totalLines: 2,
    });
    expect(changeSet.warnings).toEqual([]);
  });

  test("keeps pattern order and drops duplicates", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    const changeSet = await extractor.extract({
      mode: "files",
      patterns: ["src/lib/c.ts", "src/*.ts", "src/a.ts"],
    });
    expect(changeSet.files.map((f) => f.path)).toEqual(["src/lib/c.ts", "src/a.ts", "src/b.ts"]);
  });

  test("re-extracting the same files yields an equal change set", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    const first = await extractor.extract({ mode: "files", patterns: ["src/**/*.ts"] });
    const second = await extractor.extract({ mode: "files", patterns: ["src/**/*.ts"] });
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.files)).toBe(true);
  });

  test("skips missing and binary files with warnings", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    const changeSet = await extractor.extract({
      mode: "files",
      patterns: ["missing.ts", "image.bin", "README.md"],
    });
    expect(changeSet.files.map((f) => f.path)).toEqual(["README.md"]);
    expect(changeSet.warnings).toEqual([
      "missing.ts: skipped (not found)",
      "image.bin: skipped (binary file)",
    ]);
  });

  test("skips matches outside the project root", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    const changeSet = await extractor.extract({
      mode: "files",
      patterns: [join(base, "outside.ts"), "src/a.ts"],
    });
    expect(changeSet.files.map((f) => f.path)).toEqual(["src/a.ts"]);
    expect(changeSet.warnings).toEqual(["../outside.ts: skipped a match outside the project root"]);
  });

  test("applies ignorePaths and the file cap", async () => {
    const extractor = new ContextExtractor({
      root,
      git: stubGit(),
      ignorePaths: ["src/lib/**"],
      maxFiles: 1,
    });
    const changeSet = await extractor.extract({ mode: "files", patterns: ["src"] });
    expect(changeSet.files.map((f) => f.path)).toEqual(["src/a.ts"]);
    expect(changeSet.warnings).toEqual([
      "1 file(s) excluded by ignorePaths",
      "1 file(s) omitted beyond the 1-file limit",
    ]);
  });

  test("fails with no_files when ignorePaths excludes every match", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit(), ignorePaths: ["gen/**"] });
    await expect(extractor.extract({ mode: "files", patterns: ["gen"] })).rejects.toMatchObject({
      name: "ExtractionError",
      reason: "no_files",
      message: "All 1 matched file(s) are excluded by ignorePaths or .gitignore.",
    });
  });

  test("does not read files excluded by ignorePaths", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit(), ignorePaths: ["gen/**"] });
    const changeSet = await extractor.extract({ mode: "files", patterns: ["gen", "src/a.ts"] });
    expect(changeSet.files.map((f) => f.path)).toEqual(["src/a.ts"]);
    expect(changeSet.warnings).toEqual(["1 file(s) excluded by ignorePaths"]);
  });

  test("does not read files beyond the cap", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit(), maxFiles: 1 });
    const changeSet = await extractor.extract({ mode: "files", patterns: ["src/a.ts", "gen/blob.bin"] });
    expect(changeSet.files.map((f) => f.path)).toEqual(["src/a.ts"]);
    expect(changeSet.warnings).toEqual(["1 file(s) omitted beyond the 1-file limit"]);
  });

  test("reads many files in input order", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    const changeSet = await extractor.extract({ mode: "files", patterns: ["many"] });
    expect(changeSet.files.map((f) => f.path)).toEqual(
      Array.from({ length: 20 }, (_, i) => `many/f${String(i).padStart(2, "0")}.ts`)
    );
    expect(changeSet.files[19]?.body).toBe("@@ -0,0 +1,1 @@\n+export const n = 19;");
  });

  test("drops files that .gitignore excludes", async () => {
    const asked: string[][] = [];
    const git = stubGit({
      checkIgnored: async (paths) => {
        asked.push([...paths]);
        return paths.filter((path) => path.startsWith("src/lib/"));
      },
    });
    const extractor = new ContextExtractor({ root, git });
    const changeSet = await extractor.extract({ mode: "files", patterns: ["src"] });
    expect(asked).toEqual([["src/a.ts", "src/b.ts", "src/lib/c.ts"]]);
    expect(changeSet.files.map((f) => f.path)).toEqual(["src/a.ts", "src/b.ts"]);
    expect(changeSet.warnings).toEqual(["1 file(s) excluded by .gitignore"]);
  });

  test("fails with no_files when .gitignore excludes every match", async () => {
    const git = stubGit({ checkIgnored: async (paths) => [...paths] });
    const extractor = new ContextExtractor({ root, git });
    await expect(extractor.extract({ mode: "files", patterns: ["src/a.ts"] })).rejects.toMatchObject({
      reason: "no_files",
    });
  });

  test("reviews every match outside a git work tree", async () => {
    const git = stubGit({
      checkIgnored: async () => {
        throw new GitError(["check-ignore"], 128, "git check-ignore failed: not a git repository");
      },
    });
    const extractor = new ContextExtractor({ root, git });
    const changeSet = await extractor.extract({ mode: "files", patterns: ["src"] });
    expect(changeSet.files.map((f) => f.path)).toEqual(["src/a.ts", "src/b.ts", "src/lib/c.ts"]);
    expect(changeSet.warnings).toEqual([]);
  });

  test("truncates long bodies", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit(), maxLinesPerFile: 2 });
    const changeSet = await extractor.extract({ mode: "files", patterns: ["src/b.ts"] });
    expect(changeSet.files[0]).toEqual({
      path: "src/b.ts",
      kind: "added",
      body: "@@ -0,0 +1,2 @@\n+line1\n... [truncated: 1 more lines not shown]",
      truncated: true,
      totalLines: 3,
    });
  });

  test("fails with no_files when nothing matches", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    await expect(extractor.extract({ mode: "files", patterns: ["**/*.py"] })).rejects.toMatchObject({
      name: "ExtractionError",
      reason: "no_files",
    });
  });

  test("never descends into default excluded directories", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    await expect(extractor.extract({ mode: "files", patterns: ["**/*.js"] })).rejects.toMatchObject({
      reason: "no_files",
    });
  });

  test("fails with unreadable when every match is skipped", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    await expect(extractor.extract({ mode: "files", patterns: ["image.bin"] })).rejects.toMatchObject({
      reason: "unreadable",
    });
  });
});

describe("ContextExtractor: staged mode", () => {
  test("parses the staged diff", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    const changeSet = await extractor.extract({ mode: "staged" });
    expect(changeSet.source).toBe("staged");
    expect(changeSet.baseRef).toBe("HEAD");
    expect(changeSet.targetRef).toBe("staged");
    expect(changeSet.files.map((f) => [f.path, f.kind])).toEqual([["src/db.ts", "modified"]]);
  });

  test("fails with no_changes when nothing is staged", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit({ stagedDiff: async () => "" }) });
    await expect(extractor.extract({ mode: "staged" })).rejects.toMatchObject({ reason: "no_changes" });
  });

  test("wraps git failures", async () => {
    const git = stubGit({
      stagedDiff: async () => {
        throw new GitError(["diff", "--cached"], 128, "git diff --cached failed: not a git repository");
      },
    });
    const extractor = new ContextExtractor({ root, git });
    await expect(extractor.extract({ mode: "staged" })).rejects.toMatchObject({
      reason: "git_failed",
      message: "git diff --cached failed: not a git repository",
    });
  });
});

describe("ContextExtractor: branch mode", () => {
  test("diffs the merge base against HEAD", async () => {
    const git = stubGit();
    const extractor = new ContextExtractor({ root, git });
    const changeSet = await extractor.extract({ mode: "branch", target: "main" });
    expect(git.diffCalls).toEqual([["ccc333", "bbb222"]]);
    expect(changeSet.baseRef).toBe("main");
    expect(changeSet.targetRef).toBe("HEAD");
    expect(changeSet.files).toHaveLength(1);
  });

  test("fails with unresolved_ref for an unknown target", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit() });
    await expect(extractor.extract({ mode: "branch", target: "nope" })).rejects.toMatchObject({
      reason: "unresolved_ref",
    });
  });

  test("fails with no_changes when the branch has not diverged", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit({ diff: async () => "" }) });
    await expect(extractor.extract({ mode: "branch", target: "main" })).rejects.toMatchObject({
      name: "ExtractionError",
      reason: "no_changes",
    });
  });

  test("fails with unresolved_ref when there is no merge base", async () => {
    const extractor = new ContextExtractor({ root, git: stubGit({ mergeBase: async () => null }) });
    await expect(extractor.extract({ mode: "branch", target: "main" })).rejects.toMatchObject({
      reason: "unresolved_ref",
    });
  });
});
