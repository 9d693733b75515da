import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { formatIssues, type SettingsOverrides } from "./config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";
import { ENGINES, FOCUS_AREAS } from "./review/types.js";

export const CONFIG_FILENAMES = [".patchreview.yml", ".patchreview.yaml"];

const positiveInt = z.number().int().positive();

const projectConfigSchema = z
  .object({
    engine: z.enum(ENGINES).optional(),
    provider: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    mode: z.enum(["full", "critical"]).optional(),
    focus: z.array(z.enum(FOCUS_AREAS)).min(1).optional(),
    styleGuide: z.string().optional(),
    maxFindings: positiveInt.optional(),
    maxLinesPerFile: positiveInt.optional(),
    maxFiles: positiveInt.optional(),
    ignorePaths: z.array(z.string().min(1)).optional(),
    retry: z
      .object({
        maxAttempts: positiveInt.optional(),
        initialDelayMs: z.number().int().nonnegative().optional(),
        maxDelayMs: z.number().int().nonnegative().optional(),
        maxTotalDelayMs: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof projectConfigSchema>;

export interface LoadedProjectConfig {
  path: string;
  config: SettingsOverrides;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isMissing(err)) return null;
    throw new ConfigError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function parseProjectConfig(content: string, source: string): ProjectConfig {
  let data: unknown;
  try {
    data = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${source}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  // An empty file parses to null.
  const result = projectConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}:`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Reads the project configuration. An explicit path must exist; otherwise the
 * first of CONFIG_FILENAMES found in `root` is used, and none at all is fine.
 */
export async function loadProjectConfig(
  root: string,
  explicitPath?: string
): Promise<LoadedProjectConfig | null> {
  if (explicitPath) {
    const path = resolve(root, explicitPath);
    const content = await readIfExists(path);
    if (content === null) {
      throw new ConfigError(`Config file not found: ${explicitPath}`);
    }
    return { path, config: parseProjectConfig(content, explicitPath) };
  }

  for (const filename of CONFIG_FILENAMES) {
    const path = join(root, filename);
    const content = await readIfExists(path);
    if (content === null) continue;
    logger.debug("Loaded project config", { path: filename });
    return { path, config: parseProjectConfig(content, filename) };
  }
  return null;
}
