import { ProviderError } from "../errors.js";
import type { ProviderRegistry } from "./registry.js";

export const DETECTION_ORDER = ["anthropic", "openai", "gemini", "ollama"] as const;

export interface ProviderStatus {
  readonly name: string;
  readonly available: boolean;
  readonly reason: string;
  readonly defaultModel?: string;
}

function orderedNames(registry: ProviderRegistry): string[] {
  const preferred: string[] = DETECTION_ORDER.filter((name) => registry.has(name));
  return [...preferred, ...registry.list().filter((name) => !preferred.includes(name))];
}

async function statusOf(registry: ProviderRegistry, name: string): Promise<ProviderStatus> {
  const envVar = registry.envVarFor(name);
  try {
    const provider = await registry.create(name);
    const available = await provider.isAvailable();
    const reason = envVar
      ? `${envVar} ${available ? "set" : "not set"}`
      : available
        ? "reachable"
        : "not reachable";
    return { name, available, reason, defaultModel: provider.defaultModel };
  } catch (err) {
    return { name, available: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/** Availability of every registered provider, in detection order. */
export async function getProviderStatuses(registry: ProviderRegistry): Promise<ProviderStatus[]> {
  return Promise.all(orderedNames(registry).map((name) => statusOf(registry, name)));
}

export function formatStatuses(statuses: readonly ProviderStatus[]): string[] {
  return statuses.map((s) => `  ${s.available ? "[ok]" : "[--]"} ${s.name}: ${s.reason}`);
}

export async function formatUnavailable(registry: ProviderRegistry, failed: string): Promise<string> {
  const lines = [
    `Provider '${failed}' is not available.`,
    "",
    "Provider status:",
    ...formatStatuses(await getProviderStatuses(registry)),
  ];
  return lines.join("\n");
}

/**
 * First usable provider in detection order. Providers are checked one at a
 * time so a configured cloud key wins without touching the local endpoint.
 */
export async function detectProvider(registry: ProviderRegistry): Promise<string> {
  for (const name of orderedNames(registry)) {
    const status = await statusOf(registry, name);
    if (status.available) return name;
  }

  const lines = [
    "No review provider is available.",
    "",
    "Provider status:",
    ...formatStatuses(await getProviderStatuses(registry)),
  ];
  throw new ProviderError({
    provider: "auto",
    kind: "unavailable",
    message: lines.join("\n"),
    hint: "Set ANTHROPIC_API_KEY, OPENAI_API_KEY or GEMINI_API_KEY, or start a local Ollama server.",
  });
}
