import { ProviderError } from "../errors.js";
import { logger } from "../logger.js";
import { formatUnavailable } from "./detection.js";
import type { ProviderOptions, ReviewProvider } from "./types.js";

export type ProviderFactory = (options: ProviderOptions) => Promise<ReviewProvider>;

export interface ProviderRegistration {
  /** Environment variable holding the provider's credential, for status messages. */
  envVar?: string;
  /** npm package the provider module loads, named when the import fails. */
  dependency?: string;
  /** Options every instance starts from (credentials, endpoints, timeouts). */
  options?: ProviderOptions;
}

interface Entry extends ProviderRegistration {
  factory: ProviderFactory;
}

/**
 * Name-to-factory table. Factories import their module on first use, so a
 * provider's SDK is loaded only when that provider is selected.
 */
export class ProviderRegistry {
  private readonly entries = new Map<string, Entry>();

  register(name: string, factory: ProviderFactory, registration: ProviderRegistration = {}): this {
    this.entries.set(name, { factory, ...registration });
    return this;
  }

  list(): string[] {
    return Array.from(this.entries.keys());
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  envVarFor(name: string): string | undefined {
    return this.entries.get(name)?.envVar;
  }

  /** Builds the provider without checking that it can be used. */
  async create(name: string, model?: string): Promise<ReviewProvider> {
    const entry = this.entries.get(name);
    if (!entry) {
      const available = this.list().join(", ") || "none";
      throw new ProviderError({
        provider: name,
        kind: "not_found",
        message: `Provider '${name}' not found. Available: ${available}`,
      });
    }

    try {
      return await entry.factory({ ...entry.options, ...(model ? { model } : {}) });
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      logger.debug("Provider factory failed", { provider: name, error: String(err) });
      const dependency = entry.dependency ? ` (${entry.dependency})` : "";
      throw new ProviderError({
        provider: name,
        kind: "unavailable",
        message: `Provider '${name}' could not be loaded${dependency}: ${
          err instanceof Error ? err.message : String(err)
        }`,
        hint: entry.dependency ? `Install it with: npm install ${entry.dependency}` : undefined,
        cause: err,
      });
    }
  }

  /** Builds the provider and fails with a status report when it is not usable. */
  async resolve(name: string, model?: string): Promise<ReviewProvider> {
    const provider = await this.create(name, model);
    if (await provider.isAvailable()) {
      return provider;
    }
    const envVar = this.envVarFor(name);
    throw new ProviderError({
      provider: name,
      kind: "unavailable",
      message: await formatUnavailable(this, name),
      hint: envVar ? `Set ${envVar} to use ${name}.` : undefined,
    });
  }
}

export interface ProviderEnv {
  OPENAI_API_KEY?: string;
  ANTHROPIC_API_KEY?: string;
  GEMINI_API_KEY?: string;
  OLLAMA_HOST?: string;
  OLLAMA_HEALTH_TIMEOUT_MS?: number;
}

export function createDefaultRegistry(env: ProviderEnv): ProviderRegistry {
  return new ProviderRegistry()
    .register(
      "anthropic",
      async (options) => new (await import("./providers/anthropic.js")).AnthropicProvider(options),
      {
        envVar: "ANTHROPIC_API_KEY",
        dependency: "@anthropic-ai/sdk",
        options: { apiKey: env.ANTHROPIC_API_KEY },
      }
    )
    .register(
      "openai",
      async (options) => new (await import("./providers/openai.js")).OpenAIProvider(options),
      {
        envVar: "OPENAI_API_KEY",
        dependency: "openai",
        options: { apiKey: env.OPENAI_API_KEY },
      }
    )
    .register(
      "gemini",
      async (options) => new (await import("./providers/gemini.js")).GeminiProvider(options),
      {
        envVar: "GEMINI_API_KEY",
        dependency: "@google/generative-ai",
        options: { apiKey: env.GEMINI_API_KEY },
      }
    )
    .register(
      "ollama",
      async (options) => new (await import("./providers/ollama.js")).OllamaProvider(options),
      {
        options: {
          baseUrl: env.OLLAMA_HOST,
          healthTimeoutMs: env.OLLAMA_HEALTH_TIMEOUT_MS,
        },
      }
    );
}
