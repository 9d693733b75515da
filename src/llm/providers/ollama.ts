import { z } from "zod";
import { ProviderError } from "../../errors.js";
import { fromHttpStatus, malformedResponse, toProviderError } from "../errors.js";
import type {
  PromptPayload,
  ProviderOptions,
  ProviderResponse,
  ReviewCallOptions,
  ReviewProvider,
} from "../types.js";
import {
  DEFAULT_HEALTH_TIMEOUT_MS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_TIMEOUT_MS,
} from "./defaults.js";

export const DEFAULT_OLLAMA_HOST = "http://localhost:11434";

const generateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

/** Talks to a local Ollama server over its HTTP API. */
export class OllamaProvider implements ReviewProvider {
  readonly name = "ollama";
  readonly defaultModel = "codellama";
  readonly model: string;

  private readonly host: string;
  private readonly options: ProviderOptions;

  constructor(options: ProviderOptions = {}) {
    this.options = options;
    this.model = options.model ?? this.defaultModel;
    this.host = (options.baseUrl ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, "");
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.host}/api/tags`, {
        signal: AbortSignal.timeout(this.options.healthTimeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async review(prompt: PromptPayload, options: ReviewCallOptions = {}): Promise<ProviderResponse> {
    const started = Date.now();
    const timeout = AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let text: string;
    try {
      const response = await fetch(`${this.host}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          system: prompt.system,
          prompt: prompt.user,
          stream: false,
          format: "json",
          options: {
            temperature: 0.1,
            num_predict: this.options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
          },
        }),
        signal,
      });

      if (!response.ok) {
        const detail = (await response.text()).slice(0, 200);
        throw fromHttpStatus(
          this.name,
          response.status,
          detail,
          response.status === 404 ? `Pull the model first: ollama pull ${this.model}` : undefined
        );
      }
      text = await response.text();
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw toProviderError(this.name, err);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw malformedResponse(this.name, "response body is not JSON");
    }
    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw malformedResponse(this.name, "response body has no \"response\" field");
    }
    const data = parsed.data;
    if (!data.response.trim()) {
      throw malformedResponse(this.name, "response text is empty");
    }

    return Object.freeze({
      text: data.response,
      provider: this.name,
      model: data.model ?? this.model,
      durationMs: Date.now() - started,
      ...(data.prompt_eval_count !== undefined || data.eval_count !== undefined
        ? {
            usage: {
              promptTokens: data.prompt_eval_count ?? 0,
              completionTokens: data.eval_count ?? 0,
            },
          }
        : {}),
    });
  }
}
