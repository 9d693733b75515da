import Anthropic from "@anthropic-ai/sdk";
import { ProviderError } from "../../errors.js";
import { malformedResponse, toProviderError } from "../errors.js";
import type {
  PromptPayload,
  ProviderOptions,
  ProviderResponse,
  ReviewCallOptions,
  ReviewProvider,
} from "../types.js";
import { DEFAULT_MAX_OUTPUT_TOKENS, DEFAULT_TIMEOUT_MS } from "./defaults.js";

export class AnthropicProvider implements ReviewProvider {
  readonly name = "anthropic";
  readonly defaultModel = "claude-3-5-sonnet-latest";
  readonly model: string;

  private readonly options: ProviderOptions;
  private client: Anthropic | null = null;

  constructor(options: ProviderOptions = {}) {
    this.options = options;
    this.model = options.model ?? this.defaultModel;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.options.apiKey);
  }

  private getClient(): Anthropic {
    if (!this.options.apiKey) {
      throw new ProviderError({
        provider: this.name,
        kind: "unavailable",
        message: "anthropic: ANTHROPIC_API_KEY is not set",
        hint: "Set ANTHROPIC_API_KEY or choose another provider.",
      });
    }
    this.client ??= new Anthropic({
      apiKey: this.options.apiKey,
      baseURL: this.options.baseUrl,
      timeout: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
    return this.client;
  }

  async review(prompt: PromptPayload, options: ReviewCallOptions = {}): Promise<ProviderResponse> {
    const client = this.getClient();
    const started = Date.now();

    let response: Anthropic.Message;
    try {
      response = await client.messages.create(
        {
          model: this.model,
          max_tokens: this.options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
          system: prompt.system,
          messages: [{ role: "user", content: prompt.user }],
          temperature: 0.1,
        },
        { signal: options.signal }
      );
    } catch (err) {
      throw toProviderError(this.name, err);
    }

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
    if (!text) {
      throw malformedResponse(this.name, "message has no text content");
    }

    return Object.freeze({
      text,
      provider: this.name,
      model: response.model || this.model,
      durationMs: Date.now() - started,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
      },
    });
  }
}
