import OpenAI from "openai";
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

export class OpenAIProvider implements ReviewProvider {
  readonly name = "openai";
  readonly defaultModel = "gpt-4o-mini";
  readonly model: string;

  private readonly options: ProviderOptions;
  private client: OpenAI | null = null;

  constructor(options: ProviderOptions = {}) {
    this.options = options;
    this.model = options.model ?? this.defaultModel;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.options.apiKey);
  }

  private getClient(): OpenAI {
    if (!this.options.apiKey) {
      throw new ProviderError({
        provider: this.name,
        kind: "unavailable",
        message: "openai: OPENAI_API_KEY is not set",
        hint: "Set OPENAI_API_KEY or choose another provider.",
      });
    }
    this.client ??= new OpenAI({
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

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          temperature: 0.1,
          // JSON mode; the system prompt already asks for a JSON object.
          response_format: { type: "json_object" },
          max_tokens: this.options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        },
        { signal: options.signal }
      );
    } catch (err) {
      throw toProviderError(this.name, err);
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw malformedResponse(this.name, "completion has no message content");
    }

    return Object.freeze({
      text: content,
      provider: this.name,
      model: response.model || this.model,
      durationMs: Date.now() - started,
      ...(response.usage
        ? {
            usage: {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
            },
          }
        : {}),
    });
  }
}
