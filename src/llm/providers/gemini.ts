import {
  GoogleGenerativeAI,
  type GenerateContentResult,
  type GenerativeModel,
} from "@google/generative-ai";
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

export class GeminiProvider implements ReviewProvider {
  readonly name = "gemini";
  readonly defaultModel = "gemini-1.5-flash";
  readonly model: string;

  private readonly options: ProviderOptions;

  constructor(options: ProviderOptions = {}) {
    this.options = options;
    this.model = options.model ?? this.defaultModel;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.options.apiKey);
  }

  // The system prompt is bound to the model handle, so one is built per call.
  private getModel(system: string): GenerativeModel {
    if (!this.options.apiKey) {
      throw new ProviderError({
        provider: this.name,
        kind: "unavailable",
        message: "gemini: GEMINI_API_KEY is not set",
        hint: "Set GEMINI_API_KEY or choose another provider.",
      });
    }
    const genAI = new GoogleGenerativeAI(this.options.apiKey);
    return genAI.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: system,
        generationConfig: {
          temperature: 0.1,
          maxOutputTokens: this.options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        },
      },
      {
        timeout: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        ...(this.options.baseUrl ? { baseUrl: this.options.baseUrl } : {}),
      }
    );
  }

  async review(prompt: PromptPayload, options: ReviewCallOptions = {}): Promise<ProviderResponse> {
    const genModel = this.getModel(prompt.system);
    const started = Date.now();

    let result: GenerateContentResult;
    try {
      result = await genModel.generateContent(prompt.user, { signal: options.signal });
    } catch (err) {
      throw toProviderError(this.name, err);
    }

    const response = result.response;
    let text: string;
    try {
      text = response.text();
    } catch (err) {
      // text() throws when the candidate was blocked by safety filters.
      throw malformedResponse(this.name, err instanceof Error ? err.message : String(err));
    }
    if (!text) {
      throw malformedResponse(this.name, "candidate has no text");
    }

    const usage = response.usageMetadata;
    return Object.freeze({
      text,
      provider: this.name,
      model: this.model,
      durationMs: Date.now() - started,
      ...(usage
        ? {
            usage: {
              promptTokens: usage.promptTokenCount ?? 0,
              completionTokens: usage.candidatesTokenCount ?? 0,
            },
          }
        : {}),
    });
  }
}
