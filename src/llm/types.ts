import type { TokenUsage } from "../review/types.js";

export interface PromptPayload {
  /** Reviewer instructions and the output contract. */
  readonly system: string;
  /** The changes under review. */
  readonly user: string;
}

export interface ProviderResponse {
  readonly text: string;
  readonly provider: string;
  readonly model: string;
  readonly durationMs: number;
  readonly usage?: TokenUsage;
}

export interface ReviewCallOptions {
  signal?: AbortSignal;
}

export interface ReviewProvider {
  readonly name: string;
  readonly defaultModel: string;
  readonly model: string;
  /** Resolves false on missing credentials or an unreachable endpoint; never rejects. */
  isAvailable(): Promise<boolean>;
  review(prompt: PromptPayload, options?: ReviewCallOptions): Promise<ProviderResponse>;
}

export interface ProviderOptions {
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  /** Per-request timeout for the model call. */
  timeoutMs?: number;
  /** Timeout for availability checks of local endpoints. */
  healthTimeoutMs?: number;
  maxOutputTokens?: number;
}
