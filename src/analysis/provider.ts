import type { ProviderId } from "../config/schema.js";

/** Raw provider output; untrusted until it passes the validator. */
export type ProviderOutput =
  | { kind: "json"; value: unknown }
  | { kind: "text"; text: string };

export type ProviderRequest = {
  purpose: "analysis" | "judge";
  system: string;
  prompt: string;
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
};

export type ProviderResponse = {
  output: ProviderOutput;
  usage: TokenUsage;
  model: string;
};

export interface AnalysisProvider {
  name: ProviderId;
  model: string;
  /**
   * Rejects with TransportError on any failure to obtain a response. Must
   * stop work when `signal` aborts.
   */
  generate(
    request: ProviderRequest,
    opts: { signal: AbortSignal }
  ): Promise<ProviderResponse>;
}
