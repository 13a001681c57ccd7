import { createGoogleGenerativeAI } from "@ai-sdk/google";
import {
  APICallError,
  NoObjectGeneratedError,
  Output,
  generateText,
  type LanguageModel,
  type LanguageModelUsage,
} from "ai";
import type { ZodType } from "zod";
import { isAbortError } from "../utils/timeout.js";
import { TransportError, sanitizeErrorText, type TransportFailureReason } from "./errors.js";
import type {
  AnalysisProvider,
  ProviderRequest,
  ProviderResponse,
  TokenUsage,
} from "./provider.js";
import { judgeSchema, verdictSchema } from "./schema.js";

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const own = "code" in error && typeof error.code === "string" ? error.code : undefined;
  if (own) return own;
  const cause = error.cause;
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

function reasonForStatus(status: number | undefined): TransportFailureReason {
  if (status === undefined) return "unknown";
  if (status === 429) return "rate_limited";
  if (status === 401 || status === 403) return "auth";
  if (status === 408) return "timeout";
  if (status >= 500) return "server";
  if (status >= 400) return "bad_request";
  return "unknown";
}

/** Map an AI SDK / fetch failure onto the transport taxonomy. */
export function classifyGeminiError(error: unknown, apiKey?: string): TransportError {
  if (error instanceof TransportError) return error;
  const raw = error instanceof Error ? error.message : String(error);
  const message = sanitizeErrorText(raw, [apiKey]);

  if (APICallError.isInstance(error)) {
    const reason = reasonForStatus(error.statusCode);
    return new TransportError(`Gemini API error${error.statusCode ? ` ${error.statusCode}` : ""}: ${message}`, {
      reason,
      retryable: error.isRetryable || reason === "rate_limited" || reason === "server",
      statusCode: error.statusCode,
    });
  }
  if (isAbortError(error)) {
    return new TransportError(`Gemini request aborted: ${message}`, {
      reason: "unknown",
      retryable: false,
    });
  }
  const code = errorCode(error);
  if ((code && NETWORK_ERROR_CODES.has(code)) || /fetch failed|network|socket hang up/i.test(raw)) {
    return new TransportError(`Gemini network error: ${message}`, {
      reason: "network",
      retryable: true,
    });
  }
  return new TransportError(`Gemini request failed: ${message}`, {
    reason: "unknown",
    retryable: false,
  });
}

/** Response schema Gemini is asked to follow for each kind of request. */
export function responseSchemaFor(purpose: ProviderRequest["purpose"]): ZodType<unknown> {
  return purpose === "judge" ? judgeSchema : verdictSchema;
}

function toTokenUsage(usage: LanguageModelUsage | undefined): TokenUsage {
  return { inputTokens: usage?.inputTokens ?? 0, outputTokens: usage?.outputTokens ?? 0 };
}

/**
 * A reply the SDK could not parse against the response schema is still a
 * reply: hand its text to the validator so it fails as a schema violation.
 */
export function unparsedResponse(
  text: string | undefined,
  usage: LanguageModelUsage | undefined,
  model: string
): ProviderResponse {
  if (!text || text.trim().length === 0) {
    throw new TransportError("Gemini returned an empty response", {
      reason: "empty_response",
      retryable: false,
    });
  }
  return { output: { kind: "text", text }, usage: toTokenUsage(usage), model };
}

export class GeminiAnalysisProvider implements AnalysisProvider {
  name: "gemini" = "gemini";
  private readonly languageModel: LanguageModel;

  constructor(
    private apiKey: string,
    public model: string
  ) {
    const google = createGoogleGenerativeAI({ apiKey });
    this.languageModel = google(model);
  }

  async generate(
    request: ProviderRequest,
    opts: { signal: AbortSignal }
  ): Promise<ProviderResponse> {
    try {
      const result = await generateText({
        model: this.languageModel,
        system: request.system,
        prompt: request.prompt,
        abortSignal: opts.signal,
        // JSON mode with the response schema; the validator still has the last word.
        experimental_output: Output.object({ schema: responseSchemaFor(request.purpose) }),
        // Retries are owned by the caller's policy.
        maxRetries: 0,
      });
      return {
        output: { kind: "json", value: result.experimental_output },
        usage: toTokenUsage(result.usage),
        model: this.model,
      };
    } catch (error) {
      if (NoObjectGeneratedError.isInstance(error)) {
        return unparsedResponse(error.text, error.usage, this.model);
      }
      throw classifyGeminiError(error, this.apiKey);
    }
  }
}
