import { CancelledError } from "../pipeline/errors.js";
import { retry } from "../utils/retry.js";
import { TimeoutError, withTimeout } from "../utils/timeout.js";
import { TransportError, isRetryableTransportError } from "./errors.js";
import type { AnalysisProvider, ProviderRequest, ProviderResponse } from "./provider.js";

export type InvokePolicy = {
  timeoutMs: number;
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: TransportError }) => void;
};

function normalizeError(error: unknown, signal?: AbortSignal): unknown {
  if (signal?.aborted) return new CancelledError();
  if (error instanceof TimeoutError) {
    return new TransportError(`Provider call timed out after ${error.timeoutMs}ms`, {
      reason: "timeout",
      retryable: true,
    });
  }
  return error;
}

/**
 * One provider call under a per-call timeout, retrying retryable transport
 * failures with exponential backoff. Rejects with CancelledError when
 * `policy.signal` aborts, with the last TransportError when retries run out.
 */
export async function invokeWithPolicy(
  provider: AnalysisProvider,
  request: ProviderRequest,
  policy: InvokePolicy
): Promise<ProviderResponse> {
  if (policy.signal?.aborted) throw new CancelledError();
  return retry(
    async () => {
      try {
        return await withTimeout(
          (signal) => provider.generate(request, { signal }),
          policy.timeoutMs,
          policy.signal
        );
      } catch (error) {
        throw normalizeError(error, policy.signal);
      }
    },
    {
      retries: policy.retries,
      baseDelayMs: policy.baseDelayMs,
      maxDelayMs: policy.maxDelayMs,
      signal: policy.signal,
      shouldRetry: isRetryableTransportError,
      onRetry: ({ attempt, delayMs, error }) => {
        if (error instanceof TransportError) policy.onRetry?.({ attempt, delayMs, error });
      },
    }
  ).catch((error: unknown) => {
    throw normalizeError(error, policy.signal);
  });
}
