export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  signal?: AbortSignal;
};

export function backoffDelay(
  attempt: number,
  opts: { baseDelayMs: number; maxDelayMs: number }
): number {
  return Math.min(opts.baseDelayMs * 2 ** attempt, opts.maxDelayMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= opts.retries) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === opts.retries) break;
      if (opts.shouldRetry && !opts.shouldRetry(error)) break;
      if (opts.signal?.aborted) break;
      const delay = backoffDelay(attempt, opts);
      opts.onRetry?.({ attempt: attempt + 1, delayMs: delay, error });
      await sleep(delay, opts.signal);
      if (opts.signal?.aborted) break;
      attempt += 1;
    }
  }

  throw lastError;
}
