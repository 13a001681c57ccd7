export class TimeoutError extends Error {
  name = "TimeoutError";
  constructor(public timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function abortError(): Error {
  const error = new Error("Operation aborted");
  error.name = "AbortError";
  return error;
}

/**
 * Runs `operation` with its own AbortSignal that fires on timeout or when
 * `parent` aborts. The returned promise settles on either event even if the
 * operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) throw abortError();

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    onParentAbort = () => {
      const error = abortError();
      reject(error);
      controller.abort(error);
    };
    parent?.addEventListener("abort", onParentAbort, { once: true });
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        const error = new TimeoutError(timeoutMs);
        // Reject first so the race settles with this error, not the
        // operation's own reaction to the abort.
        reject(error);
        controller.abort(error);
      }, timeoutMs);
    }
  });

  try {
    return await Promise.race([operation(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) parent?.removeEventListener("abort", onParentAbort);
  }
}
