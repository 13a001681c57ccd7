export type TransportFailureReason =
  | "timeout"
  | "rate_limited"
  | "network"
  | "server"
  | "auth"
  | "bad_request"
  | "empty_response"
  | "unknown";

/** The provider could not be reached or did not produce a response. */
export class TransportError extends Error {
  name = "TransportError";
  constructor(
    message: string,
    public info: {
      reason: TransportFailureReason;
      retryable: boolean;
      statusCode?: number;
    }
  ) {
    super(message);
  }
}

/** Provider output does not satisfy the verdict contract. */
export class SchemaViolation extends Error {
  name = "SchemaViolation";
  constructor(
    public field: string,
    public reason: string
  ) {
    super(`${field}: ${reason}`);
  }
}

export class UnknownModelPricingError extends Error {
  name = "UnknownModelPricingError";
  constructor(public model: string) {
    super(`No pricing configured for model "${model}"`);
  }
}

export function isRetryableTransportError(error: unknown): boolean {
  return error instanceof TransportError && error.info.retryable;
}

export function sanitizeErrorText(
  text: string,
  secrets: (string | undefined)[] = [],
  maxLen = 500
): string {
  let out = text;
  for (const secret of secrets) {
    if (!secret) continue;
    out = out.split(secret).join("[redacted]");
  }
  out = out.replace(/[\r\n\t]+/g, " ").trim();
  if (out.length > maxLen) {
    out = `${out.slice(0, maxLen)}...`;
  }
  return out;
}
