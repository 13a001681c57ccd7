/**
 * Normalize a history timestamp to ISO-8601 UTC. Returns undefined when the
 * value is missing or not a date.
 */
export function normalizeTimestamp(value?: string | null): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) return undefined;
  return new Date(ms).toISOString();
}

export function maxTimestamp(
  a?: string | null,
  b?: string | null
): string | undefined {
  if (!a) return b ?? undefined;
  if (!b) return a;
  return a >= b ? a : b;
}
