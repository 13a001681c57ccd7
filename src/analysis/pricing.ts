import { UnknownModelPricingError } from "./errors.js";

export type ModelPrice = {
  /** USD per 1,000 prompt tokens. */
  inputPer1K: number;
  /** USD per 1,000 completion tokens. */
  outputPer1K: number;
};

export type PriceTable = Readonly<Record<string, ModelPrice>>;

export const DEFAULT_PRICE_TABLE: PriceTable = {
  "gemini-2.5-flash-lite": { inputPer1K: 0.0001, outputPer1K: 0.0004 },
  "gemini-2.5-flash": { inputPer1K: 0.0003, outputPer1K: 0.0025 },
  "gemini-2.5-pro": { inputPer1K: 0.00125, outputPer1K: 0.01 },
  "gemini-3-flash-preview": { inputPer1K: 0.0005, outputPer1K: 0.003 },
  "gemini-3-pro-preview": { inputPer1K: 0.002, outputPer1K: 0.012 },
};

export function normalizeModelId(model: string): string {
  return model.trim().toLowerCase().replace(/^models\//, "");
}

export function buildPriceTable(
  overrides: Record<string, ModelPrice> = {},
  base: PriceTable = DEFAULT_PRICE_TABLE
): PriceTable {
  const table: Record<string, ModelPrice> = { ...base };
  for (const [model, price] of Object.entries(overrides)) {
    table[normalizeModelId(model)] = price;
  }
  return table;
}

export function hasPricing(model: string, table: PriceTable = DEFAULT_PRICE_TABLE): boolean {
  return Object.hasOwn(table, normalizeModelId(model));
}

function assertTokenCount(name: string, value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer (got ${value})`);
  }
}

/**
 * Estimated USD cost of one call. Input and output tokens are priced
 * separately; the result is rounded to 9 decimal places.
 */
export function estimateCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
  table: PriceTable = DEFAULT_PRICE_TABLE
): number {
  assertTokenCount("inputTokens", inputTokens);
  assertTokenCount("outputTokens", outputTokens);
  const key = normalizeModelId(model);
  const price = Object.hasOwn(table, key) ? table[key] : undefined;
  if (!price) throw new UnknownModelPricingError(model);
  const cost =
    (inputTokens / 1000) * price.inputPer1K +
    (outputTokens / 1000) * price.outputPer1K;
  return Math.round(cost * 1e9) / 1e9;
}
