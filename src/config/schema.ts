import { z } from "zod";

export const providerIdSchema = z.enum(["gemini", "mock"]);
export type ProviderId = z.infer<typeof providerIdSchema>;

export const modelPriceSchema = z.object({
  inputPer1K: z.number().nonnegative(),
  outputPer1K: z.number().nonnegative(),
});

export const configSchema = z.object({
  provider: providerIdSchema.default("gemini"),
  geminiApiKey: z.string().min(1).optional(),
  model: z.string().min(1).default("gemini-2.5-flash-lite"),
  compareModelA: z.string().min(1).default("gemini-2.5-flash-lite"),
  compareModelB: z.string().min(1).default("gemini-3-flash-preview"),
  judgeModel: z.string().min(1).default("gemini-2.5-pro"),
  judgeFallbackModel: z.string().min(1).optional(),
  dbPath: z.string().default("data/viewaudit.db"),
  historyPath: z.string().default("data/watch-history.json"),
  workers: z.number().int().min(1).max(20).default(5),
  providerTimeoutMs: z.number().int().positive().default(120_000),
  providerRetries: z.number().int().nonnegative().default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(1_000),
  retryMaxDelayMs: z.number().int().nonnegative().default(30_000),
  // Age after which an IN_PROGRESS claim may be taken over by another run.
  // Unset: derived from the provider timeout and retry budget.
  staleClaimMs: z.number().int().positive().optional(),
  pricing: z.record(z.string(), modelPriceSchema).default({}),
});

export type AppConfig = z.infer<typeof configSchema>;
