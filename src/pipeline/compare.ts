import type { AppConfig } from "../config/schema.js";
import type { ProviderFactory } from "../analysis/factory.js";
import { invokeWithPolicy, type InvokePolicy } from "../analysis/invoke.js";
import { buildPriceTable, estimateCost, hasPricing, type PriceTable } from "../analysis/pricing.js";
import { buildAnalysisRequest, buildJudgeRequest } from "../analysis/prompts.js";
import type { ProviderRequest, ProviderResponse } from "../analysis/provider.js";
import type { JudgeVerdict, Verdict } from "../analysis/schema.js";
import { validateJudgeVerdict, validateVerdict } from "../analysis/validate.js";
import { RecordNotFoundError } from "../storage/errors.js";
import type { RecordStore } from "../storage/recordStore.js";
import type { ErrorKind } from "../storage/types.js";
import { logStep, logWarn } from "../utils/logger.js";
import { CancelledError } from "./errors.js";
import { describeFailure } from "./run.js";

export type CompareModels = {
  a: string;
  b: string;
  judge: string;
  judgeFallback?: string;
};

type PassUsage = {
  model: string;
  inputTokens: number;
  outputTokens: number;
};

export type PassResult<T> =
  | ({ ok: true; value: T; cost: number } & PassUsage)
  | ({ ok: false; kind: ErrorKind; error: string; model: string; cost?: number } & Partial<
      Omit<PassUsage, "model">
    >);

export type ComparisonResult = {
  recordId: string;
  a: PassResult<Verdict>;
  b: PassResult<Verdict>;
  /** Absent when either analysis pass failed. */
  judge?: PassResult<JudgeVerdict>;
  totalCost: number;
  /** False when a pass used tokens on a model with no price entry. */
  costComplete: boolean;
};

type CompareSettings = Pick<
  AppConfig,
  "providerTimeoutMs" | "providerRetries" | "retryBaseDelayMs" | "retryMaxDelayMs" | "pricing"
> & { geminiApiKey?: string };

async function runPass<T>(
  factory: ProviderFactory,
  model: string,
  request: ProviderRequest,
  validate: (output: ProviderResponse["output"]) => T,
  policy: InvokePolicy,
  table: PriceTable,
  secrets: (string | undefined)[]
): Promise<PassResult<T>> {
  let response: ProviderResponse | undefined;
  try {
    response = await invokeWithPolicy(factory(model), request, policy);
    const value = validate(response.output);
    const { inputTokens, outputTokens } = response.usage;
    const cost = estimateCost(response.model, inputTokens, outputTokens, table);
    return { ok: true, value, model: response.model, inputTokens, outputTokens, cost };
  } catch (error) {
    if (error instanceof CancelledError) throw error;
    const { kind, detail } = describeFailure(error, secrets);
    if (!response) return { ok: false, kind, error: detail, model };
    const { inputTokens, outputTokens } = response.usage;
    return {
      ok: false,
      kind,
      error: detail,
      model: response.model,
      inputTokens,
      outputTokens,
      cost: hasPricing(response.model, table)
        ? estimateCost(response.model, inputTokens, outputTokens, table)
        : undefined,
    };
  }
}

function failureLabel(pass: PassResult<unknown>): string | undefined {
  return pass.ok ? undefined : `${pass.model} (${pass.kind})`;
}

/**
 * Analyze one record under two model configurations and ask a judge model to
 * pick the better verdict. Read-only: the record's status and stored verdict
 * are never touched.
 */
export async function compareConfigurations(
  store: RecordStore,
  factory: ProviderFactory,
  recordId: string,
  models: CompareModels,
  config: CompareSettings,
  signal?: AbortSignal
): Promise<ComparisonResult> {
  const record = await store.getRecord(recordId);
  if (!record) throw new RecordNotFoundError(recordId);

  const policy: InvokePolicy = {
    timeoutMs: config.providerTimeoutMs,
    retries: config.providerRetries,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
    signal,
  };
  const table = buildPriceTable(config.pricing);
  const secrets = [config.geminiApiKey];
  const request = buildAnalysisRequest(record);

  logStep("analyze", `${recordId}: A=${models.a} B=${models.b}`);
  const [a, b] = await Promise.all([
    runPass(factory, models.a, request, validateVerdict, policy, table, secrets),
    runPass(factory, models.b, request, validateVerdict, policy, table, secrets),
  ]);

  const result: ComparisonResult = { recordId, a, b, totalCost: 0, costComplete: true };

  if (a.ok && b.ok) {
    const judgeRequest = buildJudgeRequest(
      record,
      { label: "A", model: a.model, verdict: a.value },
      { label: "B", model: b.model, verdict: b.value }
    );
    logStep("judge", `${recordId}: judging with ${models.judge}`);
    let judge = await runPass(
      factory,
      models.judge,
      judgeRequest,
      validateJudgeVerdict,
      policy,
      table,
      secrets
    );
    if (!judge.ok && judge.kind === "TransportError" && models.judgeFallback) {
      logWarn(`Judge ${models.judge} unavailable; retrying on ${models.judgeFallback}`);
      judge = await runPass(
        factory,
        models.judgeFallback,
        judgeRequest,
        validateJudgeVerdict,
        policy,
        table,
        secrets
      );
    }
    result.judge = judge;
  } else {
    const failed = [failureLabel(a), failureLabel(b)].filter((label) => label !== undefined);
    logWarn(`${recordId}: judge skipped; failed pass ${failed.join(", ")}`);
  }

  const passes = [result.a, result.b, ...(result.judge ? [result.judge] : [])];
  const total = passes.reduce((sum, pass) => sum + (pass.cost ?? 0), 0);
  result.totalCost = Math.round(total * 1e9) / 1e9;
  result.costComplete = passes.every(
    (pass) => pass.cost !== undefined || pass.inputTokens === undefined
  );
  if (!result.costComplete) {
    logWarn(`${recordId}: total cost leaves out passes on unpriced models`);
  }
  return result;
}

