import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import type { AppConfig } from "../config/schema.js";
import {
  SchemaViolation,
  TransportError,
  UnknownModelPricingError,
  sanitizeErrorText,
} from "../analysis/errors.js";
import { invokeWithPolicy } from "../analysis/invoke.js";
import { buildPriceTable, estimateCost } from "../analysis/pricing.js";
import { PERSONA_VERSION, buildAnalysisRequest } from "../analysis/prompts.js";
import type { AnalysisProvider, ProviderResponse } from "../analysis/provider.js";
import { SCHEMA_VERSION } from "../analysis/schema.js";
import { deriveIndices, validateVerdict } from "../analysis/validate.js";
import type { RecordStore } from "../storage/recordStore.js";
import type { ContentRecord, ErrorKind, FailureOutcome } from "../storage/types.js";
import { logDebug, logError, logInfo, logStep, logWarn } from "../utils/logger.js";
import { backoffDelay } from "../utils/retry.js";
import { CancelledError } from "./errors.js";
import type { PipelineEventEmitter, PipelineStage } from "./events.js";
import { describeSelection, type SelectionPolicy } from "./selection.js";

export type BatchSummary = {
  selection: SelectionPolicy;
  selected: number;
  claimed: number;
  analyzed: number;
  failed: Record<ErrorKind, number>;
  /** Records another run claimed or resolved first. */
  claimLost: number;
  /** Records never claimed because the run was cancelled. */
  cancelled: number;
  /** Claims given back because the run was cancelled mid-call. */
  interrupted: number;
  /**
   * Records whose claim or resolution write failed in the store. A claimed
   * record stays IN_PROGRESS until the stale-claim rule frees it.
   */
  storeFailures: number;
  missing: string[];
  notEligible: string[];
  inputTokens: number;
  outputTokens: number;
  totalCost: number;
  cancelledRun: boolean;
};

export type RunAnalysisOptions = {
  selection: SelectionPolicy;
  signal?: AbortSignal;
  emitter?: PipelineEventEmitter;
  now?: () => Date;
};

type RunSettings = Pick<
  AppConfig,
  | "workers"
  | "providerTimeoutMs"
  | "providerRetries"
  | "retryBaseDelayMs"
  | "retryMaxDelayMs"
  | "staleClaimMs"
  | "pricing"
> & { geminiApiKey?: string };

/**
 * A claim older than this can only belong to a run that crashed: one call
 * plus every retry and backoff fits inside it with a minute to spare.
 */
export function resolveStaleClaimMs(config: RunSettings): number {
  if (config.staleClaimMs !== undefined) return config.staleClaimMs;
  let backoff = 0;
  for (let attempt = 0; attempt < config.providerRetries; attempt += 1) {
    backoff += backoffDelay(attempt, {
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    });
  }
  return config.providerTimeoutMs * (config.providerRetries + 1) + backoff + 60_000;
}

function emptySummary(selection: SelectionPolicy): BatchSummary {
  return {
    selection,
    selected: 0,
    claimed: 0,
    analyzed: 0,
    failed: { TransportError: 0, SchemaViolation: 0, UnknownModelPricing: 0, Internal: 0 },
    claimLost: 0,
    cancelled: 0,
    interrupted: 0,
    storeFailures: 0,
    missing: [],
    notEligible: [],
    inputTokens: 0,
    outputTokens: 0,
    totalCost: 0,
    cancelledRun: false,
  };
}

export function describeFailure(
  error: unknown,
  secrets: (string | undefined)[] = []
): { kind: ErrorKind; detail: string } {
  if (error instanceof TransportError) {
    return {
      kind: "TransportError",
      detail: sanitizeErrorText(`TransportError (${error.info.reason}): ${error.message}`, secrets),
    };
  }
  if (error instanceof SchemaViolation) {
    return {
      kind: "SchemaViolation",
      detail: sanitizeErrorText(`SchemaViolation at ${error.field}: ${error.reason}`, secrets),
    };
  }
  if (error instanceof UnknownModelPricingError) {
    return { kind: "UnknownModelPricing", detail: sanitizeErrorText(error.message, secrets) };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "Internal", detail: sanitizeErrorText(message || "Unknown error", secrets) };
}

/** One-line batch report with every resolution kind counted separately. */
export function formatSummary(summary: BatchSummary): string {
  const failed = Object.entries(summary.failed)
    .map(([kind, count]) => `${kind} ${count}`)
    .join(", ");
  return (
    `Analyzed ${summary.analyzed}/${summary.selected}; failed: ${failed}; ` +
    `claim lost ${summary.claimLost}, cancelled ${summary.cancelled}, interrupted ${summary.interrupted}, ` +
    `store failures ${summary.storeFailures}; ` +
    `tokens ${summary.inputTokens}/${summary.outputTokens}; estimated cost $${summary.totalCost.toFixed(6)}`
  );
}

function shortTitle(title: string): string {
  return title.length > 40 ? `${title.slice(0, 37)}...` : title;
}

/**
 * Analyze a batch of records. Each record is claimed with a compare-and-swap
 * on its status, sent to the provider, validated, priced and resolved to
 * ANALYZED or ERROR. Per-record failures are recorded on the record and
 * counted in the summary; only store failures reject.
 */
export async function runAnalysis(
  store: RecordStore,
  provider: AnalysisProvider,
  config: RunSettings,
  options: RunAnalysisOptions
): Promise<BatchSummary> {
  const { selection, emitter, signal } = options;
  const now = options.now ?? (() => new Date());
  const nowIso = () => now().toISOString();
  const staleClaimMs = resolveStaleClaimMs(config);
  const staleBefore = () => new Date(now().getTime() - staleClaimMs).toISOString();
  const priceTable = buildPriceTable(config.pricing);
  const secrets = [config.geminiApiKey];
  const isCancelled = () => signal?.aborted === true;
  const summary = emptySummary(selection);

  const candidates = await store.selectCandidates(selection, { staleBefore: staleBefore() });
  if (selection.kind === "ids") {
    const known = await store.getRecords(selection.ids);
    const knownIds = new Set(known.map((r) => r.id));
    const candidateIds = new Set(candidates.map((r) => r.id));
    summary.missing = selection.ids.filter((id) => !knownIds.has(id));
    summary.notEligible = selection.ids.filter((id) => knownIds.has(id) && !candidateIds.has(id));
    for (const id of summary.missing) logWarn(`Record ${id} not found`);
    for (const id of summary.notEligible) {
      logWarn(`Record ${id} is not pending; use reset to analyze it again`);
    }
  }

  const total = candidates.length;
  summary.selected = total;
  let completed = 0;

  logStep(
    "select",
    `${total} record(s) selected (${describeSelection(selection)}); model ${provider.model}, ${config.workers} worker(s)`
  );
  emitter?.emit({
    type: "run:start",
    selection: describeSelection(selection),
    candidates: total,
    workers: config.workers,
    model: provider.model,
    timestamp: nowIso(),
  });

  const limit = pLimit(config.workers);

  const processRecord = async (record: ContentRecord, index: number) => {
    if (isCancelled()) {
      summary.cancelled += 1;
      emitter?.emit({
        type: "record:skip",
        recordId: record.id,
        reason: "cancelled",
        index,
        total,
        timestamp: nowIso(),
      });
      return;
    }

    const token = randomUUID();
    const claimed = await store.claim(record.id, { token, staleBefore: staleBefore() });
    if (!claimed) {
      summary.claimLost += 1;
      logStep("skip", `${record.id} is held or resolved by another run`);
      emitter?.emit({
        type: "record:skip",
        recordId: record.id,
        reason: "claim_lost",
        index,
        total,
        timestamp: nowIso(),
      });
      return;
    }
    summary.claimed += 1;
    logDebug(`${record.id} claimed with token ${token}`);

    let stage: PipelineStage = "claim";
    let response: ProviderResponse | undefined;
    const enterStage = (next: PipelineStage) => {
      stage = next;
      emitter?.emit({
        type: "record:stage",
        recordId: record.id,
        stage: next,
        index,
        total,
        timestamp: nowIso(),
      });
    };

    emitter?.emit({
      type: "record:start",
      recordId: record.id,
      title: record.title,
      index,
      total,
      timestamp: nowIso(),
    });

    enterStage("claim");
    try {
      enterStage("request");
      const request = buildAnalysisRequest(record);

      enterStage("invoke");
      response = await invokeWithPolicy(provider, request, {
        timeoutMs: config.providerTimeoutMs,
        retries: config.providerRetries,
        baseDelayMs: config.retryBaseDelayMs,
        maxDelayMs: config.retryMaxDelayMs,
        signal,
        onRetry: ({ attempt, delayMs, error }) => {
          logStep(
            "retry",
            `${record.id} attempt ${attempt + 1} in ${delayMs}ms (${error.info.reason}: ${sanitizeErrorText(error.message, secrets, 120)})`
          );
          emitter?.emit({
            type: "record:retry",
            recordId: record.id,
            attempt,
            delayMs,
            error: sanitizeErrorText(error.message, secrets),
            timestamp: nowIso(),
          });
        },
      });
      summary.inputTokens += response.usage.inputTokens;
      summary.outputTokens += response.usage.outputTokens;

      enterStage("validate");
      const verdict = validateVerdict(response.output);

      enterStage("account");
      const cost = estimateCost(
        response.model,
        response.usage.inputTokens,
        response.usage.outputTokens,
        priceTable
      );

      enterStage("persist");
      const indices = deriveIndices(verdict);
      const persisted = await store.markAnalyzed(record.id, token, {
        verdict,
        indices,
        modelUsed: response.model,
        schemaVersion: SCHEMA_VERSION,
        promptVersion: PERSONA_VERSION,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        estimatedCost: cost,
      });
      if (!persisted) {
        summary.claimLost += 1;
        logWarn(`${record.id}: claim was taken over before the verdict could be saved`);
        return;
      }

      summary.analyzed += 1;
      summary.totalCost += cost;
      completed += 1;
      const action = verdict.verdict?.action;
      logStep(
        "done",
        `${record.id} | ${shortTitle(record.title)} | ${action ?? `score ${indices.safetyScore}`} | ${response.usage.inputTokens}/${response.usage.outputTokens} | $${cost.toFixed(6)}`
      );
      emitter?.emit({
        type: "record:done",
        recordId: record.id,
        index,
        total,
        completed,
        remaining: total - completed,
        safetyScore: indices.safetyScore,
        action,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        cost,
        timestamp: nowIso(),
      });
    } catch (error) {
      if (error instanceof CancelledError) {
        const released = await store.releaseClaim(record.id, token);
        summary.interrupted += 1;
        logStep("skip", `${record.id} interrupted; claim ${released ? "released" : "already gone"}`);
        emitter?.emit({
          type: "record:interrupted",
          recordId: record.id,
          released,
          timestamp: nowIso(),
        });
        return;
      }

      const { kind, detail } = describeFailure(error, secrets);
      const failure: FailureOutcome = {
        kind,
        detail,
        modelUsed: response?.model,
        inputTokens: response?.usage.inputTokens,
        outputTokens: response?.usage.outputTokens,
      };
      const recorded = await store.markError(record.id, token, failure);
      if (!recorded) {
        summary.claimLost += 1;
        logWarn(`${record.id}: claim was taken over before the error could be saved (${detail})`);
        return;
      }
      summary.failed[kind] += 1;
      completed += 1;
      logWarn(`Failed ${record.id} [${stage}]: ${detail}`);
      emitter?.emit({
        type: "record:error",
        recordId: record.id,
        kind,
        error: detail,
        stage,
        index,
        total,
        completed,
        remaining: total - completed,
        timestamp: nowIso(),
      });
    }
  };

  // A failed store write costs its record only; the pool always drains.
  const settleRecord = async (record: ContentRecord, index: number) => {
    try {
      await processRecord(record, index);
    } catch (error) {
      const { detail } = describeFailure(error, secrets);
      summary.storeFailures += 1;
      logError(`${record.id}: store write failed: ${detail}`);
      emitter?.emit({
        type: "record:store_failed",
        recordId: record.id,
        error: detail,
        timestamp: nowIso(),
      });
    }
  };

  const settled = await Promise.allSettled(
    candidates.map((record, i) => limit(() => settleRecord(record, i + 1)))
  );
  const rejected = settled.find(
    (result): result is PromiseRejectedResult => result.status === "rejected"
  );
  if (rejected) {
    const reason: unknown = rejected.reason;
    const message = reason instanceof Error ? reason.message : String(reason);
    emitter?.emit({ type: "run:error", error: message, timestamp: nowIso() });
    throw reason;
  }

  summary.totalCost = Math.round(summary.totalCost * 1e9) / 1e9;
  summary.cancelledRun = isCancelled();

  logInfo(formatSummary(summary));
  emitter?.emit({
    type: summary.cancelledRun ? "run:cancelled" : "run:done",
    summary,
    timestamp: nowIso(),
  });
  return summary;
}
