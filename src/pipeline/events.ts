import type { ErrorKind } from "../storage/types.js";
import type { BatchSummary } from "./run.js";

export type PipelineStage =
  | "claim"
  | "request"
  | "invoke"
  | "validate"
  | "account"
  | "persist";

export type PipelineEvent =
  | {
      type: "run:start";
      selection: string;
      candidates: number;
      workers: number;
      model: string;
      timestamp: string;
    }
  | {
      type: "record:start";
      recordId: string;
      title: string;
      index: number;
      total: number;
      timestamp: string;
    }
  | {
      type: "record:stage";
      recordId: string;
      stage: PipelineStage;
      index: number;
      total: number;
      timestamp: string;
    }
  | {
      type: "record:retry";
      recordId: string;
      attempt: number;
      delayMs: number;
      error: string;
      timestamp: string;
    }
  | {
      type: "record:skip";
      recordId: string;
      reason: "claim_lost" | "cancelled";
      index: number;
      total: number;
      timestamp: string;
    }
  | {
      type: "record:done";
      recordId: string;
      index: number;
      total: number;
      completed: number;
      remaining: number;
      safetyScore: number;
      action?: string;
      inputTokens: number;
      outputTokens: number;
      cost: number;
      timestamp: string;
    }
  | {
      type: "record:error";
      recordId: string;
      kind: ErrorKind;
      error: string;
      stage: PipelineStage;
      index: number;
      total: number;
      completed: number;
      remaining: number;
      timestamp: string;
    }
  | {
      type: "record:interrupted";
      recordId: string;
      released: boolean;
      timestamp: string;
    }
  | {
      type: "record:store_failed";
      recordId: string;
      error: string;
      timestamp: string;
    }
  | {
      type: "run:done";
      summary: BatchSummary;
      timestamp: string;
    }
  | {
      type: "run:cancelled";
      summary: BatchSummary;
      timestamp: string;
    }
  | {
      type: "run:error";
      error: string;
      timestamp: string;
    };

export interface PipelineEventEmitter {
  emit(event: PipelineEvent): void;
}
