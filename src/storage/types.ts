import type { Verdict } from "../analysis/schema.js";

export const RECORD_STATUSES = [
  "PENDING",
  "IN_PROGRESS",
  "ANALYZED",
  "ERROR",
  "SKIPPED",
] as const;
export type RecordStatus = (typeof RECORD_STATUSES)[number];

export type TranscriptStatus = "MISSING" | "FETCHED" | "UNAVAILABLE";

export type ErrorKind =
  | "TransportError"
  | "SchemaViolation"
  | "UnknownModelPricing"
  | "Internal";

export type SkipReason =
  | "missing_url"
  | "unparseable_video_id"
  | "unsupported_source";

/** Mutable descriptive fields; the only ones re-ingestion may change. */
export type RecordMetadata = {
  title: string;
  channelId?: string;
  channelName: string;
  channelUrl: string;
  /** Watch time of the entry these values were taken from. */
  seenAt?: string;
};

export type DerivedIndices = {
  safetyScore: number;
  primaryGenre: string;
  isSlop: boolean;
  isBrainrot: boolean;
  isShort: boolean;
};

export type ContentRecord = {
  id: string;
  url: string;
  title: string;
  channelId?: string;
  channelName: string;
  channelUrl: string;
  watchedAt?: string;
  metadataSeenAt?: string;
  transcriptText?: string;
  transcriptStatus: TranscriptStatus;
  status: RecordStatus;
  skipReason?: SkipReason;
  errorKind?: ErrorKind;
  errorDetail?: string;
  claimedAt?: string;
  claimToken?: string;
  attempts: number;
  modelUsed?: string;
  schemaVersion?: string;
  /** Persona version the verdict was produced under. */
  promptVersion?: string;
  inputTokens?: number;
  outputTokens?: number;
  estimatedCost?: number;
  indices?: DerivedIndices;
  analysisPayload?: Verdict;
  analyzedAt?: string;
  createdAt: string;
  updatedAt: string;
};

export type NewRecord = {
  id: string;
  url: string;
  status: "PENDING" | "SKIPPED";
  skipReason?: SkipReason;
  watchedAt?: string;
  metadata: RecordMetadata;
};

export type AnalysisOutcome = {
  verdict: Verdict;
  indices: DerivedIndices;
  modelUsed: string;
  schemaVersion: string;
  promptVersion: string;
  inputTokens: number;
  outputTokens: number;
  estimatedCost: number;
};

export type FailureOutcome = {
  kind: ErrorKind;
  detail: string;
  modelUsed?: string;
  inputTokens?: number;
  outputTokens?: number;
};

export type StatusCounts = Record<RecordStatus, number>;

export type UsageTotals = {
  inputTokens: number;
  outputTokens: number;
  estimatedCost: number;
};
