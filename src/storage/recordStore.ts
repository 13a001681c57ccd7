import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import { verdictSchema } from "../analysis/schema.js";
import type { SelectionPolicy } from "../pipeline/selection.js";
import { CorruptRecordError } from "./errors.js";
import { RECORDS_DDL, type RecordRow } from "./schema.js";
import {
  RECORD_STATUSES,
  type AnalysisOutcome,
  type ContentRecord,
  type ErrorKind,
  type FailureOutcome,
  type NewRecord,
  type RecordMetadata,
  type RecordStatus,
  type SkipReason,
  type StatusCounts,
  type TranscriptStatus,
  type UsageTotals,
} from "./types.js";

// SQLite's default host-parameter limit is 999 on older builds.
const MAX_PARAMS_PER_QUERY = 500;

const ERROR_KINDS: readonly ErrorKind[] = [
  "TransportError",
  "SchemaViolation",
  "UnknownModelPricing",
  "Internal",
];
const SKIP_REASONS: readonly SkipReason[] = [
  "missing_url",
  "unparseable_video_id",
  "unsupported_source",
];
const TRANSCRIPT_STATUSES: readonly TranscriptStatus[] = [
  "MISSING",
  "FETCHED",
  "UNAVAILABLE",
];

function oneOf<T extends string>(
  allowed: readonly T[],
  value: string | null
): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function optional<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

function optionalBool(value: number | null): boolean | undefined {
  return value === null ? undefined : value !== 0;
}

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

function parsePayload(id: string, raw: string) {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new CorruptRecordError(id, "analysis_payload is not JSON");
  }
  const parsed = verdictSchema.safeParse(json);
  if (!parsed.success) {
    throw new CorruptRecordError(id, "analysis_payload does not match the verdict schema");
  }
  return parsed.data;
}

export function rowToRecord(row: RecordRow): ContentRecord {
  const status = oneOf(RECORD_STATUSES, row.status);
  if (!status) throw new CorruptRecordError(row.id, `unknown status ${row.status}`);
  const transcriptStatus = oneOf(TRANSCRIPT_STATUSES, row.transcript_status) ?? "MISSING";

  return {
    id: row.id,
    url: row.url,
    title: row.title,
    channelId: optional(row.channel_id),
    channelName: row.channel_name,
    channelUrl: row.channel_url,
    watchedAt: optional(row.watched_at),
    metadataSeenAt: optional(row.metadata_seen_at),
    transcriptText: optional(row.transcript_text),
    transcriptStatus,
    status,
    skipReason: oneOf(SKIP_REASONS, row.skip_reason),
    errorKind: oneOf(ERROR_KINDS, row.error_kind),
    errorDetail: optional(row.error_detail),
    claimedAt: optional(row.claimed_at),
    claimToken: optional(row.claim_token),
    attempts: row.attempts,
    modelUsed: optional(row.model_used),
    schemaVersion: optional(row.schema_version),
    promptVersion: optional(row.prompt_version),
    inputTokens: optional(row.input_tokens),
    outputTokens: optional(row.output_tokens),
    estimatedCost: optional(row.estimated_cost),
    indices:
      row.safety_score !== null &&
      row.primary_genre !== null &&
      row.is_slop !== null &&
      row.is_brainrot !== null
        ? {
            safetyScore: row.safety_score,
            primaryGenre: row.primary_genre,
            isSlop: row.is_slop !== 0,
            isBrainrot: row.is_brainrot !== 0,
            isShort: optionalBool(row.is_short) ?? false,
          }
        : undefined,
    analysisPayload:
      row.analysis_payload === null ? undefined : parsePayload(row.id, row.analysis_payload),
    analyzedAt: optional(row.analyzed_at),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export type RecordStoreOptions = {
  now?: () => Date;
};

export type ClaimOptions = {
  token: string;
  /** Claims older than this ISO timestamp are treated as abandoned. */
  staleBefore: string;
};

/**
 * Canonical record table. Every status transition is a single conditional
 * UPDATE, so concurrent runs (in this process or others sharing the file)
 * coordinate through the row alone.
 */
export class RecordStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: Database,
    options: RecordStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  static async open(
    filename: string,
    options: RecordStoreOptions = {}
  ): Promise<RecordStore> {
    const isMemory = filename === ":memory:";
    if (!isMemory) mkdirSync(dirname(resolve(filename)), { recursive: true });
    const db = await open({
      filename: isMemory ? filename : resolve(filename),
      driver: sqlite3.Database,
    });
    const store = new RecordStore(db, options);
    await store.init(!isMemory);
    return store;
  }

  async init(fileBacked = true): Promise<void> {
    if (fileBacked) {
      // WAL lets several processes read while one writes.
      await this.db.exec("PRAGMA journal_mode=WAL");
    }
    await this.db.exec("PRAGMA busy_timeout = 5000");
    await this.db.exec(RECORDS_DDL);
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /**
   * Run `fn` inside one write transaction. Statements issued by `fn` must go
   * through this store and must not interleave with unrelated work on the
   * same connection.
   */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    await this.db.exec("BEGIN IMMEDIATE");
    try {
      const result = await fn();
      await this.db.exec("COMMIT");
      return result;
    } catch (error) {
      await this.db.exec("ROLLBACK");
      throw error;
    }
  }

  async getRecord(id: string): Promise<ContentRecord | undefined> {
    const row = await this.db.get<RecordRow>("SELECT * FROM records WHERE id = ?", [id]);
    return row ? rowToRecord(row) : undefined;
  }

  async getRecords(ids: string[]): Promise<ContentRecord[]> {
    const out: ContentRecord[] = [];
    for (const group of chunk(ids, MAX_PARAMS_PER_QUERY)) {
      const placeholders = group.map(() => "?").join(", ");
      const rows = await this.db.all<RecordRow[]>(
        `SELECT * FROM records WHERE id IN (${placeholders})`,
        group
      );
      out.push(...rows.map(rowToRecord));
    }
    return out;
  }

  async listRecords(
    opts: { status?: RecordStatus; limit?: number } = {}
  ): Promise<ContentRecord[]> {
    const where = opts.status ? "WHERE status = ?" : "";
    const limit = opts.limit !== undefined ? "LIMIT ?" : "";
    const params: (string | number)[] = [];
    if (opts.status) params.push(opts.status);
    if (opts.limit !== undefined) params.push(opts.limit);
    const rows = await this.db.all<RecordRow[]>(
      `SELECT * FROM records ${where}
       ORDER BY watched_at IS NULL, watched_at DESC, id ASC ${limit}`,
      params
    );
    return rows.map(rowToRecord);
  }

  async insertRecord(record: NewRecord): Promise<void> {
    const ts = this.timestamp();
    await this.db.run(
      `INSERT INTO records (
         id, url, title, channel_id, channel_name, channel_url,
         watched_at, metadata_seen_at, transcript_status, status, skip_reason,
         created_at, updated_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'MISSING', ?, ?, ?, ?)`,
      [
        record.id,
        record.url,
        record.metadata.title,
        record.metadata.channelId ?? null,
        record.metadata.channelName,
        record.metadata.channelUrl,
        record.watchedAt ?? null,
        record.metadata.seenAt ?? null,
        record.status,
        record.skipReason ?? null,
        ts,
        ts,
      ]
    );
  }

  /** Touches only descriptive columns; status and analysis state are left alone. */
  async updateMetadata(
    id: string,
    metadata: RecordMetadata,
    watchedAt: string | undefined
  ): Promise<boolean> {
    const result = await this.db.run(
      `UPDATE records
         SET title = ?, channel_id = ?, channel_name = ?, channel_url = ?,
             metadata_seen_at = ?, watched_at = ?, updated_at = ?
       WHERE id = ?`,
      [
        metadata.title,
        metadata.channelId ?? null,
        metadata.channelName,
        metadata.channelUrl,
        metadata.seenAt ?? null,
        watchedAt ?? null,
        this.timestamp(),
        id,
      ]
    );
    return result.changes === 1;
  }

  async selectCandidates(
    policy: SelectionPolicy,
    opts: { staleBefore: string }
  ): Promise<ContentRecord[]> {
    const eligible = `(status = 'PENDING' OR (status = 'IN_PROGRESS' AND claimed_at < ?))`;
    const order = "ORDER BY watched_at IS NULL, watched_at DESC, id ASC";

    if (policy.kind === "ids") {
      const out: ContentRecord[] = [];
      for (const group of chunk(policy.ids, MAX_PARAMS_PER_QUERY)) {
        const placeholders = group.map(() => "?").join(", ");
        const rows = await this.db.all<RecordRow[]>(
          `SELECT * FROM records WHERE id IN (${placeholders}) AND ${eligible} ${order}`,
          [...group, opts.staleBefore]
        );
        out.push(...rows.map(rowToRecord));
      }
      return out;
    }

    const limit = policy.kind === "limit" ? "LIMIT ?" : "";
    const params: (string | number)[] = [opts.staleBefore];
    if (policy.kind === "limit") params.push(policy.limit);
    const rows = await this.db.all<RecordRow[]>(
      `SELECT * FROM records WHERE ${eligible} ${order} ${limit}`,
      params
    );
    return rows.map(rowToRecord);
  }

  /**
   * Compare-and-swap PENDING (or stale IN_PROGRESS) → IN_PROGRESS.
   * Returns false when another run holds or has resolved the record.
   */
  async claim(id: string, opts: ClaimOptions): Promise<boolean> {
    const ts = this.timestamp();
    const result = await this.db.run(
      `UPDATE records
         SET status = 'IN_PROGRESS', claimed_at = ?, claim_token = ?,
             attempts = attempts + 1, updated_at = ?
       WHERE id = ?
         AND (status = 'PENDING' OR (status = 'IN_PROGRESS' AND claimed_at < ?))`,
      [ts, opts.token, ts, id, opts.staleBefore]
    );
    return result.changes === 1;
  }

  async markAnalyzed(id: string, token: string, outcome: AnalysisOutcome): Promise<boolean> {
    const ts = this.timestamp();
    const result = await this.db.run(
      `UPDATE records
         SET status = 'ANALYZED', claimed_at = NULL, claim_token = NULL,
             error_kind = NULL, error_detail = NULL,
             analysis_payload = ?, schema_version = ?, prompt_version = ?, model_used = ?,
             input_tokens = ?, output_tokens = ?, estimated_cost = ?,
             safety_score = ?, primary_genre = ?, is_slop = ?, is_brainrot = ?, is_short = ?,
             analyzed_at = ?, updated_at = ?
       WHERE id = ? AND status = 'IN_PROGRESS' AND claim_token = ?`,
      [
        JSON.stringify(outcome.verdict),
        outcome.schemaVersion,
        outcome.promptVersion,
        outcome.modelUsed,
        outcome.inputTokens,
        outcome.outputTokens,
        outcome.estimatedCost,
        outcome.indices.safetyScore,
        outcome.indices.primaryGenre,
        outcome.indices.isSlop ? 1 : 0,
        outcome.indices.isBrainrot ? 1 : 0,
        outcome.indices.isShort ? 1 : 0,
        ts,
        ts,
        id,
        token,
      ]
    );
    return result.changes === 1;
  }

  async markError(id: string, token: string, failure: FailureOutcome): Promise<boolean> {
    const result = await this.db.run(
      `UPDATE records
         SET status = 'ERROR', claimed_at = NULL, claim_token = NULL,
             error_kind = ?, error_detail = ?,
             model_used = COALESCE(?, model_used),
             input_tokens = COALESCE(?, input_tokens),
             output_tokens = COALESCE(?, output_tokens),
             updated_at = ?
       WHERE id = ? AND status = 'IN_PROGRESS' AND claim_token = ?`,
      [
        failure.kind,
        failure.detail,
        failure.modelUsed ?? null,
        failure.inputTokens ?? null,
        failure.outputTokens ?? null,
        this.timestamp(),
        id,
        token,
      ]
    );
    return result.changes === 1;
  }

  /** Give an interrupted claim back so the next run picks the record up at once. */
  async releaseClaim(id: string, token: string): Promise<boolean> {
    const result = await this.db.run(
      `UPDATE records
         SET status = 'PENDING', claimed_at = NULL, claim_token = NULL, updated_at = ?
       WHERE id = ? AND status = 'IN_PROGRESS' AND claim_token = ?`,
      [this.timestamp(), id, token]
    );
    return result.changes === 1;
  }

  /**
   * Operator re-analysis: ANALYZED or ERROR records go back to PENDING with
   * verdict, indices, provenance and error cleared.
   */
  async resetToPending(target: { ids: string[] } | { status: "ERROR" | "ANALYZED" }): Promise<number> {
    const clear = `
      SET status = 'PENDING', error_kind = NULL, error_detail = NULL,
          analysis_payload = NULL, schema_version = NULL, prompt_version = NULL, model_used = NULL,
          input_tokens = NULL, output_tokens = NULL, estimated_cost = NULL,
          safety_score = NULL, primary_genre = NULL, is_slop = NULL,
          is_brainrot = NULL, is_short = NULL, analyzed_at = NULL, updated_at = ?`;
    if ("status" in target) {
      const result = await this.db.run(`UPDATE records ${clear} WHERE status = ?`, [
        this.timestamp(),
        target.status,
      ]);
      return result.changes ?? 0;
    }
    let changed = 0;
    for (const group of chunk(target.ids, MAX_PARAMS_PER_QUERY)) {
      const placeholders = group.map(() => "?").join(", ");
      const result = await this.db.run(
        `UPDATE records ${clear}
         WHERE id IN (${placeholders}) AND status IN ('ANALYZED', 'ERROR')`,
        [this.timestamp(), ...group]
      );
      changed += result.changes ?? 0;
    }
    return changed;
  }

  async attachTranscript(id: string, text: string): Promise<boolean> {
    const result = await this.db.run(
      `UPDATE records SET transcript_text = ?, transcript_status = 'FETCHED', updated_at = ?
       WHERE id = ?`,
      [text, this.timestamp(), id]
    );
    return result.changes === 1;
  }

  async markTranscriptUnavailable(id: string): Promise<boolean> {
    const result = await this.db.run(
      `UPDATE records SET transcript_text = NULL, transcript_status = 'UNAVAILABLE', updated_at = ?
       WHERE id = ?`,
      [this.timestamp(), id]
    );
    return result.changes === 1;
  }

  async countByStatus(): Promise<StatusCounts> {
    const rows = await this.db.all<{ status: string; n: number }[]>(
      "SELECT status, COUNT(*) AS n FROM records GROUP BY status"
    );
    const counts: StatusCounts = {
      PENDING: 0,
      IN_PROGRESS: 0,
      ANALYZED: 0,
      ERROR: 0,
      SKIPPED: 0,
    };
    for (const row of rows) {
      const status = oneOf(RECORD_STATUSES, row.status);
      if (status) counts[status] = row.n;
    }
    return counts;
  }

  async totals(): Promise<UsageTotals> {
    const row = await this.db.get<{
      input_tokens: number | null;
      output_tokens: number | null;
      estimated_cost: number | null;
    }>(
      `SELECT SUM(input_tokens) AS input_tokens, SUM(output_tokens) AS output_tokens,
              SUM(estimated_cost) AS estimated_cost
       FROM records`
    );
    return {
      inputTokens: row?.input_tokens ?? 0,
      outputTokens: row?.output_tokens ?? 0,
      estimatedCost: row?.estimated_cost ?? 0,
    };
  }
}
