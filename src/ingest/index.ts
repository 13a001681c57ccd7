import { createHash } from "node:crypto";
import type { RecordStore } from "../storage/recordStore.js";
import type { ContentRecord, NewRecord, RecordMetadata, SkipReason } from "../storage/types.js";
import { maxTimestamp, normalizeTimestamp } from "../utils/date.js";
import { logInfo, logStep } from "../utils/logger.js";
import type { RawHistoryEntry } from "./history.js";
import { mergeMetadata, sameMetadata } from "./merge.js";
import { canonicalVideoUrl, tryExtractChannelId, tryExtractVideoIdFromUrl } from "./videoId.js";

export { readHistoryFile, normalizeHistory, type RawHistoryEntry } from "./history.js";

export type IngestReport = {
  total: number;
  inserted: number;
  updated: number;
  skipped: number;
  skippedByReason: Record<SkipReason, number>;
};

export function skippedRecordId(entry: RawHistoryEntry): string {
  const digest = createHash("sha256").update(entry.fingerprint).digest("hex");
  return `skipped-${digest.slice(0, 16)}`;
}

function classify(entry: RawHistoryEntry): { id: string } | { skipReason: SkipReason } {
  if (entry.source === "takeout" && entry.header !== undefined && entry.header !== "YouTube") {
    return { skipReason: "unsupported_source" };
  }
  if (!entry.url || entry.url.trim().length === 0) return { skipReason: "missing_url" };
  const id = tryExtractVideoIdFromUrl(entry.url);
  return id ? { id } : { skipReason: "unparseable_video_id" };
}

/** Map a raw entry onto the row it should produce. Pure. */
export function prepareEntry(entry: RawHistoryEntry): NewRecord {
  const watchedAt = normalizeTimestamp(entry.time);
  const channelUrl = entry.channelUrl?.trim() ?? "";
  const metadata: RecordMetadata = {
    title: entry.title?.trim() ?? "",
    channelId: tryExtractChannelId(channelUrl),
    channelName: entry.channelName?.trim() ?? "",
    channelUrl,
    seenAt: watchedAt,
  };
  const verdict = classify(entry);
  if ("skipReason" in verdict) {
    return {
      id: skippedRecordId(entry),
      url: entry.url?.trim() ?? "",
      status: "SKIPPED",
      skipReason: verdict.skipReason,
      watchedAt,
      metadata,
    };
  }
  return {
    id: verdict.id,
    url: canonicalVideoUrl(verdict.id),
    status: "PENDING",
    watchedAt,
    metadata,
  };
}

function storedMetadata(record: ContentRecord): RecordMetadata {
  return {
    title: record.title,
    channelId: record.channelId,
    channelName: record.channelName,
    channelUrl: record.channelUrl,
    seenAt: record.metadataSeenAt,
  };
}

/**
 * Upsert history entries. New ids are inserted as PENDING (or SKIPPED when
 * malformed); known ids only get their descriptive metadata merged, never
 * their status or analysis state. No network calls.
 */
export async function ingestHistory(
  store: RecordStore,
  entries: RawHistoryEntry[]
): Promise<IngestReport> {
  const report: IngestReport = {
    total: entries.length,
    inserted: 0,
    updated: 0,
    skipped: 0,
    skippedByReason: { missing_url: 0, unparseable_video_id: 0, unsupported_source: 0 },
  };

  await store.transaction(async () => {
    for (const entry of entries) {
      const row = prepareEntry(entry);
      if (row.skipReason) {
        report.skipped += 1;
        report.skippedByReason[row.skipReason] += 1;
      }

      const existing = await store.getRecord(row.id);
      if (!existing) {
        await store.insertRecord(row);
        if (row.status === "PENDING") report.inserted += 1;
        continue;
      }

      const before = storedMetadata(existing);
      const metadata = mergeMetadata(before, row.metadata);
      const watchedAt = maxTimestamp(existing.watchedAt, row.watchedAt);
      if (!sameMetadata(before, metadata) || watchedAt !== existing.watchedAt) {
        await store.updateMetadata(row.id, metadata, watchedAt);
      }
      if (row.status === "PENDING") report.updated += 1;
    }
  });

  logStep(
    "ingest",
    `${report.total} entries: ${report.inserted} new, ${report.updated} already known, ${report.skipped} skipped`
  );
  if (report.skipped > 0) {
    const reasons = Object.entries(report.skippedByReason)
      .filter(([, n]) => n > 0)
      .map(([reason, n]) => `${reason}=${n}`)
      .join(", ");
    logInfo(`Skipped entries by reason: ${reasons}`);
  }
  return report;
}
